import { describe, expect, it } from 'vitest';
import { score, styleWeights } from '@/scoring/engine.ts';
import { INVESTOR_STYLES } from '@/utils/config.ts';
import { InsufficientDataError } from '@/utils/errors.ts';
import { growthSnapshot, makeSnapshot } from '../helpers.ts';
import type { MetricName, Score, ScoredMetric } from '@/analysis/types.ts';

const withoutPeg = (extra: Partial<Record<MetricName, number>> = {}) =>
  makeSnapshot(
    { roe: 0.25, revenueGrowth: 0.18, earningsGrowth: 0.2, ...extra },
    { revenueHistory: growthSnapshot().revenueHistory },
  );

const component = (result: Score, metric: ScoredMetric) => {
  const found = result.components.find((c) => c.metric === metric);
  if (!found) throw new Error(`no component for ${metric}`);
  return found;
};

describe('styleWeights', () => {
  it.each(INVESTOR_STYLES)('%s weights sum to 1', (style) => {
    const total = styleWeights(style).reduce((sum, [, weight]) => sum + weight, 0);
    expect(total).toBeCloseTo(1, 10);
  });
});

describe('score', () => {
  it('scores a strong growth company as a buy-grade composite', () => {
    const result = score(growthSnapshot(), 'growth');

    expect(component(result, 'revenueGrowth').subScore).toBeCloseTo(0.84, 10);
    expect(component(result, 'earningsGrowth').subScore).toBeCloseTo(0.86667, 4);
    expect(component(result, 'revenueTrend').subScore).toBe(1);
    expect(component(result, 'pegRatio').subScore).toBeCloseTo(0.65, 10);
    expect(component(result, 'roe').subScore).toBe(1);
    expect(result.composite).toBeCloseTo(0.863333, 5);
    expect(result.missing).toEqual([]);
  });

  it('is deterministic', () => {
    expect(score(growthSnapshot(), 'growth')).toEqual(score(growthSnapshot(), 'growth'));
  });

  it('redistributes a missing weight proportionally', () => {
    const result = score(withoutPeg(), 'growth');

    const peg = component(result, 'pegRatio');
    expect(peg.available).toBe(false);
    expect(peg.weight).toBe(0);
    expect(peg.contribution).toBe(0);
    expect(result.components.reduce((sum, c) => sum + c.weight, 0)).toBeCloseTo(1, 10);
    expect(component(result, 'revenueGrowth').weight).toBeCloseTo(0.3125, 10);
    expect(component(result, 'roe').weight).toBeCloseTo(0.25, 10);
    expect(result.composite).toBeCloseTo(0.916667, 5);
    expect(result.missing).toEqual(['pegRatio']);
  });

  it('equals the full score when the missing metric would have scored the average', () => {
    const partial = score(withoutPeg(), 'growth');
    // PEG sub-score is 1 - (peg - 0.5) / 2 on [0.5, 2.5]
    const neutralPeg = 0.5 + 2 * (1 - partial.composite);
    const full = score(withoutPeg({ pegRatio: neutralPeg }), 'growth');
    expect(full.composite).toBeCloseTo(partial.composite, 10);
  });

  it('derives PEG from P/E and earnings growth', () => {
    const result = score(makeSnapshot({ peRatio: 24, earningsGrowth: 0.2 }), 'growth');
    expect(component(result, 'pegRatio').value).toBeCloseTo(1.2, 10);
  });

  it('penalizes a distressed dividend yield', () => {
    const result = score(makeSnapshot({ dividendYield: 0.15, payoutRatio: 0.95 }), 'dividend');

    expect(component(result, 'dividendYield').subScore).toBeCloseTo(1 / 9, 10);
    expect(component(result, 'payoutRatio').subScore).toBeCloseTo(0.125, 10);
    expect(result.composite).toBeCloseTo(0.116667, 5);
    expect(result.missing).toEqual(['profitMargin', 'operatingCashFlow', 'dividendGrowthStreak', 'dividendStability']);
  });

  it('gives full marks to a yield inside the sustainable band', () => {
    const result = score(makeSnapshot({ dividendYield: 0.05 }), 'dividend');
    expect(component(result, 'dividendYield').subScore).toBe(1);
    expect(result.composite).toBe(1);
  });

  it('compares P/E with the sector when a sector P/E is known', () => {
    const relative = score(makeSnapshot({ peRatio: 12, sectorPeRatio: 20 }), 'value');
    const absolute = score(makeSnapshot({ peRatio: 12 }), 'value');

    expect(component(relative, 'peRatio').subScore).toBe(1);
    expect(component(absolute, 'peRatio').subScore).toBeCloseTo(0.9, 10);
  });

  it('scores a negative P/E and negative equity at zero', () => {
    const result = score(makeSnapshot({ peRatio: -8, debtToEquity: -1, pbRatio: 1 }), 'value');

    expect(component(result, 'peRatio').subScore).toBe(0);
    expect(component(result, 'debtToEquity').subScore).toBe(0);
    expect(result.composite).toBeCloseTo(0.2 / 0.7, 10);
  });

  it('scores profit margin on its band and operating cash flow by sign', () => {
    const positive = score(makeSnapshot({ profitMargin: 0.1, operatingCashFlow: 5e8 }), 'value');
    const negative = score(makeSnapshot({ profitMargin: -0.05, operatingCashFlow: -2e7 }), 'value');

    expect(component(positive, 'profitMargin').subScore).toBeCloseTo(0.5, 10);
    expect(component(positive, 'operatingCashFlow').subScore).toBe(1);
    expect(positive.composite).toBeCloseTo(0.75, 10);
    expect(component(negative, 'profitMargin').subScore).toBe(0);
    expect(component(negative, 'operatingCashFlow').subScore).toBe(0);
    expect(negative.composite).toBe(0);
  });

  it('rewards a dividend that was held or raised every year', () => {
    const steady = [2021, 2022, 2023, 2024, 2025].map((year) => ({ year, amount: 2 }));
    const result = score(makeSnapshot({ dividendYield: 0.04 }, { dividendHistory: steady }), 'dividend');

    expect(component(result, 'dividendStability').value).toBe(4);
    expect(component(result, 'dividendStability').subScore).toBe(1);
    expect(component(result, 'dividendGrowthStreak').value).toBe(0);
  });

  it('scores revenue consistency in the growth style', () => {
    const history = [
      { year: 2022, amount: 100 },
      { year: 2023, amount: 90 },
      { year: 2024, amount: 95 },
      { year: 2025, amount: 99 },
    ];
    const result = score(makeSnapshot({}, { revenueHistory: history }), 'growth');

    expect(component(result, 'revenueTrend').value).toBe(2);
    expect(component(result, 'revenueTrend').subScore).toBeCloseTo(2 / 3, 10);
    // Without a reported figure, revenue growth falls back to the three-year CAGR.
    expect(component(result, 'revenueGrowth').value).toBeCloseTo(Math.pow(0.99, 1 / 3) - 1, 10);
    expect(component(result, 'revenueGrowth').subScore).toBe(0);
  });

  it('throws InsufficientDataError when no metric of the style is available', () => {
    expect(() => score(growthSnapshot(), 'dividend')).toThrow(InsufficientDataError);
  });
});
