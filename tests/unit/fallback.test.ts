import { describe, expect, it } from 'vitest';
import { buildFallbackReason, decideAction, fallback, topDrivers } from '@/analysis/fallback.ts';
import { score } from '@/scoring/engine.ts';
import { growthSnapshot, makeSnapshot } from '../helpers.ts';

describe('decideAction', () => {
  it('maps the composite onto fixed thresholds', () => {
    expect(decideAction(0.7)).toBe('buy');
    expect(decideAction(0.6999)).toBe('hold');
    expect(decideAction(0.4)).toBe('hold');
    expect(decideAction(0.3999)).toBe('sell');
    expect(decideAction(0)).toBe('sell');
  });
});

describe('fallback', () => {
  it('names the two strongest drivers', () => {
    const s = score(growthSnapshot(), 'growth');

    expect(topDrivers(s).map((c) => c.metric)).toEqual(['revenueGrowth', 'roe']);
    expect(buildFallbackReason(s, 'buy')).toBe(
      'Rule-based growth assessment of ACME: composite score 0.86 maps to BUY. ' +
        'Strongest drivers: revenue growth (18.0%, sub-score 0.84) and ROE (25.0%, sub-score 1.00).',
    );
  });

  it('lists metrics that were not available', () => {
    const s = score(makeSnapshot({ roe: 0.25, revenueGrowth: 0.18, earningsGrowth: 0.2 }), 'growth');
    expect(buildFallbackReason(s, decideAction(s.composite))).toBe(
      'Rule-based growth assessment of ACME: composite score 0.90 maps to BUY. ' +
        'Strongest drivers: revenue growth (18.0%, sub-score 0.84) and ROE (25.0%, sub-score 1.00). ' +
        'Not available: revenue trend, PEG ratio.',
    );
  });

  it('describes a sell by its largest contributors', () => {
    const s = score(makeSnapshot({ dividendYield: 0.15, payoutRatio: 0.95 }), 'dividend');
    const result = fallback(s);

    expect(result.action).toBe('sell');
    expect(result.reason).toMatch(
      /^Rule-based dividend assessment of ACME: composite score 0\.12 maps to SELL\. Largest contributors: dividend yield \(15\.0%, sub-score 0\.11\) and payout ratio/,
    );
    expect(
      result.reason.endsWith(
        'Not available: profit margin, operating cash flow, dividend growth streak, dividend stability.',
      ),
    ).toBe(true);
  });

  it('uses a single driver when only one metric is available', () => {
    const s = score(makeSnapshot({ roe: 0.15 }), 'growth');
    expect(buildFallbackReason(s, 'hold')).toBe(
      'Rule-based growth assessment of ACME: composite score 0.50 maps to HOLD. ' +
        'Strongest drivers: ROE (15.0%, sub-score 0.50). ' +
        'Not available: revenue growth, earnings growth, revenue trend, PEG ratio.',
    );
  });

  it('builds a rule-based result with confidence equal to the composite', () => {
    const s = score(growthSnapshot(), 'growth');
    const now = new Date('2026-10-19T12:00:00.000Z');
    const result = fallback(s, now);

    expect(result).toMatchObject({
      ticker: 'ACME',
      style: 'growth',
      asOf: '2026-09-30',
      action: 'buy',
      source: 'rule_based',
      generatedAt: '2026-10-19T12:00:00.000Z',
    });
    expect(result.confidence).toBe(s.composite);
    expect(result.breakdown).toEqual(s.components);
  });
});
