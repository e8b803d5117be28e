import { SCORING, STYLE_WEIGHTS } from '@/utils/config.ts';
import { InsufficientDataError } from '@/utils/errors.ts';
import { normalizeMetrics } from '@/scoring/metrics.ts';
import { clamp, toUnitScore } from '@/scoring/scales.ts';
import { SCORED_METRICS } from '@/analysis/types.ts';
import type {
  InvestorStyle,
  NormalizedMetrics,
  Score,
  ScoreComponent,
  ScoredMetric,
  TickerSnapshot,
} from '@/analysis/types.ts';

type SubScorer = (value: number, metrics: NormalizedMetrics) => number;

const SUB_SCORERS: Record<ScoredMetric, SubScorer> = {
  revenueGrowth: (value) => toUnitScore(value, SCORING.revenueGrowth),
  earningsGrowth: (value) => toUnitScore(value, SCORING.earningsGrowth),
  revenueTrend: (value) => toUnitScore(value, SCORING.revenueTrend),
  pegRatio: (value) => (value <= 0 ? 0 : toUnitScore(value, SCORING.pegRatio)),
  roe: (value) => toUnitScore(value, SCORING.roe),
  peRatio: (value, metrics) => {
    if (value <= 0) return 0;
    const sectorPe = metrics.sectorPeRatio;
    if (sectorPe !== null && sectorPe > 0) return toUnitScore(value / sectorPe, SCORING.relativePe);
    return toUnitScore(value, SCORING.peRatio);
  },
  pbRatio: (value) => (value <= 0 ? 0 : toUnitScore(value, SCORING.pbRatio)),
  debtToEquity: (value) => (value < 0 ? 0 : toUnitScore(value, SCORING.debtToEquity)),
  profitMargin: (value) => toUnitScore(value, SCORING.profitMargin),
  // Cash flow has no size benchmark across companies; only its sign is scored.
  operatingCashFlow: (value) => (value > 0 ? 1 : 0),
  dividendYield: (value) => toUnitScore(value, SCORING.dividendYield),
  payoutRatio: (value) => (value < 0 ? 0 : toUnitScore(value, SCORING.payoutRatio)),
  dividendGrowthStreak: (value) => toUnitScore(value, SCORING.dividendGrowthStreak),
  dividendStability: (value) => toUnitScore(value, SCORING.dividendStability),
};

/** Base weights of a style, in the fixed metric order. */
export const styleWeights = (style: InvestorStyle): Array<[ScoredMetric, number]> => {
  const weights: Partial<Record<ScoredMetric, number>> = STYLE_WEIGHTS[style];
  const result: Array<[ScoredMetric, number]> = [];
  for (const metric of SCORED_METRICS) {
    const weight = weights[metric];
    if (weight !== undefined) result.push([metric, weight]);
  }
  return result;
};

export const subScore = (metric: ScoredMetric, value: number, metrics: NormalizedMetrics): number =>
  clamp(SUB_SCORERS[metric](value, metrics), 0, 1);

/**
 * Scores a snapshot for an investor style.
 *
 * Unavailable metrics hand their weight to the available ones in proportion to their
 * base weights: each available weight is divided by the sum of available base weights.
 * Throws `InsufficientDataError` when none of the style's metrics is available.
 */
export const score = (snapshot: TickerSnapshot, style: InvestorStyle): Score => {
  const metrics = normalizeMetrics(snapshot);
  const weights = styleWeights(style);

  const availableWeight = weights.reduce(
    (sum, [metric, weight]) => (metrics[metric] === null ? sum : sum + weight),
    0,
  );
  if (availableWeight <= 0) {
    throw new InsufficientDataError(
      `None of the ${style} metrics (${weights.map(([m]) => m).join(', ')}) are available for ${snapshot.ticker}`,
    );
  }

  const components: ScoreComponent[] = weights.map(([metric, baseWeight]) => {
    const value = metrics[metric];
    if (value === null) {
      return { metric, value, available: false, subScore: 0, baseWeight, weight: 0, contribution: 0 };
    }
    const sub = subScore(metric, value, metrics);
    const weight = baseWeight / availableWeight;
    return { metric, value, available: true, subScore: sub, baseWeight, weight, contribution: weight * sub };
  });

  const composite = clamp(
    components.reduce((sum, c) => sum + c.contribution, 0),
    0,
    1,
  );

  return {
    ticker: snapshot.ticker,
    asOf: snapshot.asOf,
    style,
    composite,
    components,
    missing: components.filter((c) => !c.available).map((c) => c.metric),
  };
};
