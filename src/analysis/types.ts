import type { InvestorStyle } from '@/utils/config.ts';

export type { InvestorStyle };

export const METRIC_NAMES = [
  'roe',
  'debtToEquity',
  'revenueGrowth',
  'earningsGrowth',
  'pegRatio',
  'peRatio',
  'sectorPeRatio',
  'pbRatio',
  'dividendYield',
  'payoutRatio',
  'profitMargin',
  'eps',
  'operatingCashFlow',
] as const;

export type MetricName = (typeof METRIC_NAMES)[number];

/** `null` marks a metric the provider could not supply. */
export type MetricValue = number | null;

/** One fiscal year's figure: a dividend per share or total revenue. */
export type AnnualAmount = {
  year: number;
  amount: number;
};

export type DividendPayment = AnnualAmount;

export type TickerSnapshot = {
  readonly ticker: string;
  readonly asOf: string; // YYYY-MM-DD
  readonly metrics: Readonly<Record<MetricName, MetricValue>>;
  readonly dividendHistory: readonly DividendPayment[];
  readonly revenueHistory: readonly AnnualAmount[];
};

/**
 * Metrics that feed a sub-score. `revenueTrend` is derived from the revenue history,
 * `dividendGrowthStreak` and `dividendStability` from the dividend history.
 */
export const SCORED_METRICS = [
  'revenueGrowth',
  'earningsGrowth',
  'revenueTrend',
  'pegRatio',
  'roe',
  'peRatio',
  'pbRatio',
  'debtToEquity',
  'profitMargin',
  'operatingCashFlow',
  'dividendYield',
  'payoutRatio',
  'dividendGrowthStreak',
  'dividendStability',
] as const;

export type ScoredMetric = (typeof SCORED_METRICS)[number];

export type NormalizedMetrics = Readonly<Record<ScoredMetric, MetricValue>> & {
  readonly sectorPeRatio: MetricValue;
};

export type ScoreComponent = {
  metric: ScoredMetric;
  value: MetricValue;
  available: boolean;
  subScore: number;
  baseWeight: number;
  weight: number;
  contribution: number;
};

export type Score = {
  readonly ticker: string;
  readonly asOf: string;
  readonly style: InvestorStyle;
  readonly composite: number;
  readonly components: readonly ScoreComponent[];
  readonly missing: readonly ScoredMetric[];
};

export const ACTIONS = ['buy', 'hold', 'sell'] as const;
export type Action = (typeof ACTIONS)[number];

export const ANALYSIS_SOURCES = ['llm', 'rule_based'] as const;
export type AnalysisSource = (typeof ANALYSIS_SOURCES)[number];

export type AnalysisResult = {
  ticker: string;
  style: InvestorStyle;
  asOf: string;
  action: Action;
  confidence: number;
  reason: string;
  source: AnalysisSource;
  generatedAt: string;
  breakdown: ScoreComponent[];
};
