import { INVESTOR_STYLES } from '@/utils/config.ts';
import { ACTIONS, ANALYSIS_SOURCES, METRIC_NAMES, SCORED_METRICS } from '@/analysis/types.ts';
import type {
  AnalysisResult,
  AnnualAmount,
  MetricName,
  MetricValue,
  ScoreComponent,
  TickerSnapshot,
} from '@/analysis/types.ts';

export type Decoded<T> = { ok: true; value: T } | { ok: false; error: string };

const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isFiniteNumber = (value: unknown): value is number => typeof value === 'number' && Number.isFinite(value);

const pick = <T extends string>(value: unknown, allowed: readonly T[]): T | null =>
  allowed.find((candidate) => candidate === value) ?? null;

export const normalizeTicker = (ticker: string): string => ticker.trim().toUpperCase();

const decodeMetricValue = (value: unknown): MetricValue => (isFiniteNumber(value) ? value : null);

export const buildMetrics = (read: (name: MetricName) => MetricValue): Record<MetricName, MetricValue> => ({
  roe: read('roe'),
  debtToEquity: read('debtToEquity'),
  revenueGrowth: read('revenueGrowth'),
  earningsGrowth: read('earningsGrowth'),
  pegRatio: read('pegRatio'),
  peRatio: read('peRatio'),
  sectorPeRatio: read('sectorPeRatio'),
  pbRatio: read('pbRatio'),
  dividendYield: read('dividendYield'),
  payoutRatio: read('payoutRatio'),
  profitMargin: read('profitMargin'),
  eps: read('eps'),
  operatingCashFlow: read('operatingCashFlow'),
});

const decodeAnnualSeries = (value: unknown): AnnualAmount[] => {
  if (!Array.isArray(value)) return [];
  const series: AnnualAmount[] = [];
  for (const item of value) {
    if (!isRecord(item)) continue;
    const { year, amount } = item;
    if (isFiniteNumber(year) && Number.isInteger(year) && isFiniteNumber(amount) && amount >= 0) {
      series.push({ year, amount });
    }
  }
  return series.sort((a, b) => a.year - b.year);
};

/**
 * Decodes a provider or cache payload into a snapshot. Metrics that are missing or not
 * finite numbers become `null`; unknown metric keys are dropped. Annual series are sorted
 * by year and default to empty.
 */
export const decodeSnapshot = (raw: unknown): Decoded<TickerSnapshot> => {
  if (!isRecord(raw)) return { ok: false, error: 'snapshot is not an object' };

  const { ticker, asOf, metrics, dividendHistory, revenueHistory } = raw;
  if (typeof ticker !== 'string' || ticker.trim() === '') {
    return { ok: false, error: 'snapshot.ticker must be a non-empty string' };
  }
  if (typeof asOf !== 'string' || !DATE_RE.test(asOf)) {
    return { ok: false, error: 'snapshot.asOf must be a YYYY-MM-DD date' };
  }
  if (metrics !== undefined && !isRecord(metrics)) {
    return { ok: false, error: 'snapshot.metrics must be an object' };
  }

  const source: Record<string, unknown> = isRecord(metrics) ? metrics : {};
  const decodedMetrics = buildMetrics((name) => decodeMetricValue(source[name]));

  return {
    ok: true,
    value: {
      ticker: normalizeTicker(ticker),
      asOf,
      metrics: decodedMetrics,
      dividendHistory: decodeAnnualSeries(dividendHistory),
      revenueHistory: decodeAnnualSeries(revenueHistory),
    },
  };
};

export const hasAnyData = (snapshot: TickerSnapshot): boolean =>
  snapshot.dividendHistory.length > 0 ||
  snapshot.revenueHistory.length > 0 ||
  METRIC_NAMES.some((name) => snapshot.metrics[name] !== null);

const decodeComponent = (raw: unknown): ScoreComponent | null => {
  if (!isRecord(raw)) return null;
  const metric = pick(raw.metric, SCORED_METRICS);
  const value = raw.value === null || isFiniteNumber(raw.value) ? raw.value : undefined;
  const { available, subScore, baseWeight, weight, contribution } = raw;
  if (
    metric === null ||
    value === undefined ||
    typeof available !== 'boolean' ||
    !isFiniteNumber(subScore) ||
    !isFiniteNumber(baseWeight) ||
    !isFiniteNumber(weight) ||
    !isFiniteNumber(contribution)
  ) {
    return null;
  }
  return { metric, value, available, subScore, baseWeight, weight, contribution };
};

export const decodeAnalysisResult = (raw: unknown): Decoded<AnalysisResult> => {
  if (!isRecord(raw)) return { ok: false, error: 'result is not an object' };

  const style = pick(raw.style, INVESTOR_STYLES);
  const action = pick(raw.action, ACTIONS);
  const source = pick(raw.source, ANALYSIS_SOURCES);
  const { ticker, asOf, confidence, reason, generatedAt, breakdown } = raw;

  if (typeof ticker !== 'string' || typeof asOf !== 'string') return { ok: false, error: 'result identity is invalid' };
  if (style === null || action === null || source === null) return { ok: false, error: 'result enums are invalid' };
  if (!isFiniteNumber(confidence) || confidence < 0 || confidence > 1) {
    return { ok: false, error: 'result.confidence must be within [0, 1]' };
  }
  if (typeof reason !== 'string' || typeof generatedAt !== 'string') {
    return { ok: false, error: 'result text fields are invalid' };
  }
  if (!Array.isArray(breakdown)) return { ok: false, error: 'result.breakdown must be an array' };

  const components: ScoreComponent[] = [];
  for (const item of breakdown) {
    const component = decodeComponent(item);
    if (!component) return { ok: false, error: 'result.breakdown contains an invalid component' };
    components.push(component);
  }

  return {
    ok: true,
    value: { ticker, style, asOf, action, confidence, reason, source, generatedAt, breakdown: components },
  };
};
