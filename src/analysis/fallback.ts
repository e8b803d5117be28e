import { ACTION_THRESHOLDS } from '@/utils/config.ts';
import { METRIC_LABELS, formatMetricValue, formatScore } from '@/analysis/format.ts';
import type { Action, AnalysisResult, Score, ScoreComponent } from '@/analysis/types.ts';

export const decideAction = (composite: number): Action => {
  if (composite >= ACTION_THRESHOLDS.buy) return 'buy';
  if (composite >= ACTION_THRESHOLDS.hold) return 'hold';
  return 'sell';
};

/** The one or two available components with the largest weighted contribution. */
export const topDrivers = (score: Score, limit = 2): ScoreComponent[] =>
  score.components
    .filter((c) => c.available)
    .sort((a, b) => b.contribution - a.contribution || b.baseWeight - a.baseWeight)
    .slice(0, limit);

const describeDriver = (c: ScoreComponent): string =>
  `${METRIC_LABELS[c.metric].label} (${formatMetricValue(c.metric, c.value)}, sub-score ${formatScore(c.subScore)})`;

export const buildFallbackReason = (score: Score, action: Action): string => {
  const drivers = topDrivers(score).map(describeDriver);
  const driverText = drivers.length === 2 ? `${drivers[0]} and ${drivers[1]}` : drivers.join('');
  const lead = action === 'sell' ? 'Largest contributors' : 'Strongest drivers';
  const missing =
    score.missing.length > 0
      ? ` Not available: ${score.missing.map((m) => METRIC_LABELS[m].label).join(', ')}.`
      : '';

  return (
    `Rule-based ${score.style} assessment of ${score.ticker}: composite score ` +
    `${formatScore(score.composite)} maps to ${action.toUpperCase()}. ${lead}: ${driverText}.${missing}`
  );
};

/**
 * Deterministic recommendation from a score alone. Never calls out and never throws for a
 * score produced by the scoring engine.
 */
export const fallback = (score: Score, now: Date = new Date()): AnalysisResult => {
  const action = decideAction(score.composite);
  return {
    ticker: score.ticker,
    style: score.style,
    asOf: score.asOf,
    action,
    confidence: score.composite,
    reason: buildFallbackReason(score, action),
    source: 'rule_based',
    generatedAt: now.toISOString(),
    breakdown: score.components.map((c) => ({ ...c })),
  };
};
