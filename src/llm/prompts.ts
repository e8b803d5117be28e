import { METRIC_LABELS, formatMetricValue, formatScore } from '@/analysis/format.ts';
import { decideAction } from '@/analysis/fallback.ts';
import type { InvestorStyle, Score, TickerSnapshot } from '@/analysis/types.ts';

export const NARRATIVE_SYSTEM = `You are a fundamental equity analyst. You receive pre-computed financial metrics and a scoring breakdown for one company and write a short rationale for an investor.

Rules:
- Use ONLY the numbers provided. Never invent figures, peers or events.
- If a metric is N/A, say the data is insufficient for that aspect instead of guessing.
- Do not contradict the recommended action; explain it.
- Reply with one paragraph of plain text (3-5 sentences). No markdown, no lists, no JSON.`;

const STYLE_FOCUS: Record<InvestorStyle, string> = {
  growth:
    'Growth investing: judge the strength and consistency of revenue and earnings growth first, then whether the PEG ratio justifies the price, then profitability (ROE).',
  value:
    'Value investing: judge whether P/E and P/B offer a margin of safety, then whether leverage (debt/equity) makes the business fragile, then the quality of earnings (profit margin, operating cash flow).',
  dividend:
    'Dividend investing: judge whether the yield is attractive without being a distress signal, whether the payout ratio and cash flow leave room to sustain it, and how consistently the dividend has been held or grown.',
};

export type NarrativePrompt = {
  system: string;
  prompt: string;
};

/** Deterministic prompt: same snapshot and score always yield the same text. */
export const buildNarrativePrompt = (snapshot: TickerSnapshot, score: Score): NarrativePrompt => {
  const metricLines = score.components
    .map((c) => {
      const label = METRIC_LABELS[c.metric].label;
      const value = formatMetricValue(c.metric, c.value);
      if (!c.available) return `- ${label}: N/A (excluded, weight redistributed)`;
      return `- ${label}: ${value} | sub-score ${formatScore(c.subScore)} | weight ${formatScore(c.weight)}`;
    })
    .join('\n');

  const action = decideAction(score.composite);

  const prompt = `Company: ${snapshot.ticker} (data as of ${snapshot.asOf})
Investor style: ${score.style}
${STYLE_FOCUS[score.style]}

Metrics:
${metricLines}

Composite score: ${formatScore(score.composite)} (0 = weakest, 1 = strongest)
Recommended action: ${action.toUpperCase()}

Write the rationale for this recommendation.`;

  return { system: NARRATIVE_SYSTEM, prompt };
};
