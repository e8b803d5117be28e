import { buildMetrics } from '@/analysis/decode.ts';
import type { MetricName, MetricValue, TickerSnapshot } from '@/analysis/types.ts';

export const makeSnapshot = (
  metrics: Partial<Record<MetricName, MetricValue>> = {},
  overrides: Partial<Omit<TickerSnapshot, 'metrics'>> = {},
): TickerSnapshot => ({
  ticker: 'ACME',
  asOf: '2026-09-30',
  metrics: buildMetrics((name) => metrics[name] ?? null),
  dividendHistory: [],
  revenueHistory: [],
  ...overrides,
});

/** Strong growth profile: composite ~0.86 under the growth style. */
export const growthSnapshot = (): TickerSnapshot =>
  makeSnapshot(
    { roe: 0.25, revenueGrowth: 0.18, earningsGrowth: 0.2, pegRatio: 1.2 },
    {
      revenueHistory: [
        { year: 2022, amount: 100 },
        { year: 2023, amount: 110 },
        { year: 2024, amount: 121 },
        { year: 2025, amount: 133 },
      ],
    },
  );
