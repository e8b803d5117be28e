import type { MetricValue, ScoredMetric } from '@/analysis/types.ts';

type MetricFormat = 'percent' | 'ratio' | 'years' | 'growthYears' | 'money';

export const METRIC_LABELS: Record<ScoredMetric, { label: string; format: MetricFormat }> = {
  revenueGrowth: { label: 'revenue growth', format: 'percent' },
  earningsGrowth: { label: 'earnings growth', format: 'percent' },
  revenueTrend: { label: 'revenue trend', format: 'growthYears' },
  pegRatio: { label: 'PEG ratio', format: 'ratio' },
  roe: { label: 'ROE', format: 'percent' },
  peRatio: { label: 'P/E ratio', format: 'ratio' },
  pbRatio: { label: 'P/B ratio', format: 'ratio' },
  debtToEquity: { label: 'debt/equity', format: 'ratio' },
  profitMargin: { label: 'profit margin', format: 'percent' },
  operatingCashFlow: { label: 'operating cash flow', format: 'money' },
  dividendYield: { label: 'dividend yield', format: 'percent' },
  payoutRatio: { label: 'payout ratio', format: 'percent' },
  dividendGrowthStreak: { label: 'dividend growth streak', format: 'years' },
  dividendStability: { label: 'dividend stability', format: 'years' },
};

const formatMoney = (value: number): string => {
  const abs = Math.abs(value);
  if (abs >= 1e9) return `${(value / 1e9).toFixed(2)}B`;
  if (abs >= 1e6) return `${(value / 1e6).toFixed(2)}M`;
  return value.toFixed(0);
};

export const formatMetricValue = (metric: ScoredMetric, value: MetricValue): string => {
  if (value === null) return 'N/A';
  switch (METRIC_LABELS[metric].format) {
    case 'percent':
      return `${(value * 100).toFixed(1)}%`;
    case 'years':
      return `${value} ${value === 1 ? 'year' : 'years'}`;
    case 'growthYears':
      return `${value} of last 3 years up`;
    case 'money':
      return formatMoney(value);
    case 'ratio':
      return value.toFixed(2);
  }
};

export const formatScore = (value: number): string => value.toFixed(2);
