import 'dotenv/config';
import type { ScoredMetric } from '@/analysis/types.ts';

const env = process.env;

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const oneOf = <T extends string>(value: string | undefined, allowed: readonly T[], fallback: T): T =>
  allowed.find((candidate) => candidate === value) ?? fallback;

const num = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const HOUR_MS = 60 * 60 * 1000;
const MINUTE_MS = 60 * 1000;

export const config = {
  port: num(env.PORT, 3000),
  logLevel: oneOf<LogLevel>(env.LOG_LEVEL, LOG_LEVELS, 'info'),
  version: env.npm_package_version ?? '0.1.0',
  cache: {
    backend: oneOf(env.CACHE_BACKEND, ['file', 'memory'] as const, 'file'),
    dir: env.CACHE_DIR ?? './data/cache',
    rawTtlMs: num(env.CACHE_RAW_TTL_HOURS, 24) * HOUR_MS,
    resultTtlMs: num(env.CACHE_RESULT_TTL_HOURS, 4) * HOUR_MS,
    fallbackTtlMs: num(env.CACHE_FALLBACK_TTL_MINUTES, 15) * MINUTE_MS,
    pruneIntervalMs: num(env.CACHE_PRUNE_INTERVAL_MINUTES, 60) * MINUTE_MS,
  },
  snapshots: {
    source: oneOf(env.SNAPSHOT_SOURCE, ['file', 'http'] as const, 'file'),
    dir: env.SNAPSHOT_DIR ?? './data/snapshots',
    apiUrl: env.SNAPSHOT_API_URL ?? '',
    apiKey: env.SNAPSHOT_API_KEY ?? '',
    timeoutMs: num(env.DATA_TIMEOUT_MS, 8000),
    retryAttempts: num(env.DATA_RETRY_ATTEMPTS, 3),
    retryDelayMs: num(env.DATA_RETRY_DELAY_MS, 500),
  },
  anthropic: {
    apiKey: env.ANTHROPIC_API_KEY ?? '',
    model: env.LLM_MODEL ?? 'claude-haiku-4-5-20251001',
    maxTokens: num(env.LLM_MAX_TOKENS, 512),
    timeoutMs: num(env.LLM_TIMEOUT_MS, 15000),
  },
  llmEnabled: env.LLM_ENABLED !== 'false',
} as const;

export type AppConfig = typeof config;

export const INVESTOR_STYLES = ['growth', 'value', 'dividend'] as const;
export type InvestorStyle = (typeof INVESTOR_STYLES)[number];

/**
 * Benchmark tables for every sub-score. Each table is a list of `[input, subScore]`
 * points; values between points are interpolated linearly and values outside the
 * table take the nearest end point.
 */
export const SCORING = {
  revenueGrowth: [
    [0, 0],
    [0.15, 0.8],
    [0.3, 1],
  ],
  earningsGrowth: [
    [0, 0],
    [0.15, 0.8],
    [0.3, 1],
  ],
  // Growth years among the last three.
  revenueTrend: [
    [0, 0],
    [3, 1],
  ],
  // PEG <= 0 means shrinking or negative earnings and scores 0 before the table applies.
  pegRatio: [
    [0.5, 1],
    [2.5, 0],
  ],
  roe: [
    [0.05, 0],
    [0.25, 1],
  ],
  // Absolute P/E band, used when no sector P/E is known.
  peRatio: [
    [10, 1],
    [30, 0],
  ],
  // P/E divided by sector P/E.
  relativePe: [
    [0.6, 1],
    [1.4, 0],
  ],
  pbRatio: [
    [1, 1],
    [4, 0],
  ],
  debtToEquity: [
    [0.3, 1],
    [2, 0],
  ],
  profitMargin: [
    [0, 0],
    [0.2, 1],
  ],
  // Yields above the sustainability ceiling (7%) read as a distress signal.
  dividendYield: [
    [0, 0],
    [0.04, 1],
    [0.07, 1],
    [0.16, 0],
  ],
  payoutRatio: [
    [0, 0.3],
    [0.3, 1],
    [0.6, 1],
    [1, 0],
  ],
  dividendGrowthStreak: [
    [0, 0],
    [10, 1],
  ],
  // Held-or-raised years among the last four.
  dividendStability: [
    [0, 0],
    [2, 0.4],
    [4, 1],
  ],
} as const;

export const STYLE_WEIGHTS = {
  growth: {
    revenueGrowth: 0.25,
    earningsGrowth: 0.2,
    revenueTrend: 0.15,
    pegRatio: 0.2,
    roe: 0.2,
  },
  value: {
    peRatio: 0.3,
    pbRatio: 0.2,
    debtToEquity: 0.2,
    profitMargin: 0.15,
    operatingCashFlow: 0.15,
  },
  dividend: {
    dividendYield: 0.3,
    payoutRatio: 0.2,
    dividendGrowthStreak: 0.15,
    dividendStability: 0.15,
    profitMargin: 0.1,
    operatingCashFlow: 0.1,
  },
} as const satisfies Record<InvestorStyle, Partial<Record<ScoredMetric, number>>>;

export const ACTION_THRESHOLDS = {
  buy: 0.7,
  hold: 0.4,
} as const;

export default config;
