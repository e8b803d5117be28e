import type { AnnualAmount, DividendPayment, MetricValue, NormalizedMetrics, TickerSnapshot } from '@/analysis/types.ts';

const finite = (value: MetricValue): MetricValue => (value !== null && Number.isFinite(value) ? value : null);

// PEG = P/E / (growth in percent), only meaningful for positive P/E and growth.
export const derivePegRatio = (peRatio: MetricValue, earningsGrowth: MetricValue): MetricValue => {
  if (peRatio === null || earningsGrowth === null) return null;
  if (peRatio <= 0 || earningsGrowth <= 0) return null;
  return peRatio / (earningsGrowth * 100);
};

export const derivePayoutRatio = (history: readonly DividendPayment[], eps: MetricValue): MetricValue => {
  if (eps === null || eps <= 0 || history.length === 0) return null;
  const latest = history.reduce((a, b) => (b.year > a.year ? b : a));
  return latest.amount / eps;
};

/**
 * Consecutive year-over-year dividend increases, counted back from the latest year.
 * Returns `null` with fewer than two years of history.
 */
export const dividendGrowthStreak = (history: readonly DividendPayment[]): MetricValue => {
  if (history.length < 2) return null;

  const byYearDesc = [...history].sort((a, b) => b.year - a.year);
  let streak = 0;
  for (let i = 0; i < byYearDesc.length - 1; i++) {
    const current = byYearDesc[i];
    const previous = byYearDesc[i + 1];
    if (current.year - previous.year !== 1 || current.amount <= previous.amount) break;
    streak++;
  }
  return streak;
};

// Trend and stability read the most recent years only; fewer than four years is too short.
const MIN_HISTORY_YEARS = 4;

const latestFirst = (history: readonly AnnualAmount[], count: number): AnnualAmount[] =>
  [...history].sort((a, b) => b.year - a.year).slice(0, count);

/** Years of revenue growth among the last three year-over-year changes (0 to 3). */
export const revenueTrend = (history: readonly AnnualAmount[]): MetricValue => {
  if (history.length < MIN_HISTORY_YEARS) return null;
  const recent = latestFirst(history, MIN_HISTORY_YEARS);
  let growthYears = 0;
  for (let i = 0; i < recent.length - 1; i++) {
    if (recent[i].amount > recent[i + 1].amount) growthYears++;
  }
  return growthYears;
};

/** Compound annual revenue growth over the last three years. */
export const revenueCagr = (history: readonly AnnualAmount[]): MetricValue => {
  if (history.length < MIN_HISTORY_YEARS) return null;
  const recent = latestFirst(history, MIN_HISTORY_YEARS);
  const end = recent[0].amount;
  const start = recent[recent.length - 1].amount;
  if (start <= 0) return null;
  return Math.pow(end / start, 1 / (recent.length - 1)) - 1;
};

/**
 * Years among the last four year-over-year changes in which a positive dividend was held
 * or raised. Unlike the growth streak, flat years count and a cut does not reset the count.
 */
export const dividendStability = (history: readonly DividendPayment[]): MetricValue => {
  if (history.length < MIN_HISTORY_YEARS) return null;
  const recent = latestFirst(history, MIN_HISTORY_YEARS + 1);
  let stableYears = 0;
  for (let i = 0; i < recent.length - 1; i++) {
    if (recent[i].amount > 0 && recent[i].amount >= recent[i + 1].amount) stableYears++;
  }
  return stableYears;
};

export const normalizeMetrics = (snapshot: TickerSnapshot): NormalizedMetrics => {
  const m = snapshot.metrics;
  const eps = finite(m.eps);

  return {
    revenueGrowth: finite(m.revenueGrowth) ?? revenueCagr(snapshot.revenueHistory),
    earningsGrowth: finite(m.earningsGrowth),
    revenueTrend: revenueTrend(snapshot.revenueHistory),
    pegRatio: finite(m.pegRatio) ?? derivePegRatio(finite(m.peRatio), finite(m.earningsGrowth)),
    roe: finite(m.roe),
    peRatio: finite(m.peRatio),
    sectorPeRatio: finite(m.sectorPeRatio),
    pbRatio: finite(m.pbRatio),
    debtToEquity: finite(m.debtToEquity),
    profitMargin: finite(m.profitMargin),
    operatingCashFlow: finite(m.operatingCashFlow),
    dividendYield: finite(m.dividendYield),
    payoutRatio: finite(m.payoutRatio) ?? derivePayoutRatio(snapshot.dividendHistory, eps),
    dividendGrowthStreak: dividendGrowthStreak(snapshot.dividendHistory),
    dividendStability: dividendStability(snapshot.dividendHistory),
  };
};
