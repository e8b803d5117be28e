import type { TickerSnapshot } from '@/analysis/types.ts';

/**
 * Source of normalized snapshots. Rejects with `TickerNotFoundError` when the ticker does
 * not exist and with `DataProviderError` for anything transient.
 */
export type DataProvider = {
  readonly name: string;
  fetchSnapshot: (ticker: string, signal?: AbortSignal) => Promise<TickerSnapshot>;
};
