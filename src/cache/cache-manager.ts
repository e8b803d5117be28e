import { decodeAnalysisResult, decodeSnapshot, isRecord, normalizeTicker } from '@/analysis/decode.ts';
import { CacheStorageError, errorMessage } from '@/utils/errors.ts';
import { logger } from '@/utils/logger.ts';
import type { CacheStore, StoredEntry } from '@/cache/store.ts';
import type { Decoded } from '@/analysis/decode.ts';
import type { AnalysisResult, InvestorStyle, TickerSnapshot } from '@/analysis/types.ts';

export type TierValues = {
  raw: TickerSnapshot;
  result: AnalysisResult;
};

export type CacheTier = keyof TierValues;

export type TierTtls = Record<CacheTier, number>;

type Decoders = { [K in CacheTier]: (raw: unknown) => Decoded<TierValues[K]> };

const DECODERS: Decoders = {
  raw: decodeSnapshot,
  result: decodeAnalysisResult,
};

const log = logger.child('cache');

/** UTC calendar day of a timestamp, the date bucket of every key. */
export const dateBucket = (now: number): string => new Date(now).toISOString().slice(0, 10);

export const rawKey = (ticker: string, date: string): string => `raw:${normalizeTicker(ticker)}:${date}`;

export const resultKey = (ticker: string, style: InvestorStyle, date: string): string =>
  `result:${normalizeTicker(ticker)}:${style}:${date}`;

const readEntry = (raw: unknown): StoredEntry | null => {
  if (!isRecord(raw)) return null;
  const { key, tier, storedAt, ttlMs, expiresAt, value } = raw;
  if (typeof key !== 'string' || typeof tier !== 'string') return null;
  if (typeof storedAt !== 'number' || typeof ttlMs !== 'number' || typeof expiresAt !== 'number') return null;
  return { key, tier, storedAt, ttlMs, expiresAt, value };
};

/**
 * Two-tier cache over an injected store. Reads never throw: missing, expired, corrupt or
 * unreadable entries all come back as `null`, and expired entries are deleted on the way.
 * Writes never throw either; a failing store only costs recomputation. Keys of past days
 * are never read again, so `prune` sweeps them once they expire.
 */
export class CacheManager {
  constructor(
    private readonly store: CacheStore,
    private readonly ttls: TierTtls,
    private readonly clock: () => number = Date.now,
  ) {}

  today = (): string => dateBucket(this.clock());

  ttlFor = (tier: CacheTier): number => this.ttls[tier];

  private isExpired = (entry: StoredEntry): boolean => this.clock() - entry.storedAt >= entry.ttlMs;

  private discard = async (key: string): Promise<boolean> => {
    try {
      await this.store.delete(key);
      return true;
    } catch (err) {
      const failure = new CacheStorageError(`Cache delete failed for ${key}: ${errorMessage(err)}`, { cause: err });
      log.warn('Cache delete failed', { key, error: failure });
      return false;
    }
  };

  get = async <K extends CacheTier>(tier: K, key: string): Promise<TierValues[K] | null> => {
    let raw: unknown;
    try {
      raw = await this.store.read(key);
    } catch (err) {
      const failure = new CacheStorageError(`Cache read failed for ${key}: ${errorMessage(err)}`, { cause: err });
      log.warn('Cache read failed, treating as miss', { tier, key, error: failure });
      return null;
    }
    if (raw === undefined) return null;

    const entry = readEntry(raw);
    if (!entry || entry.tier !== tier || entry.key !== key) {
      log.warn('Discarding malformed cache entry', { tier, key });
      return null;
    }

    if (this.isExpired(entry)) {
      log.debug('Cache entry expired', { tier, key });
      // A fresh value written concurrently may go too; that only costs a recomputation.
      await this.discard(key);
      return null;
    }

    const decode: Decoders[K] = DECODERS[tier];
    const decoded = decode(entry.value);
    if (!decoded.ok) {
      log.warn('Discarding undecodable cache entry', { tier, key, error: decoded.error });
      return null;
    }
    return decoded.value;
  };

  put = async <K extends CacheTier>(
    tier: K,
    key: string,
    value: TierValues[K],
    ttlMs: number = this.ttls[tier],
  ): Promise<boolean> => {
    const storedAt = this.clock();
    const entry: StoredEntry = { key, tier, storedAt, ttlMs, expiresAt: storedAt + ttlMs, value };
    try {
      await this.store.write(key, entry);
      log.debug('Cache entry stored', { tier, key, ttlMs });
      return true;
    } catch (err) {
      const failure = new CacheStorageError(`Cache write failed for ${key}: ${errorMessage(err)}`, { cause: err });
      log.warn('Cache write failed, continuing without cache', { tier, key, error: failure });
      return false;
    }
  };

  /** Deletes expired and unreadable entries. Resolves the number removed; never throws. */
  prune = async (): Promise<number> => {
    let keys: string[];
    try {
      keys = await this.store.keys();
    } catch (err) {
      log.warn('Cache prune skipped, store could not be listed', { error: errorMessage(err) });
      return 0;
    }

    let removed = 0;
    for (const key of keys) {
      let raw: unknown;
      try {
        raw = await this.store.read(key);
      } catch (err) {
        log.debug('Unreadable cache entry', { key, error: errorMessage(err) });
        raw = null;
      }
      if (raw === undefined) continue;

      const entry = readEntry(raw);
      if (entry && !this.isExpired(entry)) continue;
      if (await this.discard(key)) removed++;
    }

    if (removed > 0) log.info(`Pruned ${removed} cache entries`, { scanned: keys.length });
    return removed;
  };
}
