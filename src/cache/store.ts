/** Self-describing cache record as persisted by a store. */
export type StoredEntry = {
  key: string;
  tier: string;
  storedAt: number;
  ttlMs: number;
  expiresAt: number;
  value: unknown;
};

/**
 * Storage backend of the cache manager. `read` resolves `undefined` for a missing key and
 * may reject on storage faults; `write` replaces the whole record atomically. Deleting a
 * missing key is not an error.
 */
export type CacheStore = {
  read: (key: string) => Promise<unknown>;
  write: (key: string, entry: StoredEntry) => Promise<void>;
  delete: (key: string) => Promise<void>;
  keys: () => Promise<string[]>;
};
