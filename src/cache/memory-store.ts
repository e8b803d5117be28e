import type { CacheStore, StoredEntry } from '@/cache/store.ts';

/** In-process store for tests and ephemeral runs. Values are copied on the way in and out. */
export class MemoryCacheStore implements CacheStore {
  private entries = new Map<string, StoredEntry>();

  read = async (key: string): Promise<unknown> => {
    const entry = this.entries.get(key);
    return entry === undefined ? undefined : structuredClone(entry);
  };

  write = async (key: string, entry: StoredEntry): Promise<void> => {
    this.entries.set(key, structuredClone(entry));
  };

  delete = async (key: string): Promise<void> => {
    this.entries.delete(key);
  };

  keys = async (): Promise<string[]> => [...this.entries.keys()];
}
