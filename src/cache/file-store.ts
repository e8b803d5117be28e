import { randomUUID } from 'node:crypto';
import { mkdir, readdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { CacheStore, StoredEntry } from '@/cache/store.ts';

const ENTRY_SUFFIX = '.json';

const isNotFound = (err: unknown): boolean => err instanceof Error && 'code' in err && err.code === 'ENOENT';

/**
 * One JSON file per key. Writes go to a unique temp file that is renamed over the target,
 * so concurrent readers see either the previous or the new record.
 */
export class FileCacheStore implements CacheStore {
  constructor(private readonly dir: string) {}

  private pathFor = (key: string): string => join(this.dir, `${encodeURIComponent(key)}${ENTRY_SUFFIX}`);

  read = async (key: string): Promise<unknown> => {
    let raw: string;
    try {
      raw = await readFile(this.pathFor(key), 'utf8');
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw err;
    }
    return JSON.parse(raw);
  };

  write = async (key: string, entry: StoredEntry): Promise<void> => {
    await mkdir(this.dir, { recursive: true });
    const target = this.pathFor(key);
    const temp = `${target}.${process.pid}.${randomUUID()}.tmp`;
    await writeFile(temp, JSON.stringify(entry, null, 2), 'utf8');
    try {
      await rename(temp, target);
    } catch (err) {
      await rm(temp, { force: true });
      throw err;
    }
  };

  delete = async (key: string): Promise<void> => {
    await rm(this.pathFor(key), { force: true });
  };

  keys = async (): Promise<string[]> => {
    let files: string[];
    try {
      files = await readdir(this.dir);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
    return files.filter((f) => f.endsWith(ENTRY_SUFFIX)).map((f) => decodeURIComponent(f.slice(0, -ENTRY_SUFFIX.length)));
  };
}
