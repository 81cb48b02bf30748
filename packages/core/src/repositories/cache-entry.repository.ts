import type { CacheEntry, CacheStoreStats } from '@crosscheck/shared/src/types/cache.types.js';

/** One storage tier of the response cache. Expiry is the caller's concern. */
export interface CacheEntryRepository {
  get(key: string): Promise<CacheEntry | null>;
  /**
   * Stores the entry unless the key already holds a newer one.
   * Resolves to whether the entry was written.
   */
  put(entry: CacheEntry): Promise<boolean>;
  delete(key: string): Promise<boolean>;
  /** Deletes every entry with the given tag, or all entries. Resolves to the removed keys. */
  deleteBySource(sourceTag?: string): Promise<readonly string[]>;
  stats(): Promise<CacheStoreStats>;
}
