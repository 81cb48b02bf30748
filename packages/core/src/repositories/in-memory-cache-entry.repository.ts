import type { CacheEntry, CacheStoreStats } from '@crosscheck/shared/src/types/cache.types.js';
import type { CacheEntryRepository } from './cache-entry.repository.js';
import { payloadSize, summarizeEntries } from './cache-stats.js';

export function createInMemoryCacheEntryRepository(): CacheEntryRepository {
  const entries = new Map<string, CacheEntry>();

  return {
    get(key: string): Promise<CacheEntry | null> {
      return Promise.resolve(entries.get(key) ?? null);
    },

    put(entry: CacheEntry): Promise<boolean> {
      const existing = entries.get(entry.key);
      if (existing && existing.createdAt.getTime() > entry.createdAt.getTime()) {
        return Promise.resolve(false);
      }
      entries.set(entry.key, Object.freeze({ ...entry }));
      return Promise.resolve(true);
    },

    delete(key: string): Promise<boolean> {
      return Promise.resolve(entries.delete(key));
    },

    deleteBySource(sourceTag?: string): Promise<readonly string[]> {
      const removed: string[] = [];
      for (const [key, entry] of entries) {
        if (sourceTag === undefined || entry.sourceTag === sourceTag) {
          removed.push(key);
        }
      }
      for (const key of removed) {
        entries.delete(key);
      }
      return Promise.resolve(removed);
    },

    stats(): Promise<CacheStoreStats> {
      return Promise.resolve(
        summarizeEntries(
          [...entries.values()].map((entry) => ({
            createdAt: entry.createdAt,
            sourceTag: entry.sourceTag,
            sizeBytes: payloadSize(entry),
          })),
        ),
      );
    },
  };
}
