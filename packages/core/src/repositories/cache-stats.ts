import type { CacheEntry, CacheStoreStats, SourceCacheStats } from '@crosscheck/shared/src/types/cache.types.js';

export function payloadSize(entry: Pick<CacheEntry, 'payload'>): number {
  return Buffer.byteLength(JSON.stringify(entry.payload), 'utf-8');
}

export function summarizeEntries(
  entries: Iterable<Pick<CacheEntry, 'createdAt' | 'sourceTag'> & { readonly sizeBytes: number }>,
): CacheStoreStats {
  const bySource: Record<string, SourceCacheStats> = {};
  let entryCount = 0;
  let sizeBytes = 0;

  for (const entry of entries) {
    entryCount++;
    sizeBytes += entry.sizeBytes;
    const current = bySource[entry.sourceTag];
    bySource[entry.sourceTag] = current
      ? {
          entries: current.entries + 1,
          sizeBytes: current.sizeBytes + entry.sizeBytes,
          oldestCreatedAt:
            entry.createdAt < current.oldestCreatedAt ? entry.createdAt : current.oldestCreatedAt,
        }
      : { entries: 1, sizeBytes: entry.sizeBytes, oldestCreatedAt: entry.createdAt };
  }

  return { entryCount, sizeBytes, bySource };
}
