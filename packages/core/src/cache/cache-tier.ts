import type { CacheEntry, CacheReadResult, CacheStatus } from '@crosscheck/shared/src/types/cache.types.js';
import type { SourcePayload } from '@crosscheck/shared/src/types/source.types.js';
import { createChildLogger } from '@crosscheck/shared/src/logger.js';
import { PersistenceError } from '@crosscheck/shared/src/utils/errors.js';
import type { CacheEntryRepository } from '../repositories/cache-entry.repository.js';

const log = createChildLogger('cache');

export interface CacheGetOptions {
  readonly allowStale?: boolean;
}

export interface CacheTier {
  get(key: string, options?: CacheGetOptions): Promise<CacheReadResult | null>;
  set(key: string, payload: SourcePayload, ttlSeconds: number, sourceTag: string): Promise<void>;
  /** Removes entries for one source, or all entries. Resolves to the number of distinct keys removed. */
  invalidate(sourceTag?: string): Promise<number>;
  invalidateKey(key: string): Promise<boolean>;
  status(): Promise<CacheStatus>;
}

export interface CacheTierDeps {
  readonly volatile: CacheEntryRepository;
  readonly durable: CacheEntryRepository;
  readonly volatileHorizonSeconds: number;
  readonly now?: () => Date;
}

export function isExpired(createdAt: Date, ttlSeconds: number, now: Date): boolean {
  return createdAt.getTime() + ttlSeconds * 1000 < now.getTime();
}

export function createCacheTier(deps: CacheTierDeps): CacheTier {
  const { volatile, durable, volatileHorizonSeconds } = deps;
  const now = deps.now ?? ((): Date => new Date());
  // when each key entered the volatile tier
  const volatileStoredAt = new Map<string, number>();

  function withinHorizon(key: string, at: Date): boolean {
    const storedAt = volatileStoredAt.get(key);
    return storedAt !== undefined && at.getTime() - storedAt <= volatileHorizonSeconds * 1000;
  }

  async function readDurable(key: string): Promise<CacheEntry | null> {
    try {
      return await durable.get(key);
    } catch (error) {
      if (error instanceof PersistenceError) {
        log.warn({ key, err: error.message }, 'Durable cache read failed, treating as miss');
        return null;
      }
      throw error;
    }
  }

  return {
    async get(key: string, options: CacheGetOptions = {}): Promise<CacheReadResult | null> {
      const at = now();
      let entry = withinHorizon(key, at) ? await volatile.get(key) : null;

      if (!entry) {
        if (volatileStoredAt.has(key)) {
          await volatile.delete(key);
          volatileStoredAt.delete(key);
        }
        entry = await readDurable(key);
        if (entry) {
          await volatile.put(entry);
          volatileStoredAt.set(key, at.getTime());
        }
      }

      if (!entry) {
        return null;
      }

      const isStale = isExpired(entry.createdAt, entry.ttlSeconds, at);
      if (isStale && options.allowStale !== true) {
        return null;
      }

      return {
        payload: entry.payload,
        isStale,
        createdAt: entry.createdAt,
        sourceTag: entry.sourceTag,
      };
    },

    async set(key: string, payload: SourcePayload, ttlSeconds: number, sourceTag: string): Promise<void> {
      const entry = { key, payload, ttlSeconds, sourceTag, createdAt: now() };

      if (await volatile.put(entry)) {
        volatileStoredAt.set(key, entry.createdAt.getTime());
      }

      try {
        await durable.put(entry);
      } catch (error) {
        if (!(error instanceof PersistenceError)) {
          throw error;
        }
        log.warn({ key, err: error.message }, 'Durable cache write failed, entry kept in volatile tier only');
      }
    },

    async invalidate(sourceTag?: string): Promise<number> {
      const [fromVolatile, fromDurable] = await Promise.all([
        volatile.deleteBySource(sourceTag),
        durable.deleteBySource(sourceTag),
      ]);
      const removed = new Set([...fromVolatile, ...fromDurable]);
      for (const key of fromVolatile) {
        volatileStoredAt.delete(key);
      }
      log.info({ sourceTag: sourceTag ?? '*', removed: removed.size }, 'Cache invalidated');
      return removed.size;
    },

    async invalidateKey(key: string): Promise<boolean> {
      volatileStoredAt.delete(key);
      const [a, b] = await Promise.all([volatile.delete(key), durable.delete(key)]);
      return a || b;
    },

    async status(): Promise<CacheStatus> {
      const [volatileStats, durableStats] = await Promise.all([volatile.stats(), durable.stats()]);
      const at = now().getTime();
      const bySource = { ...volatileStats.bySource, ...durableStats.bySource };
      const oldestAgePerSource: Record<string, number> = {};
      for (const [sourceTag, stats] of Object.entries(bySource)) {
        oldestAgePerSource[sourceTag] = Math.max(0, Math.floor((at - stats.oldestCreatedAt.getTime()) / 1000));
      }

      return {
        entryCounts: { volatile: volatileStats.entryCount, durable: durableStats.entryCount },
        sizes: { volatile: volatileStats.sizeBytes, durable: durableStats.sizeBytes },
        oldestAgePerSource,
        bySource,
      };
    },
  };
}
