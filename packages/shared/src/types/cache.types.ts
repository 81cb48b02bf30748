import type { SourcePayload } from './source.types.js';

export interface CacheEntry {
  readonly key: string;
  readonly payload: SourcePayload;
  readonly createdAt: Date;
  readonly ttlSeconds: number;
  readonly sourceTag: string;
}

export interface CacheReadResult {
  readonly payload: SourcePayload;
  readonly isStale: boolean;
  readonly createdAt: Date;
  readonly sourceTag: string;
}

export interface SourceCacheStats {
  readonly entries: number;
  readonly sizeBytes: number;
  readonly oldestCreatedAt: Date;
}

export interface CacheStoreStats {
  readonly entryCount: number;
  readonly sizeBytes: number;
  readonly bySource: Readonly<Record<string, SourceCacheStats>>;
}

export interface CacheStatus {
  readonly entryCounts: { readonly volatile: number; readonly durable: number };
  readonly sizes: { readonly volatile: number; readonly durable: number };
  /** Age in seconds of the oldest durable entry per source tag. */
  readonly oldestAgePerSource: Readonly<Record<string, number>>;
  readonly bySource: Readonly<Record<string, SourceCacheStats>>;
}
