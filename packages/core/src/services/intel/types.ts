import type { AggregatedResult } from '@crosscheck/shared/src/types/aggregation.types.js';
import type { CacheStatus } from '@crosscheck/shared/src/types/cache.types.js';
import type { EntityMatch } from '@crosscheck/shared/src/types/entity.types.js';
import type { QueryParams, SourceStatus } from '@crosscheck/shared/src/types/source.types.js';
import type { CacheTier } from '../../cache/cache-tier.js';
import type { Correlator } from '../../correlation/correlator.js';
import type { EntityResolver } from '../../entity/entity-resolver.js';
import type { AdapterGateway } from '../../gateway/types.js';

export interface IntelServiceDeps {
  readonly gateway: AdapterGateway;
  readonly cache: CacheTier;
  readonly resolver: EntityResolver;
  readonly correlator: Correlator;
}

export interface SourceHealth {
  readonly sourceId: string;
  readonly healthy: boolean;
  readonly checkedAt: Date;
}

export interface IntelService {
  aggregate(params: QueryParams): Promise<AggregatedResult>;
  resolveEntity(name: string, altId?: string): Promise<EntityMatch>;
  cacheStatus(): Promise<CacheStatus>;
  /** Resolves to the number of cache keys removed. */
  cacheClear(sourceTag?: string): Promise<number>;
  sourceStatus(sourceId: string): SourceStatus;
  sourceStatus(): readonly SourceStatus[];
  checkHealth(sourceId?: string): Promise<readonly SourceHealth[]>;
}
