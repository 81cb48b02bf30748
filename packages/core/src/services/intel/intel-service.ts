import type { AggregatedResult } from '@crosscheck/shared/src/types/aggregation.types.js';
import type { CacheStatus } from '@crosscheck/shared/src/types/cache.types.js';
import type { EntityMatch } from '@crosscheck/shared/src/types/entity.types.js';
import type { QueryParams, SourceStatus } from '@crosscheck/shared/src/types/source.types.js';
import { ResolutionError } from '@crosscheck/shared/src/utils/errors.js';
import { createChildLogger } from '@crosscheck/shared/src/logger.js';
import { withQueryParams } from '@crosscheck/schemas/src/query.schema.js';
import { hasUsableToken } from '../../entity/normalize.js';
import type { IntelService, IntelServiceDeps, SourceHealth } from './types.js';

const log = createChildLogger('intel-service');

export function createIntelService(deps: IntelServiceDeps): IntelService {
  const { gateway, cache, resolver, correlator } = deps;

  /** Query sent to sources once an entity is known: its label, with the canonical id to triangulate on. */
  function entityParams(params: QueryParams, match: EntityMatch): QueryParams {
    const altIdentifier = params.altIdentifier ?? match.canonicalId;
    return withQueryParams(params, {
      query: match.matchedLabel ?? params.query,
      ...(altIdentifier ? { altIdentifier } : {}),
    });
  }

  function sourceStatus(sourceId: string): SourceStatus;
  function sourceStatus(): readonly SourceStatus[];
  function sourceStatus(sourceId?: string): SourceStatus | readonly SourceStatus[] {
    return sourceId === undefined ? gateway.sourceStatus() : gateway.sourceStatus(sourceId);
  }

  return {
    async aggregate(params: QueryParams): Promise<AggregatedResult> {
      if (!params.isEntity) {
        return correlator.aggregate(params);
      }

      const match = await resolver.resolve({
        name: params.query,
        ...(params.altIdentifier ? { altId: params.altIdentifier } : {}),
      });

      if (match.tier !== 'failed') {
        log.info({ query: params.query, entityId: match.entityId, tier: match.tier }, 'Entity resolved');
        return correlator.aggregate(entityParams(params, match), { entity: match });
      }

      if (!hasUsableToken(params.query)) {
        throw new ResolutionError(`Could not resolve entity "${params.query}"`, match.suggestions);
      }

      log.info({ query: params.query }, 'Entity unresolved, querying as a topic');
      return correlator.aggregate(withQueryParams(params, { isEntity: false }), { entity: match });
    },

    resolveEntity(name: string, altId?: string): Promise<EntityMatch> {
      return resolver.resolve({ name, ...(altId ? { altId } : {}) });
    },

    cacheStatus(): Promise<CacheStatus> {
      return cache.status();
    },

    cacheClear(sourceTag?: string): Promise<number> {
      return cache.invalidate(sourceTag);
    },

    sourceStatus,

    async checkHealth(sourceId?: string): Promise<readonly SourceHealth[]> {
      const ids = sourceId === undefined ? gateway.listSources().map((s) => s.sourceId) : [sourceId];
      return Promise.all(
        ids.map(async (id) => {
          const healthy = await gateway.healthCheck(id);
          return { sourceId: id, healthy, checkedAt: new Date() };
        }),
      );
    },
  };
}
