import type { AggregatedResult } from '@crosscheck/shared/src/types/aggregation.types.js';
import type { CacheStatus } from '@crosscheck/shared/src/types/cache.types.js';
import type { EntityMatch } from '@crosscheck/shared/src/types/entity.types.js';
import type { SourceStatus } from '@crosscheck/shared/src/types/source.types.js';
import type {
  CacheStatusResponse,
  EntityMatchResponse,
  QueryResponse,
  SourceStatusResponse,
} from './schemas/responses.js';

export function toEntityMatchResponse(match: EntityMatch): EntityMatchResponse {
  return {
    ...match,
    evaluatedTiers: [...match.evaluatedTiers],
    suggestions: [...match.suggestions],
  };
}

export function toQueryResponse(result: AggregatedResult): QueryResponse {
  return {
    query: result.query,
    queryKind: result.queryKind,
    ...(result.entity ? { entity: toEntityMatchResponse(result.entity) } : {}),
    findings: result.findings.map((finding) => ({
      ...finding,
      sources: [...finding.sources],
      corroboration: [...finding.corroboration],
      conflict: finding.conflict.map((c) => ({ ...c })),
    })),
    confidence: { ...result.confidence, keyFactors: [...result.confidence.keyFactors] },
    sourcesConsulted: result.sourcesConsulted.map((s) => ({ ...s, fetchedAt: s.fetchedAt.toISOString() })),
    sourcesSkipped: result.sourcesSkipped.map((s) => ({ ...s })),
    triangulation: { ...result.triangulation, sourcesQueried: [...result.triangulation.sourcesQueried] },
    degraded: result.degraded,
    suggestions: [...result.suggestions],
    durationMs: result.durationMs,
    completedAt: result.completedAt.toISOString(),
  };
}

export function toCacheStatusResponse(status: CacheStatus): CacheStatusResponse {
  return {
    entryCounts: { ...status.entryCounts },
    sizes: { ...status.sizes },
    oldestAgePerSource: { ...status.oldestAgePerSource },
    bySource: Object.fromEntries(
      Object.entries(status.bySource).map(([sourceTag, stats]) => [
        sourceTag,
        { entries: stats.entries, sizeBytes: stats.sizeBytes, oldestCreatedAt: stats.oldestCreatedAt.toISOString() },
      ]),
    ),
  };
}

export function toSourceStatusResponse(status: SourceStatus): SourceStatusResponse {
  return {
    sourceId: status.sourceId,
    displayName: status.displayName,
    configured: status.configured,
    lastHealthCheck: status.lastHealthCheck
      ? { healthy: status.lastHealthCheck.healthy, checkedAt: status.lastHealthCheck.checkedAt.toISOString() }
      : null,
    lastLatencyMs: status.lastLatencyMs,
    lastSuccessAt: status.lastSuccessAt?.toISOString() ?? null,
    lastFailure: status.lastFailure
      ? { kind: status.lastFailure.kind, at: status.lastFailure.at.toISOString() }
      : null,
  };
}
