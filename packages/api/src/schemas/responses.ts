import { z } from '@hono/zod-openapi';

export const ErrorResponseSchema = z
  .object({
    error: z.string(),
    code: z.string(),
    requestId: z.string(),
    details: z.array(z.string()).optional(),
  })
  .openapi('ErrorResponse');

// Health
export const HealthResponseSchema = z
  .object({
    status: z.literal('ok'),
    version: z.string(),
    sources: z.object({ total: z.number(), configured: z.number() }),
  })
  .openapi('HealthResponse');

// Queries
const ConfidenceBandSchema = z.enum(['remote', 'unlikely', 'roughly_even', 'likely', 'very_likely', 'almost_certain']);
const ClaimValueSchema = z.union([z.string(), z.number(), z.boolean()]);
const ProvenanceSchema = z.enum(['direct', 'triangulated']);
const QualityTierSchema = z.enum(['high', 'medium', 'low']);
const FailureKindSchema = z.enum(['rate_limited', 'timeout', 'upstream', 'auth', 'parse', 'unknown']);
const ResolutionTierSchema = z.enum(['exact', 'normalized', 'canonical', 'fuzzy', 'failed']);

export const FindingSchema = z
  .object({
    id: z.string(),
    subject: z.string(),
    attribute: z.string(),
    value: ClaimValueSchema,
    sources: z.array(z.string()),
    corroboration: z.array(z.string()),
    conflict: z.array(z.object({ sourceId: z.string(), value: ClaimValueSchema })),
    status: z.enum(['corroborated', 'single_source', 'conflicting']),
    confidence: ConfidenceBandSchema,
    provenance: ProvenanceSchema,
    stale: z.boolean(),
    suggestedAuthority: z.string().optional(),
    resolutionNote: z.string().optional(),
  })
  .openapi('Finding');

export const ConfidenceAssessmentSchema = z
  .object({
    band: ConfidenceBandSchema,
    score: z.number(),
    label: z.string(),
    reasoning: z.string(),
    keyFactors: z.array(z.string()),
  })
  .openapi('ConfidenceAssessment');

export const EntityMatchResponseSchema = z
  .object({
    originalQuery: z.string(),
    entityId: z.string().optional(),
    canonicalId: z.string().optional(),
    matchedLabel: z.string().optional(),
    kind: z.enum(['person', 'organization', 'country', 'vessel', 'aircraft', 'other']).optional(),
    tier: ResolutionTierSchema,
    confidence: z.number(),
    evaluatedTiers: z.array(ResolutionTierSchema),
    suggestions: z.array(z.string()),
  })
  .openapi('EntityMatch');

export const QueryResponseSchema = z
  .object({
    query: z.string(),
    queryKind: z.enum(['topic', 'entity', 'country', 'person', 'organization', 'vessel', 'aircraft']),
    entity: EntityMatchResponseSchema.optional(),
    findings: z.array(FindingSchema),
    confidence: ConfidenceAssessmentSchema,
    sourcesConsulted: z.array(
      z.object({
        sourceId: z.string(),
        outcome: z.enum(['success', 'no_data']),
        qualityTier: QualityTierSchema,
        provenance: ProvenanceSchema,
        fromCache: z.boolean(),
        stale: z.boolean(),
        recordCount: z.number(),
        fetchedAt: z.string(),
        sourceUrl: z.string().optional(),
      }),
    ),
    sourcesSkipped: z.array(
      z.object({
        sourceId: z.string(),
        reason: z.enum(['unavailable', 'rate_limited', 'timeout', 'errored']),
        failureKind: FailureKindSchema.optional(),
        explanation: z.string(),
      }),
    ),
    triangulation: z.object({
      triggered: z.boolean(),
      status: z.enum(['not_needed', 'matched', 'exhausted']),
      sourcesQueried: z.array(z.string()),
    }),
    degraded: z.boolean(),
    suggestions: z.array(z.string()),
    durationMs: z.number(),
    completedAt: z.string(),
  })
  .openapi('QueryResponse');

// Cache
export const CacheStatusResponseSchema = z
  .object({
    entryCounts: z.object({ volatile: z.number(), durable: z.number() }),
    sizes: z.object({ volatile: z.number(), durable: z.number() }),
    oldestAgePerSource: z.record(z.string(), z.number()),
    bySource: z.record(
      z.string(),
      z.object({ entries: z.number(), sizeBytes: z.number(), oldestCreatedAt: z.string() }),
    ),
  })
  .openapi('CacheStatus');

export const CacheClearResponseSchema = z
  .object({
    removed: z.number(),
    source: z.string().nullable(),
  })
  .openapi('CacheClearResponse');

// Sources
export const SourceStatusResponseSchema = z
  .object({
    sourceId: z.string(),
    displayName: z.string(),
    configured: z.boolean(),
    lastHealthCheck: z.object({ healthy: z.boolean(), checkedAt: z.string() }).nullable(),
    lastLatencyMs: z.number().nullable(),
    lastSuccessAt: z.string().nullable(),
    lastFailure: z.object({ kind: FailureKindSchema, at: z.string() }).nullable(),
  })
  .openapi('SourceStatus');

export const SourceListResponseSchema = z
  .object({
    sources: z.array(SourceStatusResponseSchema),
  })
  .openapi('SourceList');

export const SourceHealthResponseSchema = z
  .object({
    sourceId: z.string(),
    healthy: z.boolean(),
    checkedAt: z.string(),
  })
  .openapi('SourceHealth');

export type QueryResponse = z.infer<typeof QueryResponseSchema>;
export type EntityMatchResponse = z.infer<typeof EntityMatchResponseSchema>;
export type CacheStatusResponse = z.infer<typeof CacheStatusResponseSchema>;
export type SourceStatusResponse = z.infer<typeof SourceStatusResponseSchema>;
