import { z } from 'zod';

const RetryPolicySchema = z.object({
  maxAttempts: z.number().int().min(1).max(10).default(3),
  baseDelayMs: z.number().int().min(0).default(250),
  maxDelayMs: z.number().int().min(0).default(4000),
});

export type RetryPolicyConfig = z.infer<typeof RetryPolicySchema>;

const RateLimitSchema = z.object({
  capacity: z.number().int().min(1),
  refillPerSecond: z.number().positive(),
});

export type RateLimitConfig = z.infer<typeof RateLimitSchema>;

const SourcePolicySchema = z.object({
  ttlSeconds: z.number().int().min(0).optional(),
  callTimeoutMs: z.number().int().min(1).optional(),
  rateLimit: RateLimitSchema.optional(),
});

export type SourcePolicyConfig = z.infer<typeof SourcePolicySchema>;

const CacheConfigSchema = z.object({
  volatileHorizonSeconds: z.number().int().min(0).default(300),
  durableStore: z.enum(['memory', 'firestore']).default('memory'),
  collection: z.string().min(1).default('cache-entries'),
  defaultTtlSeconds: z.number().int().min(0).default(3600),
  noDataTtlSeconds: z.number().int().min(0).default(300),
});

const GatewayConfigSchema = z.object({
  callTimeoutMs: z.number().int().min(1).default(10_000),
  healthCheckTimeoutMs: z.number().int().min(1).default(5_000),
  rateLimitMaxWaitMs: z.number().int().min(0).default(2_000),
  retry: RetryPolicySchema.default({}),
});

const ResolverConfigSchema = z.object({
  canonicalSourceId: z.string().min(1).optional(),
  fuzzyThreshold: z.number().min(0).max(1).default(0.8),
  fuzzyMinConfidence: z.number().min(0).max(0.84).default(0.7),
  maxSuggestions: z.number().int().min(0).default(3),
});

const SelectorConfigSchema = z.object({
  minRelevance: z.number().min(0).max(1).default(0.3),
});

export const FactTypeSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('numeric'),
    /** Largest absolute difference still counted as agreement. */
    absoluteTolerance: z.number().min(0).default(0),
    /** Largest difference relative to the larger magnitude still counted as agreement. */
    relativeTolerance: z.number().min(0).max(1).default(0),
    aliases: z.array(z.string().min(1)).default([]),
  }),
  z.object({
    kind: z.literal('categorical'),
    aliases: z.array(z.string().min(1)).default([]),
  }),
]);

export type FactTypeConfig = z.infer<typeof FactTypeSchema>;

const DEFAULT_FACT_TYPES: Record<string, z.input<typeof FactTypeSchema>> = {
  status: { kind: 'categorical' },
  sanctioned: { kind: 'categorical', aliases: ['is_sanctioned'] },
  pep: { kind: 'categorical', aliases: ['is_pep'] },
  active: { kind: 'categorical', aliases: ['is_active'] },
  fatalities: { kind: 'numeric' },
  population: { kind: 'numeric', relativeTolerance: 0.02 },
  gdp: { kind: 'numeric', relativeTolerance: 0.05 },
  latitude: { kind: 'numeric', absoluteTolerance: 0.05, aliases: ['lat'] },
  longitude: { kind: 'numeric', absoluteTolerance: 0.05, aliases: ['lon'] },
};

const CorrelatorConfigSchema = z.object({
  maxSources: z.number().int().min(1).default(5),
  maxConcurrency: z.number().int().min(1).default(4),
  deadlineMs: z.number().int().min(1).default(20_000),
  graceMs: z.number().int().min(0).default(250),
  minViableSources: z.number().int().min(1).default(2),
  staleFallback: z.boolean().default(true),
  triangulationFactor: z.number().gt(0).max(1).default(0.75),
  qualifierFields: z
    .array(z.string().min(1))
    .default(['event_window', 'date', 'period', 'year', 'indicator', 'country']),
  factTypes: z.record(z.string().min(1), FactTypeSchema).default(DEFAULT_FACT_TYPES),
});

export const CrosscheckConfigSchema = z.object({
  cache: CacheConfigSchema.default({}),
  gateway: GatewayConfigSchema.default({}),
  sources: z.record(z.string().min(1), SourcePolicySchema).default({}),
  resolver: ResolverConfigSchema.default({}),
  selector: SelectorConfigSchema.default({}),
  correlator: CorrelatorConfigSchema.default({}),
});

export type CrosscheckConfig = z.infer<typeof CrosscheckConfigSchema>;
export type CacheConfig = CrosscheckConfig['cache'];
export type GatewayConfig = CrosscheckConfig['gateway'];
export type ResolverConfig = CrosscheckConfig['resolver'];
export type SelectorConfig = CrosscheckConfig['selector'];
export type CorrelatorConfig = CrosscheckConfig['correlator'];

/** Fully defaulted configuration, for tests and local runs. */
export function defaultCrosscheckConfig(): CrosscheckConfig {
  return CrosscheckConfigSchema.parse({});
}
