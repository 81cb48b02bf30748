import { z } from 'zod';
import { SourceRecordSchema } from './source-payload.schema.js';

export const FixtureFailureSchema = z.enum([
  'rate_limited',
  'timeout',
  'upstream',
  'auth',
  'parse',
  'unknown',
]);

export const FixtureSourceSchema = z.object({
  id: z.string().min(1).regex(/^[a-z0-9][a-z0-9_-]*$/, 'must be lower-case kebab or snake case'),
  displayName: z.string().min(1),
  qualityTier: z.enum(['high', 'medium', 'low']),
  domains: z
    .array(z.enum(['news', 'economic', 'identity', 'sanctions', 'conflict', 'maritime', 'aviation']))
    .min(1),
  configured: z.boolean().default(true),
  healthy: z.boolean().default(true),
  latencyMs: z.number().int().min(0).default(0),
  /** Failure thrown on every fetch, for exercising degraded paths. */
  failWith: FixtureFailureSchema.optional(),
  sourceUrl: z.string().url().optional(),
  /** Records keyed by normalized query. */
  responses: z.record(z.string(), z.array(SourceRecordSchema)).default({}),
});

export type FixtureSourceDefinition = z.infer<typeof FixtureSourceSchema>;

export const SourceFixturesSchema = z
  .object({
    sources: z.array(FixtureSourceSchema),
  })
  .superRefine((fixtures, ctx) => {
    const seen = new Set<string>();
    fixtures.sources.forEach((source, index) => {
      if (seen.has(source.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['sources', index, 'id'],
          message: `Duplicate source id "${source.id}"`,
        });
      }
      seen.add(source.id);
    });
  });

export type SourceFixtures = z.infer<typeof SourceFixturesSchema>;
