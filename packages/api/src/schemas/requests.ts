import { z } from '@hono/zod-openapi';

const SourceIdListSchema = z.array(z.string().min(1)).max(50);

export const QueryRequestSchema = z
  .object({
    query: z.string().min(1).max(500).openapi({ example: 'Gazprom' }),
    timeWindow: z
      .object({
        start: z.string().openapi({ format: 'date-time', example: '2024-01-01T00:00:00Z' }),
        end: z.string().openapi({ format: 'date-time', example: '2024-06-30T23:59:59Z' }),
      })
      .optional(),
    includeSources: SourceIdListSchema.optional(),
    excludeSources: SourceIdListSchema.optional(),
    altIdentifier: z.string().min(1).optional().openapi({ example: 'Q102673' }),
    maxResultsPerSource: z.number().int().min(1).max(100).optional(),
    isEntity: z.boolean().optional(),
  })
  .openapi('QueryRequest');

export type QueryRequest = z.infer<typeof QueryRequestSchema>;

export const ResolveEntityRequestSchema = z
  .object({
    name: z.string().min(1).max(500).openapi({ example: 'Vladimir Putin' }),
    altId: z.string().min(1).optional(),
  })
  .openapi('ResolveEntityRequest');

export const CacheClearQuerySchema = z.object({
  source: z.string().min(1).optional().openapi({ description: 'Clear only entries of this source' }),
});

export const SourceParamsSchema = z.object({
  sourceId: z.string().min(1).openapi({ param: { name: 'sourceId', in: 'path' }, example: 'sanctions-registry' }),
});
