import { z } from 'zod';
import type { QueryParams } from '@crosscheck/shared/src/types/source.types.js';
import { SchemaValidationError } from '@crosscheck/shared/src/utils/errors.js';
import { formatZodErrors } from './validators.js';

const SourceIdListSchema = z.array(z.string().min(1)).max(50);

export const TimeWindowSchema = z
  .object({
    start: z.coerce.date(),
    end: z.coerce.date(),
  })
  .refine((window) => window.start.getTime() <= window.end.getTime(), {
    message: 'start must not be after end',
    path: ['start'],
  });

export const QueryParamsSchema = z.object({
  query: z
    .string()
    .trim()
    .min(1, 'query must not be empty')
    .max(500),
  timeWindow: TimeWindowSchema.optional(),
  includeSources: SourceIdListSchema.optional(),
  excludeSources: SourceIdListSchema.optional(),
  altIdentifier: z.string().trim().min(1).max(200).optional(),
  maxResultsPerSource: z.number().int().min(1).max(100).default(10),
  isEntity: z.boolean().default(false),
});

export type QueryParamsInput = z.input<typeof QueryParamsSchema>;

/**
 * Validates raw query input and returns an immutable `QueryParams`.
 * Throws `SchemaValidationError` on invalid input.
 */
export function createQueryParams(input: unknown): QueryParams {
  const result = QueryParamsSchema.safeParse(input);

  if (!result.success) {
    throw new SchemaValidationError('Invalid query parameters', formatZodErrors(result.error));
  }

  const { query, timeWindow, includeSources, excludeSources, altIdentifier } = result.data;

  return Object.freeze({
    query,
    maxResultsPerSource: result.data.maxResultsPerSource,
    isEntity: result.data.isEntity,
    ...(timeWindow ? { timeWindow: Object.freeze({ ...timeWindow }) } : {}),
    ...(includeSources ? { includeSources: Object.freeze([...includeSources]) } : {}),
    ...(excludeSources ? { excludeSources: Object.freeze([...excludeSources]) } : {}),
    ...(altIdentifier ? { altIdentifier } : {}),
  });
}

/** Copy of `params` with some fields replaced, validated and frozen again. */
export function withQueryParams(params: QueryParams, changes: Partial<QueryParams>): QueryParams {
  return createQueryParams({ ...params, ...changes });
}
