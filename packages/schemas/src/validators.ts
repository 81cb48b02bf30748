import type { ZodError } from 'zod';
import { SchemaValidationError } from '@crosscheck/shared/src/utils/errors.js';
import { CrosscheckConfigSchema } from './crosscheck-config.schema.js';
import type { CrosscheckConfig } from './crosscheck-config.schema.js';
import { EntityRegistrySchema } from './entity-registry.schema.js';
import type { EntityRegistry } from './entity-registry.schema.js';
import { LexiconSchema } from './lexicon.schema.js';
import type { Lexicon } from './lexicon.schema.js';
import { SourceFixturesSchema } from './source-fixtures.schema.js';
import type { SourceFixtures } from './source-fixtures.schema.js';

export function formatZodErrors(error: ZodError): readonly string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

export function validateCrosscheckConfig(data: unknown): CrosscheckConfig {
  const result = CrosscheckConfigSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid crosscheck configuration', formatZodErrors(result.error));
  }

  return result.data;
}

export function validateEntityRegistry(data: unknown): EntityRegistry {
  const result = EntityRegistrySchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid entity registry', formatZodErrors(result.error));
  }

  return result.data;
}

export function validateLexicon(data: unknown): Lexicon {
  const result = LexiconSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid lexicon', formatZodErrors(result.error));
  }

  return result.data;
}

export function validateSourceFixtures(data: unknown): SourceFixtures {
  const result = SourceFixturesSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid source fixtures', formatZodErrors(result.error));
  }

  return result.data;
}
