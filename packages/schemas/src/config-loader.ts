import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigurationError } from '@crosscheck/shared/src/utils/errors.js';
import {
  validateCrosscheckConfig,
  validateEntityRegistry,
  validateLexicon,
  validateSourceFixtures,
} from './validators.js';
import type { CrosscheckConfig } from './crosscheck-config.schema.js';
import type { EntityRegistry } from './entity-registry.schema.js';
import type { Lexicon } from './lexicon.schema.js';
import type { SourceFixtures } from './source-fixtures.schema.js';

export interface AppConfig {
  readonly settings: CrosscheckConfig;
  readonly registry: EntityRegistry;
  readonly lexicon: Lexicon;
  readonly fixtures: SourceFixtures;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content) as unknown;
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigurationError(`Invalid JSON in ${filePath}: ${error.message}`);
    }
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new ConfigurationError(`Configuration file not found: ${filePath}`);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Failed to read configuration file ${filePath}: ${message}`);
  }
}

export async function loadConfig(configDir: string): Promise<AppConfig> {
  const [settingsRaw, registryRaw, lexiconRaw, fixturesRaw] = await Promise.all([
    readJsonFile(join(configDir, 'crosscheck.json')),
    readJsonFile(join(configDir, 'entities.json')),
    readJsonFile(join(configDir, 'lexicon.json')),
    readJsonFile(join(configDir, 'sources.json')),
  ]);

  return {
    settings: validateCrosscheckConfig(settingsRaw),
    registry: validateEntityRegistry(registryRaw),
    lexicon: validateLexicon(lexiconRaw),
    fixtures: validateSourceFixtures(fixturesRaw),
  };
}
