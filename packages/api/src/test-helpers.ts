import type { OpenAPIHono } from '@hono/zod-openapi';
import type { AppConfig as CrosscheckAppConfig } from '@crosscheck/schemas/src/config-loader.js';
import { CrosscheckConfigSchema } from '@crosscheck/schemas/src/crosscheck-config.schema.js';
import { EntityRegistrySchema } from '@crosscheck/schemas/src/entity-registry.schema.js';
import { LexiconSchema } from '@crosscheck/schemas/src/lexicon.schema.js';
import { SourceFixturesSchema } from '@crosscheck/schemas/src/source-fixtures.schema.js';
import { createCrosscheckRuntime } from '@crosscheck/core/src/infrastructure/crosscheck-runtime.js';
import type { CrosscheckRuntime } from '@crosscheck/core/src/infrastructure/crosscheck-runtime.js';
import { createApp } from './app.js';
import type { AppEnv } from './types.js';

export const TEST_JWT_SECRET = 'test-secret';

/** Small in-memory configuration with three fixture sources. */
export function testConfig(): CrosscheckAppConfig {
  return {
    settings: CrosscheckConfigSchema.parse({
      gateway: { retry: { maxAttempts: 1 } },
    }),
    registry: EntityRegistrySchema.parse({
      entities: [{ id: 'gazprom', label: 'Gazprom', names: ['gazprom'], kind: 'organization', canonicalId: 'Q102673' }],
    }),
    lexicon: LexiconSchema.parse({ countries: ['sudan'] }),
    fixtures: SourceFixturesSchema.parse({
      sources: [
        {
          id: 'sanctions-registry',
          displayName: 'Sanctions Registry',
          qualityTier: 'high',
          domains: ['sanctions'],
          responses: { gazprom: [{ subject: 'gazprom', sanctioned: true }] },
        },
        {
          id: 'news-events',
          displayName: 'News Events',
          qualityTier: 'medium',
          domains: ['news'],
          responses: { gazprom: [{ subject: 'gazprom', sanctioned: true }] },
        },
        {
          id: 'vessel-positions',
          displayName: 'Vessel Positions',
          qualityTier: 'medium',
          domains: ['maritime'],
          configured: false,
        },
      ],
    }),
  };
}

export interface TestApp {
  readonly app: OpenAPIHono<AppEnv>;
  readonly runtime: CrosscheckRuntime;
}

/** App over fixture sources and in-memory cache tiers, optionally with auth on. */
export function createTestApp(options: { readonly jwtSecret?: string } = {}): TestApp {
  const runtime = createCrosscheckRuntime(testConfig());
  const app = createApp({
    service: runtime.service,
    ...(options.jwtSecret ? { jwtSecret: options.jwtSecret } : {}),
  });
  return { app, runtime };
}
