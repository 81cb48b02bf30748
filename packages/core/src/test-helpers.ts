import type { z } from 'zod';
import { defaultCrosscheckConfig } from '@crosscheck/schemas/src/crosscheck-config.schema.js';
import type { CrosscheckConfig, SourcePolicyConfig } from '@crosscheck/schemas/src/crosscheck-config.schema.js';
import { FixtureSourceSchema } from '@crosscheck/schemas/src/source-fixtures.schema.js';
import { createCacheTier } from './cache/cache-tier.js';
import type { CacheTier } from './cache/cache-tier.js';
import { createInMemoryCacheEntryRepository } from './repositories/in-memory-cache-entry.repository.js';
import { createAdapterGateway } from './gateway/adapter-gateway.js';
import { createSourceRegistry } from './gateway/source-registry.js';
import { createManualScheduler } from './gateway/test-scheduler.js';
import type { ManualScheduler } from './gateway/test-scheduler.js';
import type { AdapterGateway, SourceAdapter } from './gateway/types.js';
import { createFixtureSourceAdapter } from './sources/fixture-source-adapter.js';
import type { FixtureSourceAdapter } from './sources/fixture-source-adapter.js';

export type FixtureInput = z.input<typeof FixtureSourceSchema>;

export interface TestGateway {
  readonly gateway: AdapterGateway;
  readonly cache: CacheTier;
  readonly scheduler: ManualScheduler;
  readonly adapters: ReadonlyMap<string, FixtureSourceAdapter>;
  readonly config: CrosscheckConfig;
}

export function fixtureSource(input: FixtureInput): FixtureSourceAdapter {
  return createFixtureSourceAdapter(FixtureSourceSchema.parse(input));
}

export interface TestGatewayOptions {
  /** Clock for cache expiry. */
  readonly now?: () => Date;
  readonly sources?: Readonly<Record<string, SourcePolicyConfig>>;
}

/** Gateway over fixture sources with in-memory cache tiers and instant retries. */
export function createTestGateway(
  fixtures: readonly FixtureInput[],
  extraAdapters: readonly SourceAdapter[] = [],
  options: TestGatewayOptions = {},
): TestGateway {
  const config = defaultCrosscheckConfig();
  const scheduler = createManualScheduler();
  const adapters = new Map<string, FixtureSourceAdapter>();
  for (const input of fixtures) {
    const adapter = createFixtureSourceAdapter(FixtureSourceSchema.parse(input), { scheduler });
    adapters.set(adapter.identify().sourceId, adapter);
  }

  const cache = createCacheTier({
    volatile: createInMemoryCacheEntryRepository(),
    durable: createInMemoryCacheEntryRepository(),
    volatileHorizonSeconds: config.cache.volatileHorizonSeconds,
    ...(options.now ? { now: options.now } : {}),
  });

  const gateway = createAdapterGateway({
    registry: createSourceRegistry([...adapters.values(), ...extraAdapters]),
    cache,
    gateway: { ...config.gateway, retry: { maxAttempts: 2, baseDelayMs: 10, maxDelayMs: 50 } },
    cacheConfig: config.cache,
    ...(options.sources ? { sources: options.sources } : {}),
    scheduler,
    random: () => 0,
  });

  return { gateway, cache, scheduler, adapters, config };
}
