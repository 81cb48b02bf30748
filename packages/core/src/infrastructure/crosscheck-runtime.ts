import type { Firestore } from '@google-cloud/firestore';
import type { AppConfig } from '@crosscheck/schemas/src/config-loader.js';
import { createChildLogger } from '@crosscheck/shared/src/logger.js';
import { createCacheTier } from '../cache/cache-tier.js';
import type { CacheTier } from '../cache/cache-tier.js';
import { createCorrelator } from '../correlation/correlator.js';
import { createEntityResolver } from '../entity/entity-resolver.js';
import { createAdapterGateway } from '../gateway/adapter-gateway.js';
import { createSourceRegistry } from '../gateway/source-registry.js';
import type { AdapterGateway, SourceAdapter } from '../gateway/types.js';
import type { CacheEntryRepository } from '../repositories/cache-entry.repository.js';
import { createInMemoryCacheEntryRepository } from '../repositories/in-memory-cache-entry.repository.js';
import { createQueryClassifier } from '../selection/query-classifier.js';
import { createSourceSelector } from '../selection/source-selector.js';
import { createIntelService } from '../services/intel/intel-service.js';
import type { IntelService } from '../services/intel/types.js';
import { createFixtureSourceAdapters } from '../sources/fixture-source-adapter.js';
import { createFirestoreCacheEntryRepository } from './firestore-cache-entry.repository.js';
import { createFirestoreClient } from './firestore-client.js';

const log = createChildLogger('runtime');

export interface RuntimeOptions {
  /** Live adapters; the fixture sources from the config directory are used when omitted. */
  readonly adapters?: readonly SourceAdapter[];
  readonly durable?: CacheEntryRepository;
  readonly db?: Firestore;
}

export interface CrosscheckRuntime {
  readonly service: IntelService;
  readonly gateway: AdapterGateway;
  readonly cache: CacheTier;
}

function durableStore(config: AppConfig, options: RuntimeOptions): CacheEntryRepository {
  if (options.durable) {
    return options.durable;
  }
  const { durableStore: kind, collection } = config.settings.cache;
  if (kind === 'firestore') {
    return createFirestoreCacheEntryRepository(options.db ?? createFirestoreClient(), collection);
  }
  return createInMemoryCacheEntryRepository();
}

/** Wires cache, gateway, resolver, selector and correlator behind one service. */
export function createCrosscheckRuntime(config: AppConfig, options: RuntimeOptions = {}): CrosscheckRuntime {
  const { settings } = config;
  const adapters = options.adapters ?? createFixtureSourceAdapters(config.fixtures.sources);

  const cache = createCacheTier({
    volatile: createInMemoryCacheEntryRepository(),
    durable: durableStore(config, options),
    volatileHorizonSeconds: settings.cache.volatileHorizonSeconds,
  });

  const gateway = createAdapterGateway({
    registry: createSourceRegistry(adapters),
    cache,
    gateway: settings.gateway,
    cacheConfig: settings.cache,
    sources: settings.sources,
  });

  const resolver = createEntityResolver({
    entities: config.registry.entities,
    config: settings.resolver,
    gateway,
  });

  const selector = createSourceSelector({
    gateway,
    classifier: createQueryClassifier(config.lexicon),
    config: settings.selector,
  });

  const correlator = createCorrelator({ gateway, selector, config: settings.correlator });

  log.info(
    { sources: gateway.listSources().length, durableStore: settings.cache.durableStore },
    'Runtime created',
  );

  return {
    service: createIntelService({ gateway, cache, resolver, correlator }),
    gateway,
    cache,
  };
}
