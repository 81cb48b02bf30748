export * from './infrastructure/crosscheck-runtime.js';
export * from './services/intel/intel-service.js';
export type * from './services/intel/types.js';
export * from './correlation/correlator.js';
export * from './entity/entity-resolver.js';
export * from './selection/source-selector.js';
export * from './selection/query-classifier.js';
export * from './gateway/adapter-gateway.js';
export * from './gateway/source-registry.js';
export type * from './gateway/types.js';
export * from './cache/cache-tier.js';
export * from './cache/cache-key.js';
export * from './sources/fixture-source-adapter.js';
