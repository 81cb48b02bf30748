export * from './crosscheck-config.schema.js';
export * from './entity-registry.schema.js';
export * from './lexicon.schema.js';
export * from './source-payload.schema.js';
export * from './source-fixtures.schema.js';
export * from './query.schema.js';
export * from './validators.js';
export * from './config-loader.js';
