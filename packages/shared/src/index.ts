export * from './logger.js';
export * from './utils/errors.js';
export * from './utils/math.js';
export type * from './types/source.types.js';
export type * from './types/cache.types.js';
export type * from './types/entity.types.js';
export type * from './types/aggregation.types.js';
export * from './utils/records.js';
