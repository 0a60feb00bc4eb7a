export { cacheOptionsSchema, parseCacheOptions } from './options.js';
export type { CacheConfig } from './options.js';
