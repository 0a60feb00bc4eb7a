/**
 * TTL cache with lazy expiration and periodic sweeping.
 *
 * @packageDocumentation
 */

export { createTtlCache, DEFAULT_EXPIRATION, MAX_SWEEP_INTERVAL_MS, NO_EXPIRATION } from './ttl-cache.js';
export { createNotFoundError, isCacheError } from './errors.js';
export type {
  Cache,
  CacheItem,
  CacheOptions,
  CacheError,
  CacheErrorCode,
  EvictionListener,
} from './types.js';
