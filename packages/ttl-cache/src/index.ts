/**
 * ttl-sweep-cache - in-process key-value cache with per-item TTL
 *
 * @packageDocumentation
 */

// ============================================================================
// CORE: Cache
// ============================================================================

export {
  createTtlCache,
  DEFAULT_EXPIRATION,
  NO_EXPIRATION,
  MAX_SWEEP_INTERVAL_MS,
  // Errors
  createNotFoundError,
  isCacheError,
} from './cache/index.js';
export type {
  Cache,
  CacheItem,
  CacheOptions,
  CacheError,
  CacheErrorCode,
  EvictionListener,
} from './cache/index.js';

// ============================================================================
// Configuration
// ============================================================================

export { cacheOptionsSchema, parseCacheOptions } from './config/index.js';
export type { CacheConfig } from './config/index.js';

// ============================================================================
// Logging
// ============================================================================

export { createConsoleLogger, silentLogger } from './logging/index.js';
export type { CacheLogger } from './logging/index.js';
