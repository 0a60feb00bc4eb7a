/**
 * Example App Configuration Module
 *
 * @packageDocumentation
 */

import { parseCacheOptions, type CacheConfig } from 'ttl-sweep-cache';

/**
 * Settings the example reads from its environment.
 */
export interface ExampleConfig {
  /** Durations passed to the cache */
  readonly cache: CacheConfig;
  /** Print cache diagnostics to stderr */
  readonly debug: boolean;
}

/**
 * Creates the example configuration from environment variables.
 *
 * Optional env vars:
 * - CACHE_DEFAULT_TTL_MS: TTL for items stored without one (default: 1000)
 * - CACHE_SWEEP_INTERVAL_MS: Background sweep interval, 0 disables it (default: 250)
 * - CACHE_DEBUG: "true" or "1" enables diagnostics (default: off)
 */
export function createExampleConfig(env: NodeJS.ProcessEnv = process.env): ExampleConfig {
  const cache = parseCacheOptions({
    defaultTtlMs: env['CACHE_DEFAULT_TTL_MS'] ?? '1000',
    sweepIntervalMs: env['CACHE_SWEEP_INTERVAL_MS'] ?? '250',
  });

  if (cache.isErr()) {
    throw new Error(`Invalid cache configuration: ${cache.error.message}`);
  }

  const debugFlag = env['CACHE_DEBUG'];

  return {
    cache: cache.value,
    debug: debugFlag === 'true' || debugFlag === '1',
  };
}
