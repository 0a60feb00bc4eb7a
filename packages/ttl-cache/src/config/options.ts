/**
 * Validation of cache configuration loaded from untrusted sources
 * (environment variables, JSON files).
 *
 * @packageDocumentation
 */

import { ok, err, type Result } from 'neverthrow';
import { z } from 'zod';
import { createInvalidOptionsError } from '../cache/errors.js';
import { MAX_SWEEP_INTERVAL_MS } from '../cache/ttl-cache.js';
import type { CacheError } from '../cache/types.js';

// Blank strings (an empty env var) are rejected instead of coercing to 0
const durationMs = (maxMs: number) =>
  z
    .union([z.number(), z.string().trim().min(1, 'must not be blank')])
    .pipe(z.coerce.number().finite().nonnegative().max(maxMs));

/**
 * Schema for the two cache durations. Numeric strings are accepted; a sweep
 * interval above MAX_SWEEP_INTERVAL_MS is rejected.
 */
export const cacheOptionsSchema = z.object({
  defaultTtlMs: durationMs(Number.MAX_SAFE_INTEGER).default(0),
  sweepIntervalMs: durationMs(MAX_SWEEP_INTERVAL_MS).default(0),
});

/**
 * Validated cache durations, ready to spread into `createTtlCache` options.
 */
export type CacheConfig = z.infer<typeof cacheOptionsSchema>;

/**
 * Validates raw configuration input.
 *
 * @param input - Untrusted configuration object
 * @returns Result with the parsed durations or an INVALID_OPTIONS error
 *
 * @example
 * ```typescript
 * const config = parseCacheOptions({ defaultTtlMs: process.env['CACHE_TTL_MS'] });
 * if (config.isOk()) {
 *   const cache = createTtlCache<string>(config.value);
 * }
 * ```
 */
export const parseCacheOptions = (input: unknown): Result<CacheConfig, CacheError> => {
  const parsed = cacheOptionsSchema.safeParse(input);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    return err(createInvalidOptionsError(details, parsed.error));
  }

  return ok(parsed.data);
};
