import { ok, err, type Result } from 'neverthrow';
import { silentLogger } from '../logging/logger.js';
import { createNotFoundError } from './errors.js';
import type { Cache, CacheError, CacheItem, CacheOptions } from './types.js';

/** Pass as `ttlMs` to use the cache's default TTL */
export const DEFAULT_EXPIRATION = 0;

/** Pass as `ttlMs` to store an item that never expires */
export const NO_EXPIRATION = -1;

/** Longest delay a Node.js timer accepts; larger sweep intervals are capped to it */
export const MAX_SWEEP_INTERVAL_MS = 2_147_483_647;

/**
 * Non-finite durations (NaN, Infinity) are treated as 0.
 */
const toDuration = (value: number | undefined): number =>
  value !== undefined && Number.isFinite(value) ? value : 0;

const hasExpired = (item: CacheItem<unknown>, now: number): boolean =>
  item.expiresAt > 0 && now > item.expiresAt;

/**
 * Creates an in-memory cache with per-item TTL and an optional background sweep.
 *
 * Expired items are hidden on read straight away. They stay stored (and
 * counted) until the sweep removes them, or until they are deleted or
 * overwritten. Without a sweep interval nothing is removed proactively.
 *
 * Every operation runs to completion on the event loop, so reads and writes
 * never interleave and the map needs no further locking.
 *
 * @param options - TTL, sweep interval and lifecycle hooks
 * @returns A Cache instance
 *
 * @example
 * ```typescript
 * const cache = createTtlCache<string>({ defaultTtlMs: 60_000, sweepIntervalMs: 10_000 });
 * cache.set('greeting', 'hello');
 * cache.get('greeting'); // 'hello'
 * cache.close(); // stop the sweep timer
 * ```
 */
export const createTtlCache = <T>(options: CacheOptions<T> = {}): Cache<T> => {
  const { signal, logger = silentLogger, onEvicted, unrefTimer = true } = options;
  const defaultTtlMs = toDuration(options.defaultTtlMs);
  const sweepIntervalMs = Math.min(toDuration(options.sweepIntervalMs), MAX_SWEEP_INTERVAL_MS);

  const store = new Map<string, CacheItem<T>>();

  let timer: ReturnType<typeof setInterval> | undefined;
  let isClosed = false;

  // A throwing logger must not break the sweep timer
  const debug = (message: string, ...args: readonly unknown[]): void => {
    try {
      logger.debug(message, ...args);
    } catch (error) {
      console.error('[ttl-cache] logger failed:', error);
    }
  };

  const lookupLive = (key: string): CacheItem<T> | undefined => {
    const item = store.get(key);
    if (item === undefined || hasExpired(item, Date.now())) {
      return undefined;
    }
    return item;
  };

  const set = (key: string, value: T, ttlMs?: number): void => {
    let ttl = toDuration(ttlMs);
    if (ttl === DEFAULT_EXPIRATION) {
      ttl = defaultTtlMs;
    }

    const now = Date.now();
    store.set(key, {
      value,
      createdAt: now,
      expiresAt: ttl > 0 ? now + ttl : 0,
    });
  };

  const get = (key: string): T | undefined => lookupLive(key)?.value;

  const getItem = (key: string): Result<CacheItem<T>, CacheError> => {
    const item = lookupLive(key);
    if (item === undefined) {
      return err(createNotFoundError(key));
    }
    return ok({ ...item });
  };

  const isExpired = (key: string): boolean => lookupLive(key) === undefined;

  const count = (): number => store.size;

  const deleteKey = (key: string): Result<void, CacheError> => {
    if (!store.delete(key)) {
      return err(createNotFoundError(key));
    }
    return ok(undefined);
  };

  const notifyEvicted = (key: string, value: T): void => {
    if (onEvicted === undefined) {
      return;
    }
    try {
      onEvicted(key, value);
    } catch (error) {
      debug(`eviction listener failed for "${key}"`, error);
    }
  };

  const sweep = (): number => {
    const expiredKeys: string[] = [];
    const scannedAt = Date.now();
    for (const [key, item] of store) {
      if (hasExpired(item, scannedAt)) {
        expiredKeys.push(key);
      }
    }

    let removed = 0;
    for (const key of expiredKeys) {
      // The item may have been replaced since the scan
      const item = store.get(key);
      if (item === undefined || !hasExpired(item, Date.now())) {
        continue;
      }
      store.delete(key);
      removed++;
      notifyEvicted(key, item.value);
    }

    if (removed > 0) {
      debug(`sweep removed ${String(removed)} expired item(s), ${String(store.size)} remaining`);
    }
    return removed;
  };

  const clear = (): void => {
    store.clear();
  };

  const close = (): void => {
    if (isClosed) {
      return;
    }
    isClosed = true;

    if (timer !== undefined) {
      clearInterval(timer);
      timer = undefined;
    }
    signal?.removeEventListener('abort', close);
    debug('cache closed');
  };

  if (signal?.aborted === true) {
    close();
  } else {
    signal?.addEventListener('abort', close, { once: true });

    if (sweepIntervalMs > 0) {
      timer = setInterval(sweep, sweepIntervalMs);
      if (unrefTimer) {
        timer.unref();
      }
      debug(`sweep started every ${String(sweepIntervalMs)}ms`);
    }
  }

  return {
    set,
    get,
    getItem,
    isExpired,
    count,
    delete: deleteKey,
    sweep,
    clear,
    close,
    get closed() {
      return isClosed;
    },
  };
};
