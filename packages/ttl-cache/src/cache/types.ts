import type { Result } from 'neverthrow';
import type { CacheLogger } from '../logging/types.js';

/**
 * A stored value with its creation and expiration timestamps.
 *
 * Timestamps are epoch milliseconds. An `expiresAt` of `0` means the item
 * never expires.
 */
export interface CacheItem<T> {
  readonly value: T;
  /** When the item was written (diagnostics only) */
  readonly createdAt: number;
  /** When the item expires, or 0 for never */
  readonly expiresAt: number;
}

/**
 * Error codes returned by cache operations.
 */
export type CacheErrorCode = 'KEY_NOT_FOUND' | 'INVALID_OPTIONS';

/**
 * Error value returned in a failed Result.
 */
export interface CacheError {
  readonly code: CacheErrorCode;
  readonly message: string;
  /** The key the operation was called with, when there is one */
  readonly key?: string | undefined;
  readonly cause?: unknown;
}

/**
 * Callback invoked for every entry the sweep removes.
 */
export type EvictionListener<T> = (key: string, value: T) => void;

/**
 * Options for {@link createTtlCache}.
 */
export interface CacheOptions<T> {
  /**
   * TTL applied when `set` is called without one (default: 0).
   * Zero or less means such entries never expire.
   */
  readonly defaultTtlMs?: number;
  /**
   * Interval between background sweeps (default: 0).
   * Zero or less disables the sweep; expired entries are then only hidden on read.
   */
  readonly sweepIntervalMs?: number;
  /** Aborting this signal closes the cache */
  readonly signal?: AbortSignal;
  /** Receives sweep and lifecycle diagnostics (default: silent) */
  readonly logger?: CacheLogger;
  /** Called for each entry removed by a sweep */
  readonly onEvicted?: EvictionListener<T>;
  /** Whether the sweep timer lets the process exit (default: true) */
  readonly unrefTimer?: boolean;
}

/**
 * In-process key-value cache with per-entry TTL and periodic sweeping.
 */
export interface Cache<T> {
  /**
   * Stores a value, replacing any previous item under the same key.
   * @param key - The cache key
   * @param value - The value to cache
   * @param ttlMs - TTL in milliseconds. Omitted or 0 uses the default TTL;
   * a negative value stores the item without expiration.
   */
  readonly set: (key: string, value: T, ttlMs?: number) => void;

  /**
   * Gets a live value.
   * @returns The value, or undefined if the key is absent or expired.
   * An expired item is left in place for the sweep.
   */
  readonly get: (key: string) => T | undefined;

  /**
   * Gets a copy of a live item with its timestamps.
   * @returns Result with the item, or a KEY_NOT_FOUND error if absent or expired
   */
  readonly getItem: (key: string) => Result<CacheItem<T>, CacheError>;

  /**
   * Checks whether a key is absent or expired. Does not remove anything.
   */
  readonly isExpired: (key: string) => boolean;

  /**
   * Number of stored items, including expired items the sweep has not removed yet.
   */
  readonly count: () => number;

  /**
   * Removes an item whether or not it has expired.
   * @returns Result with a KEY_NOT_FOUND error if the key is not stored
   */
  readonly delete: (key: string) => Result<void, CacheError>;

  /**
   * Removes every expired item now.
   * @returns The number of items removed
   */
  readonly sweep: () => number;

  /**
   * Removes all items.
   */
  readonly clear: () => void;

  /**
   * Stops the background sweep. Reads and writes keep working.
   */
  readonly close: () => void;

  /** Whether the cache has been closed */
  readonly closed: boolean;
}
