/**
 * Minimal logger accepted by the cache.
 * Any object with a compatible `debug` method (including `console`) works.
 */
export interface CacheLogger {
  readonly debug: (message: string, ...args: readonly unknown[]) => void;
}
