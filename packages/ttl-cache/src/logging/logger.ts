import type { CacheLogger } from './types.js';

/**
 * Logger that discards everything. Used when no logger is configured.
 */
export const silentLogger: CacheLogger = {
  debug: () => undefined,
};

/**
 * Creates a logger that writes `[prefix] message` lines to stderr.
 *
 * stderr keeps diagnostics out of a program's regular output.
 *
 * @param prefix - Tag printed in brackets before every message
 *
 * @example
 * ```typescript
 * const cache = createTtlCache({ sweepIntervalMs: 1000, logger: createConsoleLogger('sessions') });
 * // [sessions] sweep removed 3 expired item(s)
 * ```
 */
export const createConsoleLogger = (prefix: string): CacheLogger => ({
  debug: (message, ...args) => {
    console.error(`[${prefix}] ${message}`, ...args);
  },
});
