/**
 * Logging helpers for cache diagnostics.
 *
 * @packageDocumentation
 */

export { createConsoleLogger, silentLogger } from './logger.js';
export type { CacheLogger } from './types.js';
