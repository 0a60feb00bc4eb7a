import type { CacheError, CacheErrorCode } from './types.js';

/**
 * Default error messages for each error code.
 */
const defaultMessages: Record<CacheErrorCode, string> = {
  KEY_NOT_FOUND: 'key not found',
  INVALID_OPTIONS: 'Cache options are invalid',
};

/**
 * Creates the error returned when a key is absent or has expired.
 *
 * @param key - The key that was looked up
 * @returns A KEY_NOT_FOUND CacheError
 */
export const createNotFoundError = (key: string): CacheError => ({
  code: 'KEY_NOT_FOUND',
  message: `${defaultMessages.KEY_NOT_FOUND}: "${key}"`,
  key,
});

/**
 * Creates the error returned when configuration input fails validation.
 *
 * @param details - Human-readable description of what is wrong
 * @param cause - The underlying validation error
 * @returns An INVALID_OPTIONS CacheError
 */
export const createInvalidOptionsError = (details: string, cause?: unknown): CacheError => {
  const base = {
    code: 'INVALID_OPTIONS' as const,
    message: details.length > 0 ? `${defaultMessages.INVALID_OPTIONS}: ${details}` : defaultMessages.INVALID_OPTIONS,
  };

  if (cause !== undefined) {
    return { ...base, cause };
  }

  return base;
};

const errorCodes: readonly string[] = Object.keys(defaultMessages);

/**
 * Type guard for CacheError values.
 */
export const isCacheError = (value: unknown): value is CacheError => {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  if (!('code' in value) || !('message' in value)) {
    return false;
  }

  return (
    typeof value.code === 'string' && errorCodes.includes(value.code) && typeof value.message === 'string'
  );
};
