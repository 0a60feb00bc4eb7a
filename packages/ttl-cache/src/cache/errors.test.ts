import { describe, it, expect } from 'vitest';
import { createInvalidOptionsError, createNotFoundError, isCacheError } from './errors.js';

describe('Cache error utilities', () => {
  describe('createNotFoundError', () => {
    it('createNotFoundError_Key_ReturnsKeyNotFoundWithKey', () => {
      // Act
      const error = createNotFoundError('session:42');

      // Assert
      expect(error).toEqual({
        code: 'KEY_NOT_FOUND',
        message: 'key not found: "session:42"',
        key: 'session:42',
      });
    });
  });

  describe('createInvalidOptionsError', () => {
    it('createInvalidOptionsError_WithDetails_AppendsDetails', () => {
      // Act
      const error = createInvalidOptionsError('sweepIntervalMs: must be >= 0');

      // Assert
      expect(error.code).toBe('INVALID_OPTIONS');
      expect(error.message).toBe('Cache options are invalid: sweepIntervalMs: must be >= 0');
      expect('cause' in error).toBe(false);
    });

    it('createInvalidOptionsError_EmptyDetails_UsesDefaultMessage', () => {
      // Act
      const error = createInvalidOptionsError('');

      // Assert
      expect(error.message).toBe('Cache options are invalid');
    });

    it('createInvalidOptionsError_WithCause_KeepsCause', () => {
      // Arrange
      const cause = new Error('boom');

      // Act
      const error = createInvalidOptionsError('bad', cause);

      // Assert
      expect(error.cause).toBe(cause);
    });
  });

  describe('isCacheError', () => {
    it('isCacheError_CacheError_ReturnsTrue', () => {
      expect(isCacheError(createNotFoundError('a'))).toBe(true);
    });

    it('isCacheError_UnknownCode_ReturnsFalse', () => {
      expect(isCacheError({ code: 'NOPE', message: 'x' })).toBe(false);
    });

    it('isCacheError_NonObject_ReturnsFalse', () => {
      expect(isCacheError(null)).toBe(false);
      expect(isCacheError('KEY_NOT_FOUND')).toBe(false);
      expect(isCacheError(new Error('key not found'))).toBe(false);
    });
  });
});
