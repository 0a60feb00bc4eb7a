import { describe, it, expect } from 'vitest';
import { createExampleConfig } from './config.js';

describe('createExampleConfig', () => {
  it('createExampleConfig_EmptyEnv_UsesDefaults', () => {
    // Act
    const config = createExampleConfig({});

    // Assert
    expect(config).toEqual({
      cache: { defaultTtlMs: 1000, sweepIntervalMs: 250 },
      debug: false,
    });
  });

  it('createExampleConfig_AllVarsSet_ParsesThem', () => {
    // Act
    const config = createExampleConfig({
      CACHE_DEFAULT_TTL_MS: '500',
      CACHE_SWEEP_INTERVAL_MS: '0',
      CACHE_DEBUG: '1',
    });

    // Assert
    expect(config).toEqual({
      cache: { defaultTtlMs: 500, sweepIntervalMs: 0 },
      debug: true,
    });
  });

  it('createExampleConfig_DebugNotTrue_LeavesDebugOff', () => {
    // Act
    const config = createExampleConfig({ CACHE_DEBUG: 'yes' });

    // Assert
    expect(config.debug).toBe(false);
  });

  it('createExampleConfig_NegativeInterval_Throws', () => {
    // Act & Assert
    expect(() => createExampleConfig({ CACHE_SWEEP_INTERVAL_MS: '-1' })).toThrow(
      'Invalid cache configuration: Cache options are invalid: sweepIntervalMs'
    );
  });
});
