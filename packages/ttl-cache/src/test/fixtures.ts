/**
 * Shared test fixtures and constants.
 */

// ============================================================================
// Time Constants
// ============================================================================

/** One hour in milliseconds */
export const ONE_HOUR_MS = 60 * 60 * 1000;

/** Short TTL for testing expiration */
export const SHORT_TTL_MS = 50;

/** Sweep interval used by background sweep tests (longer than SHORT_TTL_MS) */
export const SWEEP_INTERVAL_MS = 100;

// ============================================================================
// Keys and values
// ============================================================================

export const TEST_KEY = 'session:42';
export const TEST_VALUE = 'test-value';

/**
 * Small deterministic pseudo-random generator (LCG) so interleaving tests
 * produce the same schedule on every run.
 */
export const createSeededRandom = (seed: number): (() => number) => {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 0x100000000;
  };
};
