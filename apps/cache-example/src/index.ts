#!/usr/bin/env node

/**
 * TTL cache example
 *
 * Demonstrates:
 * 1. Items hidden on read once their TTL passes
 * 2. The background sweep reclaiming items nobody reads again
 * 3. Shutting the sweep down through an AbortSignal (Ctrl+C) or close()
 *
 * @packageDocumentation
 */

import 'dotenv/config';
import { setTimeout as sleep } from 'node:timers/promises';
import { createConsoleLogger, createTtlCache, NO_EXPIRATION, silentLogger } from 'ttl-sweep-cache';
import { createExampleConfig } from './config.js';

/**
 * Waits for the given time. Resolves early, without error, when the signal aborts.
 */
async function wait(ms: number, signal: AbortSignal): Promise<void> {
  try {
    await sleep(ms, undefined, { signal });
  } catch (error) {
    if (!(error instanceof Error && error.name === 'AbortError')) {
      throw error;
    }
  }
}

async function main(): Promise<void> {
  const config = createExampleConfig();
  const controller = new AbortController();

  process.once('SIGINT', () => {
    controller.abort();
  });

  const cache = createTtlCache<string>({
    ...config.cache,
    signal: controller.signal,
    logger: config.debug ? createConsoleLogger('cache-example') : silentLogger,
    onEvicted: (key, value) => {
      console.log(`evicted ${key} (${value})`);
    },
  });

  const { defaultTtlMs, sweepIntervalMs } = config.cache;
  console.log(`default TTL ${String(defaultTtlMs)}ms, sweep every ${String(sweepIntervalMs)}ms`);

  cache.set('greeting', 'hello');
  cache.set('session', 'short-lived', 100);
  cache.set('settings', 'kept forever', NO_EXPIRATION);
  console.log(`stored ${String(cache.count())} items`);

  await wait(150, controller.signal);
  if (controller.signal.aborted) {
    return;
  }
  console.log(`session after 150ms: ${cache.get('session') ?? '<expired>'}`);
  console.log(`session expired: ${String(cache.isExpired('session'))}, items held: ${String(cache.count())}`);

  const waitMs = Math.max(defaultTtlMs, sweepIntervalMs) + sweepIntervalMs + 50;
  await wait(waitMs, controller.signal);
  if (controller.signal.aborted) {
    return;
  }

  if (sweepIntervalMs === 0) {
    console.log(`sweep disabled, removing expired items by hand: ${String(cache.sweep())}`);
  }
  console.log(`items held after ${String(waitMs)}ms: ${String(cache.count())}`);

  const settings = cache.getItem('settings');
  if (settings.isOk()) {
    console.log(`settings created at ${new Date(settings.value.createdAt).toISOString()}, never expires`);
  }

  const removed = cache.delete('greeting');
  if (removed.isErr()) {
    console.log(`delete greeting: ${removed.error.message}`);
  }

  cache.close();
}

main().catch((error: unknown) => {
  console.error('[cache-example] Fatal error:', error);
  process.exit(1);
});
