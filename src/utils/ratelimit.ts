/**
 * Politeness delays between actions
 * - Fixed delay after each request
 * - Every wait honours an AbortSignal so Ctrl-C never sits out a pause
 */

import { setTimeout as delay } from 'timers/promises';
import { getLogger } from './logger.js';

export interface RateLimitOptions {
  delayMs?: number; // default 2000
  signal?: AbortSignal;
}

/**
 * Sleep for a given number of milliseconds
 * Rejects with an AbortError as soon as the signal fires
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  signal?.throwIfAborted();
  if (ms <= 0) {
    return;
  }
  await delay(ms, undefined, { signal });
}

/**
 * Run fn, then hold for the configured delay before returning
 * The pause happens whether fn resolved or rejected
 */
export async function rateLimit<T>(
  fn: () => Promise<T>,
  options?: RateLimitOptions
): Promise<T> {
  const delayMs = options?.delayMs ?? 2000;

  try {
    return await fn();
  } finally {
    if (delayMs > 0) {
      getLogger().debug(`Rate limiting: waiting ${delayMs}ms before next request`);
    }
    await sleep(delayMs, options?.signal);
  }
}
