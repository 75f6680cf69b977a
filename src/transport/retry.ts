/**
 * Retry with exponential backoff.
 *
 * Delays (defaults 1000ms base): 1s before attempt 2, 2s before attempt 3, ...
 * capped at maxDelayMs. Non-retryable errors and the last failure are
 * rethrown unchanged.
 */

import type { RetryPolicy } from '../config.js';

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/** Delay after the `failures`-th failed attempt (1-based). */
export function backoffDelay(failures: number, policy: RetryPolicy): number {
  return Math.min(policy.baseDelayMs * 2 ** (failures - 1), policy.maxDelayMs);
}

export interface RetryOptions {
  policy: RetryPolicy;
  shouldRetry: (err: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (err: unknown, failures: number, delayMs: number) => void;
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const wait = options.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (err) {
      if (attempt >= options.policy.maxAttempts || !options.shouldRetry(err)) {
        throw err;
      }
      const delayMs = backoffDelay(attempt, options.policy);
      options.onRetry?.(err, attempt, delayMs);
      await wait(delayMs);
    }
  }
}
