/**
 * Retry / Backoff Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { backoffDelay, withRetry } from '../retry.js';
import type { RetryPolicy } from '../../config.js';

const policy: RetryPolicy = { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 16000 };

describe('backoffDelay', () => {
  it('doubles from the base delay', () => {
    expect([1, 2, 3, 4].map(n => backoffDelay(n, policy))).toEqual([1000, 2000, 4000, 8000]);
  });

  it('caps at the maximum delay', () => {
    expect(backoffDelay(5, policy)).toBe(16000);
    expect(backoffDelay(9, policy)).toBe(16000);
  });
});

describe('withRetry', () => {
  it('returns the first success without sleeping', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const operation = vi.fn(async (_attempt: number) => 'ok');

    await expect(withRetry(operation, { policy, shouldRetry: () => true, sleep })).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('retries retryable failures with backoff', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const onRetry = vi.fn();
    const failure = new Error('busy');
    const operation = vi
      .fn(async (_attempt: number) => 'ok')
      .mockRejectedValueOnce(failure)
      .mockRejectedValueOnce(failure);

    await expect(withRetry(operation, { policy, shouldRetry: () => true, sleep, onRetry })).resolves.toBe('ok');
    expect(operation.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000]);
    expect(onRetry.mock.calls).toEqual([
      [failure, 1, 1000],
      [failure, 2, 2000],
    ]);
  });

  it('rethrows a non-retryable error immediately', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const fatal = new Error('bad request');
    const operation = vi.fn(async (_attempt: number) => {
      throw fatal;
    });

    await expect(withRetry(operation, { policy, shouldRetry: () => false, sleep })).rejects.toBe(fatal);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('rethrows the last error once attempts are exhausted', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    let calls = 0;
    const operation = async () => {
      calls += 1;
      throw new Error(`failure ${calls}`);
    };

    await expect(withRetry(operation, { policy, shouldRetry: () => true, sleep })).rejects.toThrow('failure 3');
    expect(calls).toBe(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('makes a single attempt when maxAttempts is 1', async () => {
    const operation = vi.fn(async (_attempt: number) => {
      throw new Error('busy');
    });

    await expect(
      withRetry(operation, { policy: { ...policy, maxAttempts: 1 }, shouldRetry: () => true, sleep: async () => {} }),
    ).rejects.toThrow('busy');
    expect(operation).toHaveBeenCalledTimes(1);
  });
});
