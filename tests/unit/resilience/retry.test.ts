/**
 * Tests for Retry With Backoff
 *
 * Uses an injected sleep so no test waits on real timers.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  executeWithRetry,
  withRetry,
  nextDelay,
  shouldRetry,
  DEFAULT_RETRY_OPTIONS,
} from '@/resilience/retry.js';
import { RetryExhaustedError } from '@/resilience/errors.js';
import type { RetryAttempt } from '@/resilience/types.js';

function httpError(status: number, message = `HTTP ${status}`, extra: object = {}): Error {
  return Object.assign(new Error(message), { status }, extra);
}

function recordingSleep() {
  const waits: number[] = [];
  const sleep = async (ms: number): Promise<void> => {
    waits.push(ms);
  };
  return { waits, sleep };
}

describe('nextDelay', () => {
  it('doubles the previous delay and adds at least 100ms of jitter', () => {
    expect(nextDelay(1000, 30000, () => 0)).toBe(2100);
  });

  it('keeps jitter below 500ms', () => {
    expect(nextDelay(1000, 30000, () => 0.5)).toBe(2300);
    expect(nextDelay(1000, 30000, () => 0.999)).toBe(2499);
  });

  it('caps the delay at maxDelayMs', () => {
    expect(nextDelay(20000, 30000, () => 0)).toBe(30000);
  });
});

describe('shouldRetry', () => {
  it('retries transient failures', () => {
    expect(shouldRetry(httpError(503))).toBe(true);
  });

  it('never retries non-retryable failures, even when the predicate accepts them', () => {
    expect(shouldRetry(httpError(401), () => true)).toBe(false);
  });

  it('consults the predicate for unclassified errors', () => {
    const error = new Error('step failed');
    expect(shouldRetry(error)).toBe(false);
    expect(shouldRetry(error, (e) => e === error)).toBe(true);
  });
});

describe('executeWithRetry', () => {
  it('returns the first successful result without waiting', async () => {
    const { waits, sleep } = recordingSleep();
    const operation = vi.fn(async () => 'ok');

    await expect(executeWithRetry(operation, { sleep })).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(1);
    expect(operation).toHaveBeenCalledWith(1);
    expect(waits).toEqual([]);
  });

  it('retries transient failures with exponential backoff', async () => {
    const { waits, sleep } = recordingSleep();
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(httpError(503))
      .mockRejectedValueOnce(httpError(502))
      .mockResolvedValue('ok');

    const result = await executeWithRetry(operation, {
      maxRetries: 3,
      initialDelayMs: 1000,
      random: () => 0,
      sleep,
    });

    expect(result).toBe('ok');
    expect(operation.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
    expect(waits).toEqual([1000, 2100]);
  });

  it('wraps the last error once retries are exhausted', async () => {
    const { waits, sleep } = recordingSleep();
    const last = httpError(503, 'Service unavailable');
    const operation = vi.fn(async () => {
      throw last;
    });

    const failure = executeWithRetry(operation, {
      maxRetries: 2,
      initialDelayMs: 1000,
      random: () => 0,
      sleep,
    });

    await expect(failure).rejects.toBeInstanceOf(RetryExhaustedError);
    await expect(failure).rejects.toMatchObject({
      attempts: 3,
      cause: last,
      message: 'Operation failed after 3 attempts: Service unavailable',
    });
    expect(operation).toHaveBeenCalledTimes(3);
    expect(waits).toEqual([1000, 2100]);
  });

  it('rethrows non-retryable errors immediately', async () => {
    const { waits, sleep } = recordingSleep();
    const error = httpError(400, 'invalid input');
    const operation = vi.fn(async () => {
      throw error;
    });

    await expect(executeWithRetry(operation, { sleep, retryPredicate: () => true })).rejects.toBe(error);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(waits).toEqual([]);
  });

  it('rethrows unclassified errors as-is without a predicate', async () => {
    const error = new Error('disk full');
    await expect(
      executeWithRetry(async () => {
        throw error;
      }),
    ).rejects.toBe(error);
  });

  it('honours a provider retry-after hint for the next wait', async () => {
    const { waits, sleep } = recordingSleep();
    const attempts: RetryAttempt[] = [];
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(httpError(429, 'Too many requests', { headers: { 'retry-after': '2' } }))
      .mockResolvedValue('ok');

    await executeWithRetry(operation, {
      sleep,
      initialDelayMs: 1000,
      onRetry: (attempt) => attempts.push(attempt),
    });

    expect(waits).toEqual([2000]);
    expect(attempts).toHaveLength(1);
    expect(attempts[0]).toMatchObject({ retry: 1, delayMs: 2000, fromRetryAfter: true });
  });

  it('caps a retry-after hint at maxDelayMs', async () => {
    const { waits, sleep } = recordingSleep();
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(httpError(429, 'Too many requests', { retryAfterMs: 120000 }))
      .mockResolvedValue('ok');

    await executeWithRetry(operation, { sleep, maxDelayMs: 5000 });

    expect(waits).toEqual([5000]);
  });

  it('does not start when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const operation = vi.fn(async () => 'ok');

    await expect(executeWithRetry(operation, { signal: controller.signal })).rejects.toMatchObject({
      name: 'AbortError',
    });
    expect(operation).not.toHaveBeenCalled();
  });

  it('uses the documented defaults', () => {
    expect(DEFAULT_RETRY_OPTIONS).toEqual({ maxRetries: 3, initialDelayMs: 1000, maxDelayMs: 30000 });
  });
});

describe('withRetry', () => {
  it('forwards arguments to the wrapped function on every attempt', async () => {
    const { sleep } = recordingSleep();
    const fn = vi
      .fn<(a: number, b: number) => Promise<number>>()
      .mockRejectedValueOnce(httpError(500))
      .mockImplementation(async (a, b) => a + b);

    const add = withRetry(fn, { sleep });

    await expect(add(2, 3)).resolves.toBe(5);
    expect(fn.mock.calls).toEqual([
      [2, 3],
      [2, 3],
    ]);
  });
});
