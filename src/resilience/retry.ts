/**
 * Retry With Backoff
 *
 * Generic retry wrapper for fallible, network-bound calls such as
 * embedding requests. Agent processes are never retried here; callers
 * compose whole-invocation retries explicitly.
 *
 * @module agent-orchestrator/resilience/retry
 */

import { setTimeout as delay } from 'node:timers/promises';
import { RetryExhaustedError } from './errors.js';
import { getRetryAfterMs, isNonRetryableError, isTransientError } from './predicates.js';
import type { RetryOptions } from './types.js';

export const DEFAULT_RETRY_OPTIONS = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
} as const;

const JITTER_MIN_MS = 100;
const JITTER_MAX_MS = 500;

async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  await delay(ms, undefined, { signal });
}

/**
 * Decide whether a failed attempt may be retried
 */
export function shouldRetry(
  error: unknown,
  retryPredicate?: (error: unknown) => boolean,
): boolean {
  if (isNonRetryableError(error)) {
    return false;
  }
  return isTransientError(error) || (retryPredicate?.(error) ?? false);
}

/**
 * Compute the delay that follows `previousDelayMs`:
 * `previous * 2 + jitter`, jitter uniform in [100ms, 500ms).
 */
export function nextDelay(
  previousDelayMs: number,
  maxDelayMs: number,
  random: () => number = Math.random,
): number {
  const jitter = JITTER_MIN_MS + Math.floor(random() * (JITTER_MAX_MS - JITTER_MIN_MS));
  return Math.min(previousDelayMs * 2 + jitter, maxDelayMs);
}

/**
 * Execute an async operation, retrying transient failures with
 * exponential backoff.
 *
 * - Non-retryable errors (invalid input, auth, policy violations) are
 *   re-thrown immediately without consuming a retry.
 * - Other errors are re-thrown as-is unless transient or accepted by
 *   `retryPredicate`.
 * - A provider retry-after hint replaces the computed delay for the
 *   next wait.
 * - After `maxRetries` retries the last error is wrapped in
 *   {@link RetryExhaustedError}.
 *
 * The operation runs between 1 and `maxRetries + 1` times, so it must be
 * idempotent if it has side effects.
 *
 * @param operation - Receives the 1-based attempt number
 *
 * @example
 * ```typescript
 * const vector = await executeWithRetry(
 *   () => client.embeddings.create({ model, input: text }),
 *   { maxRetries: 3, initialDelayMs: 1000 },
 * );
 * ```
 */
export async function executeWithRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const maxRetries = options.maxRetries ?? DEFAULT_RETRY_OPTIONS.maxRetries;
  const maxDelayMs = options.maxDelayMs ?? DEFAULT_RETRY_OPTIONS.maxDelayMs;
  const random = options.random ?? Math.random;
  const wait = options.sleep ?? sleep;

  let delayMs = Math.min(options.initialDelayMs ?? DEFAULT_RETRY_OPTIONS.initialDelayMs, maxDelayMs);
  let retries = 0;

  for (;;) {
    options.signal?.throwIfAborted();

    try {
      return await operation(retries + 1);
    } catch (error) {
      if (!shouldRetry(error, options.retryPredicate)) {
        throw error;
      }
      if (retries >= maxRetries) {
        throw new RetryExhaustedError(retries + 1, error);
      }

      retries++;
      const retryAfterMs = getRetryAfterMs(error);
      const waitMs = retryAfterMs !== undefined ? Math.min(retryAfterMs, maxDelayMs) : delayMs;

      options.onRetry?.({
        retry: retries,
        delayMs: waitMs,
        fromRetryAfter: retryAfterMs !== undefined,
        error,
      });

      await wait(waitMs, options.signal);
      delayMs = nextDelay(delayMs, maxDelayMs, random);
    }
  }
}

/**
 * Wrap a function so every call goes through {@link executeWithRetry}
 *
 * @example
 * ```typescript
 * const embed = withRetry((text: string) => provider.embed(text), { maxRetries: 2 });
 * const vector = await embed('lecture audio');
 * ```
 */
export function withRetry<Args extends unknown[], T>(
  fn: (...args: Args) => Promise<T>,
  options: RetryOptions = {},
): (...args: Args) => Promise<T> {
  return (...args: Args) => executeWithRetry(() => fn(...args), options);
}
