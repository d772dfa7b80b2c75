/**
 * Resilience Layer Types
 *
 * @module agent-orchestrator/resilience/types
 */

/**
 * Information passed to {@link RetryOptions.onRetry} before each backoff wait
 */
export interface RetryAttempt {
  /** Retry number, starting at 1 for the first retry */
  retry: number;
  /** Milliseconds the wrapper will wait before the next attempt */
  delayMs: number;
  /** Whether the delay came from a provider retry-after hint */
  fromRetryAfter: boolean;
  /** Error thrown by the failed attempt */
  error: unknown;
}

/**
 * Options for {@link executeWithRetry}
 */
export interface RetryOptions {
  /**
   * Maximum number of retries after the first attempt
   * @default 3
   */
  maxRetries?: number;

  /**
   * Delay before the first retry, in milliseconds
   * @default 1000
   */
  initialDelayMs?: number;

  /**
   * Upper bound for any single delay
   * @default 30000
   */
  maxDelayMs?: number;

  /**
   * Extra predicate marking errors as retryable on top of the built-in
   * transient-failure detection. Errors classified as non-retryable are
   * never retried, whatever this returns.
   */
  retryPredicate?: (error: unknown) => boolean;

  /** Stops the loop before a new attempt and interrupts a pending wait */
  signal?: AbortSignal;

  /** Called before each backoff wait */
  onRetry?: (attempt: RetryAttempt) => void;

  /** Random source in [0, 1) used for jitter */
  random?: () => number;

  /** Sleep implementation */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}
