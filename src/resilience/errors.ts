/**
 * Resilience Error Types
 *
 * @module agent-orchestrator/resilience/errors
 */

/**
 * Raised once the retry budget is spent. Wraps the last underlying error.
 *
 * @example
 * ```typescript
 * try {
 *   await executeWithRetry(() => provider.embed(text), { maxRetries: 2 });
 * } catch (error) {
 *   if (error instanceof RetryExhaustedError) {
 *     console.log(`gave up after ${error.attempts} attempts`, error.cause);
 *   }
 * }
 * ```
 */
export class RetryExhaustedError extends Error {
  readonly code = 'RETRY_EXHAUSTED';

  /**
   * @param attempts - Total attempts made, including the first one
   * @param cause - Error thrown by the last attempt
   */
  constructor(
    public readonly attempts: number,
    public readonly cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Operation failed after ${attempts} attempts: ${reason}`);
    this.name = 'RetryExhaustedError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RetryExhaustedError);
    }
  }
}
