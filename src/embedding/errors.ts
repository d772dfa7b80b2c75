/**
 * Embedding Error Types
 *
 * @module agent-orchestrator/embedding/errors
 */

/**
 * The embedding provider failed or returned nothing usable.
 *
 * Carries the HTTP status and retry-after hint of the underlying
 * failure, so the retry wrapper can classify it.
 */
export class EmbeddingProviderError extends Error {
  readonly code = 'EMBEDDING_PROVIDER_ERROR';

  constructor(
    message: string,
    public readonly status?: number,
    public readonly retryAfterMs?: number,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'EmbeddingProviderError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EmbeddingProviderError);
    }
  }

  static emptyVector(provider: string): EmbeddingProviderError {
    return new EmbeddingProviderError(`Embedding provider '${provider}' returned an empty vector`);
  }

  static requestFailed(
    provider: string,
    cause: unknown,
    status?: number,
    retryAfterMs?: number,
  ): EmbeddingProviderError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const suffix = status !== undefined ? ` (HTTP ${status})` : '';
    return new EmbeddingProviderError(
      `Embedding request to '${provider}' failed${suffix}: ${reason}`,
      status,
      retryAfterMs,
      cause,
    );
  }
}

/**
 * The vector store rejected a write or could not be read
 */
export class VectorStoreError extends Error {
  constructor(
    message: string,
    public readonly code: 'DIMENSION_MISMATCH' | 'STORE_FAILURE',
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'VectorStoreError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, VectorStoreError);
    }
  }

  static dimensionMismatch(id: string, expected: number, actual: number): VectorStoreError {
    return new VectorStoreError(
      `Vector for '${id}' has length ${actual}, store holds vectors of length ${expected}`,
      'DIMENSION_MISMATCH',
    );
  }

  static failure(operation: string, cause: unknown): VectorStoreError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new VectorStoreError(`Vector store ${operation} failed: ${reason}`, 'STORE_FAILURE', cause);
  }
}
