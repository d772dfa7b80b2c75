/**
 * OpenAI Embedding Provider
 *
 * Embeds text through the OpenAI embeddings API, either on
 * api.openai.com or on an Azure OpenAI deployment. The SDK's own retries
 * are disabled; transient failures go through {@link executeWithRetry}.
 *
 * @module agent-orchestrator/embedding/providers/openai-provider
 */

import OpenAI, { AzureOpenAI } from 'openai';
import type { EmbeddingProvider } from '../types.js';
import { EmbeddingProviderError } from '../errors.js';
import { executeWithRetry } from '../../resilience/retry.js';
import { RetryExhaustedError } from '../../resilience/errors.js';
import { getRetryAfterMs, getStatusCode } from '../../resilience/predicates.js';
import type { RetryOptions } from '../../resilience/types.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('embedding:openai');

export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';

const REQUEST_TIMEOUT_MS = 20_000;

/**
 * The slice of the OpenAI client this provider uses
 */
export interface EmbeddingsClient {
  embeddings: {
    create(
      body: { model: string; input: string },
      options?: { signal?: AbortSignal },
    ): Promise<{ data: Array<{ embedding: number[] }> }>;
  };
}

export type OpenAIConnection =
  | { kind: 'openai'; apiKey: string; baseURL?: string }
  | { kind: 'azure'; endpoint: string; apiKey: string; apiVersion: string };

export interface OpenAIEmbeddingProviderOptions {
  /** Model, or deployment name on Azure */
  model?: string;
  /** Retry settings for each embedding call (signal is supplied per call) */
  retry?: Omit<RetryOptions, 'signal'>;
}

/**
 * Build an SDK client for a connection, with SDK retries turned off
 */
export function createEmbeddingsClient(connection: OpenAIConnection, model: string): EmbeddingsClient {
  if (connection.kind === 'azure') {
    const endpoint = connection.endpoint.replace(/\/+$/, '');
    return new AzureOpenAI({
      apiKey: connection.apiKey,
      apiVersion: connection.apiVersion,
      baseURL: `${endpoint}/openai/deployments/${model}`,
      maxRetries: 0,
      timeout: REQUEST_TIMEOUT_MS,
    });
  }
  return new OpenAI({
    apiKey: connection.apiKey,
    baseURL: connection.baseURL,
    maxRetries: 0,
    timeout: REQUEST_TIMEOUT_MS,
  });
}

/**
 * @example
 * ```typescript
 * const provider = OpenAIEmbeddingProvider.fromConnection(
 *   { kind: 'openai', apiKey: process.env.OPENAI_API_KEY ?? '' },
 *   { retry: { maxRetries: 3, initialDelayMs: 1000 } },
 * );
 * const vector = await provider.embed('translate my lecture audio');
 * ```
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name: string;
  readonly model: string;

  constructor(
    private readonly client: EmbeddingsClient,
    private readonly options: OpenAIEmbeddingProviderOptions = {},
    name = 'openai',
  ) {
    this.model = options.model ?? DEFAULT_EMBEDDING_MODEL;
    this.name = name;
  }

  static fromConnection(
    connection: OpenAIConnection,
    options: OpenAIEmbeddingProviderOptions = {},
  ): OpenAIEmbeddingProvider {
    const model = options.model ?? DEFAULT_EMBEDDING_MODEL;
    return new OpenAIEmbeddingProvider(createEmbeddingsClient(connection, model), options, connection.kind);
  }

  /**
   * @throws EmbeddingProviderError for a permanent failure or an empty result
   * @throws RetryExhaustedError once transient failures use up the retries
   */
  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    let response: { data: Array<{ embedding: number[] }> };
    try {
      response = await executeWithRetry(
        () => this.client.embeddings.create({ model: this.model, input: text }, { signal }),
        {
          ...this.options.retry,
          signal,
          onRetry: (attempt) => {
            log.warn(
              { retry: attempt.retry, delayMs: attempt.delayMs, status: getStatusCode(attempt.error) },
              'embedding request failed, retrying',
            );
            this.options.retry?.onRetry?.(attempt);
          },
        },
      );
    } catch (error) {
      if (signal?.aborted || error instanceof RetryExhaustedError) {
        throw error;
      }
      throw EmbeddingProviderError.requestFailed(
        this.name,
        error,
        getStatusCode(error),
        getRetryAfterMs(error),
      );
    }

    const vector = response.data[0]?.embedding;
    if (!vector || vector.length === 0) {
      throw EmbeddingProviderError.emptyVector(this.name);
    }
    return vector;
  }
}
