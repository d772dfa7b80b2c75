/**
 * Embedding Index Types
 *
 * @module agent-orchestrator/embedding/types
 */

/**
 * Stored embedding of one catalog entry
 */
export interface EmbeddingRecord {
  /** Catalog entry name */
  id: string;
  vector: number[];
  /** Display name of the entry */
  name: string;
  /** Descriptive text the vector was computed from */
  text: string;
  /** Embedder that produced the vector, as `<provider>/<model>` */
  model: string;
}

/**
 * Turns text into a fixed-length vector
 */
export interface EmbeddingProvider {
  /** Provider name for logs (e.g. 'openai', 'keyword') */
  readonly name: string;

  /**
   * Model identity. Vectors from different models are never compared,
   * even when their lengths agree.
   */
  readonly model: string;

  /**
   * @throws EmbeddingProviderError when the provider is unreachable,
   *   rejects the request or returns an empty vector
   */
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

/**
 * Keyed persistence for embedding records
 *
 * Upserts are keyed by id, so repeated identical writes leave the store
 * unchanged. All records share one vector length.
 */
export interface VectorStore {
  /**
   * Insert or replace a record
   *
   * @throws VectorStoreError if the vector length differs from the
   *   store's established length
   */
  upsert(record: EmbeddingRecord): Promise<void>;

  get(id: string): Promise<EmbeddingRecord | undefined>;

  /** Every record, in insertion order */
  scanAll(): AsyncIterable<EmbeddingRecord>;

  delete(id: string): Promise<boolean>;

  count(): Promise<number>;

  /** Established vector length, undefined while empty */
  dimension(): Promise<number | undefined>;

  close(): Promise<void>;
}

/**
 * One ranked catalog entry
 */
export interface RankedEntry {
  id: string;
  score: number;
}
