/**
 * Embedding Index
 *
 * Ranks catalog entries against free text by cosine similarity over a
 * brute-force scan of the vector store. Catalogs are small (tens to low
 * hundreds of entries), so no approximate index is kept.
 *
 * @module agent-orchestrator/embedding/embedding-index
 */

import type { Catalog } from '../catalog/catalog.js';
import { describeEntry } from '../catalog/catalog.js';
import type { EmbeddingProvider, RankedEntry, VectorStore } from './types.js';
import { EmbeddingProviderError } from './errors.js';
import { cosineSimilarity } from './similarity.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('embedding-index');

export interface EmbeddingIndexOptions {
  /** Entries eligible for ranking; their order breaks score ties */
  catalog: Catalog;
}

/**
 * @example
 * ```typescript
 * const index = new EmbeddingIndex(new KeywordEmbeddingProvider(), new InMemoryVectorStore(), {
 *   catalog,
 * });
 * const ranked = await index.rank('translate my lecture audio', 3);
 * // [{ id: 'Speech Translator', score: 0.61 }, ...]
 * ```
 */
export class EmbeddingIndex {
  private readonly catalog: Catalog;
  private readonly position = new Map<string, number>();
  private readonly embedder: string;

  constructor(
    private readonly provider: EmbeddingProvider,
    private readonly store: VectorStore,
    options: EmbeddingIndexOptions,
  ) {
    this.catalog = options.catalog;
    this.embedder = `${provider.name}/${provider.model}`;
    this.catalog.entries().forEach((entry, index) => {
      this.position.set(entry.descriptor.name, index);
    });
  }

  /**
   * Embed text with the configured provider
   *
   * If the signal aborts while the request is in flight, the request is
   * allowed to finish but its result is discarded.
   *
   * @throws EmbeddingProviderError on an empty vector
   */
  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    signal?.throwIfAborted();
    const vector = await this.provider.embed(text, signal);
    signal?.throwIfAborted();
    if (vector.length === 0) {
      throw EmbeddingProviderError.emptyVector(this.provider.name);
    }
    return vector;
  }

  /**
   * Keyed upsert of one entity's embedding
   */
  async storeEmbedding(
    entityId: string,
    vector: readonly number[],
    descriptiveText: string,
    name: string = entityId,
  ): Promise<void> {
    await this.store.upsert({
      id: entityId,
      name,
      text: descriptiveText,
      vector: [...vector],
      model: this.embedder,
    });
  }

  async retrieveEmbedding(entityId: string): Promise<number[] | undefined> {
    return (await this.store.get(entityId))?.vector;
  }

  /**
   * Embed every catalog entry that has no stored record, or whose stored
   * text no longer matches its description
   *
   * Records written by another provider or model are deleted first, so a
   * persistent store converges after the embedder changes.
   *
   * @returns Number of entries embedded
   */
  async ensureEmbeddings(signal?: AbortSignal): Promise<number> {
    await this.dropForeignRecords();

    let embedded = 0;
    for (const entry of this.catalog.entries()) {
      const { name } = entry.descriptor;
      const text = describeEntry(entry);
      const existing = await this.store.get(name);
      if (existing && existing.model === this.embedder && existing.text === text) {
        continue;
      }

      const vector = await this.embed(text, signal);
      await this.storeEmbedding(name, vector, text, name);
      embedded++;
      log.debug({ entry: name, refreshed: existing !== undefined }, 'entry embedded');
    }
    if (embedded > 0) {
      log.info({ embedded, provider: this.provider.name }, 'catalog embeddings updated');
    }
    return embedded;
  }

  /**
   * Top `topK` catalog entries by non-increasing cosine similarity to
   * the query vector. Ties keep catalog order.
   */
  async search(queryVector: readonly number[], topK: number, signal?: AbortSignal): Promise<RankedEntry[]> {
    const limit = Math.floor(topK);
    if (limit <= 0) {
      return [];
    }

    await this.ensureEmbeddings(signal);

    const scored: Array<RankedEntry & { position: number }> = [];
    for await (const record of this.store.scanAll()) {
      const position = this.position.get(record.id);
      if (position === undefined || record.model !== this.embedder) {
        continue;
      }
      if (record.vector.length !== queryVector.length) {
        log.warn(
          { entry: record.id, expected: queryVector.length, actual: record.vector.length },
          'stored vector length differs from query, skipping',
        );
        continue;
      }
      scored.push({ id: record.id, score: cosineSimilarity(queryVector, record.vector), position });
    }

    return scored
      .sort((a, b) => b.score - a.score || a.position - b.position)
      .slice(0, limit)
      .map(({ id, score }) => ({ id, score }));
  }

  /**
   * Embed the query and search in one call
   */
  async rank(query: string, topK: number, signal?: AbortSignal): Promise<RankedEntry[]> {
    const queryVector = await this.embed(query, signal);
    return this.search(queryVector, topK, signal);
  }

  private async dropForeignRecords(): Promise<void> {
    const foreign: string[] = [];
    for await (const record of this.store.scanAll()) {
      if (record.model !== this.embedder) {
        foreign.push(record.id);
      }
    }
    for (const id of foreign) {
      await this.store.delete(id);
    }
    if (foreign.length > 0) {
      log.info({ dropped: foreign.length, embedder: this.embedder }, 'dropped embeddings of another model');
    }
  }
}
