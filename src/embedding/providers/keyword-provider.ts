/**
 * Keyword Embedding Provider
 *
 * Local, deterministic bag-of-words embedder: each token is hashed
 * (FNV-1a) into one of `dimensions` buckets. Used when no embedding
 * service is configured. Texts sharing words get positive similarity;
 * texts with no words in common score 0 (barring hash collisions).
 *
 * @module agent-orchestrator/embedding/providers/keyword-provider
 */

import type { EmbeddingProvider } from '../types.js';
import { tokenize } from '../../utils/text.js';

export const DEFAULT_KEYWORD_DIMENSIONS = 256;

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

/**
 * 32-bit FNV-1a hash of a string's UTF-16 code units
 */
export function fnv1a(value: string): number {
  let hash = FNV_OFFSET;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME) >>> 0;
  }
  return hash >>> 0;
}

export class KeywordEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'keyword';
  readonly model: string;

  constructor(private readonly dimensions: number = DEFAULT_KEYWORD_DIMENSIONS) {
    if (!Number.isInteger(dimensions) || dimensions <= 0) {
      throw new Error(`Invalid embedding dimensions: ${dimensions}`);
    }
    this.model = `fnv1a-${dimensions}`;
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    signal?.throwIfAborted();

    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of tokenize(text)) {
      const bucket = fnv1a(token) % this.dimensions;
      vector[bucket] = (vector[bucket] ?? 0) + 1;
    }
    return vector;
  }
}
