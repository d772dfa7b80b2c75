/**
 * Embedding provider stand-in: one dimension per vocabulary word, set to
 * 1 when the text contains the word.
 */

import type { EmbeddingProvider } from '@/embedding/types.js';

export const LECTURE_VOCABULARY = ['speech', 'audio', 'translate', 'whiteboard', 'ocr', 'image'];

export class VocabularyEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'vocabulary';
  readonly model = 'lecture-vocabulary';
  readonly calls: string[] = [];

  constructor(private readonly vocabulary: readonly string[] = LECTURE_VOCABULARY) {}

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    const lower = text.toLowerCase();
    return this.vocabulary.map((word) => (lower.includes(word) ? 1 : 0));
  }
}
