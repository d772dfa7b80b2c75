import { describe, it, expect } from 'vitest';
import { cosineSimilarity } from '@/embedding/similarity.js';

describe('cosineSimilarity', () => {
  it('is 1 for vectors pointing the same way', () => {
    expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 10);
  });

  it('is 0 for orthogonal vectors', () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it('is -1 for opposite vectors', () => {
    expect(cosineSimilarity([1, -1], [-1, 1])).toBeCloseTo(-1, 10);
  });

  it('computes partial overlap', () => {
    // 2 / (sqrt(2) * sqrt(3))
    expect(cosineSimilarity([0, 1, 1], [1, 1, 1])).toBeCloseTo(0.8165, 4);
  });

  it('returns 0 when either vector has zero magnitude', () => {
    expect(cosineSimilarity([0, 0, 0], [1, 2, 3])).toBe(0);
    expect(cosineSimilarity([1, 2, 3], [0, 0, 0])).toBe(0);
  });

  it('throws on length mismatch', () => {
    expect(() => cosineSimilarity([1, 2], [1, 2, 3])).toThrow('Vector length mismatch: 2 vs 3');
  });
});
