import { describe, it, expect } from 'vitest';
import { cosineSimilarity, dotProduct, l2Norm, meanVector, normalizeVector } from '../src/utils/vector-math.js';

describe('vector math', () => {
  it('should compute dot products past the unrolled block', () => {
    expect(dotProduct([1, 2, 3, 4, 5], [5, 4, 3, 2, 1])).toBe(35);
  });

  it('should normalize to unit length', () => {
    expect(normalizeVector([3, 4])).toEqual([0.6, 0.8]);
    expect(l2Norm([3, 4])).toBe(5);
  });

  it('should refuse to normalize a zero vector', () => {
    expect(normalizeVector([0, 0, 0])).toBeNull();
  });

  it('should average component-wise', () => {
    expect(meanVector([[1, 2], [3, 6]])).toEqual([2, 4]);
  });

  it('should reject an empty or ragged mean', () => {
    expect(() => meanVector([])).toThrow(RangeError);
    expect(() => meanVector([[1, 2], [1]])).toThrow('Dimension mismatch: expected 2, got 1');
  });

  it('should score orthogonal and parallel vectors', () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([1, 0], [2, 0])).toBe(1);
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
  });
});
