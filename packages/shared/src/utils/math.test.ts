import { describe, it, expect } from 'vitest';
import { clamp, levenshteinDistance, levenshteinSimilarity } from './math.js';

describe('levenshteinDistance', () => {
  it('should be zero for identical strings', () => {
    expect(levenshteinDistance('gazprom', 'gazprom')).toBe(0);
  });

  it('should count insertions against an empty string', () => {
    expect(levenshteinDistance('', 'nato')).toBe(4);
    expect(levenshteinDistance('nato', '')).toBe(4);
  });

  it('should count a single substitution', () => {
    expect(levenshteinDistance('kitten', 'sitten')).toBe(1);
  });

  it('should match the classic kitten/sitting distance', () => {
    expect(levenshteinDistance('kitten', 'sitting')).toBe(3);
  });
});

describe('levenshteinSimilarity', () => {
  it('should return 1 for two empty strings', () => {
    expect(levenshteinSimilarity('', '')).toBe(1);
  });

  it('should scale distance by the longer string', () => {
    // one edit across ten characters
    expect(levenshteinSimilarity('world bank', 'world banc')).toBeCloseTo(0.9);
  });
});

describe('clamp', () => {
  it('should bound values on both sides', () => {
    expect(clamp(1.4, 0, 1)).toBe(1);
    expect(clamp(-0.2, 0, 1)).toBe(0);
    expect(clamp(0.5, 0, 1)).toBe(0.5);
  });
});
