import { describe, it, expect } from 'vitest';
import { closestMatch, similarityRatio } from '../similarity.js';

describe('similarityRatio', () => {
  it('is 1 for identical strings', () => {
    expect(similarityRatio('paratha', 'paratha')).toBe(1);
  });

  it('is 1 for two empty strings', () => {
    expect(similarityRatio('', '')).toBe(1);
  });

  it('is 0 when nothing matches', () => {
    expect(similarityRatio('abc', 'xyz')).toBe(0);
  });

  it('counts recursively found matching blocks', () => {
    expect(similarityRatio('apple', 'appel')).toBeCloseTo(0.8);
    expect(similarityRatio('ape', 'appel')).toBeCloseTo(0.75);
    expect(similarityRatio('abcd', 'bcde')).toBeCloseTo(0.75);
    expect(similarityRatio('roti', '2 roti')).toBeCloseTo(0.8);
  });

  it('compares by code point', () => {
    expect(similarityRatio('🍎a', '🍎b')).toBeCloseTo(0.5);
  });
});

describe('closestMatch', () => {
  it('returns the best candidate above the cutoff', () => {
    expect(closestMatch('appel', ['ape', 'apple', 'peach', 'puppy'], 0.6)).toBe('apple');
  });

  it('returns null when no candidate reaches the cutoff', () => {
    expect(closestMatch('pizza', ['roti', 'naan'], 0.7)).toBeNull();
  });

  it('returns null for no candidates', () => {
    expect(closestMatch('roti', [], 0.7)).toBeNull();
  });

  it('breaks ties toward the lexicographically greater candidate', () => {
    expect(closestMatch('ab', ['ax', 'ay'], 0.5)).toBe('ay');
    expect(closestMatch('ab', ['ay', 'ax'], 0.5)).toBe('ay');
  });

  it('accepts any iterable of candidates', () => {
    const catalog = new Map([
      ['roti', 80],
      ['chapati', 80],
    ]);
    expect(closestMatch('chapatti', catalog.keys(), 0.7)).toBe('chapati');
  });
});
