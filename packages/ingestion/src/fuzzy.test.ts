import { describe, it, expect } from 'vitest';
import { getMatchingBlocks, isValidSubset, subsetSimilarity } from './fuzzy.js';

const FOX = 'The quick brown fox jumps over the lazy dog';

describe('getMatchingBlocks', () => {
  it('should find ordered blocks and end with a zero-size sentinel', () => {
    expect(getMatchingBlocks('abxcd', 'abcd')).toEqual([
      { a: 0, b: 0, size: 2 },
      { a: 3, b: 2, size: 2 },
      { a: 5, b: 4, size: 0 },
    ]);
  });

  it('should return only the sentinel when nothing matches', () => {
    expect(getMatchingBlocks('abc', 'xyz')).toEqual([{ a: 3, b: 3, size: 0 }]);
  });
});

describe('isValidSubset', () => {
  it('should accept an exact excerpt regardless of case and punctuation', () => {
    expect(isValidSubset(FOX, 'quick brown fox')).toBe(true);
    expect(isValidSubset(FOX, 'QUICK, brown... FOX!')).toBe(true);
  });

  it('should reject unrelated text', () => {
    expect(isValidSubset(FOX, 'completely unrelated content')).toBe(false);
  });

  it('should reject a subset with no alphanumeric characters', () => {
    expect(isValidSubset(FOX, '!!! ...')).toBe(false);
    expect(isValidSubset(FOX, '')).toBe(false);
  });

  it('should tolerate a small typo', () => {
    expect(isValidSubset(FOX, 'the quick brown fox jumps ovr the lazy dog')).toBe(true);
  });

  it('should accept exactly at the threshold and reject just below it', () => {
    expect(subsetSimilarity('abcdefghi', 'abcdefghiz')).toBe(0.9);
    expect(isValidSubset('abcdefghi', 'abcdefghiz')).toBe(true);
    expect(isValidSubset('abcdefghijklmnopq', 'abcdefghijklmnopqzz')).toBe(false);
  });

  it('should not join blocks separated by more than the allowed gap', () => {
    const text = `alpha section ${'x'.repeat(150)} omega section`;
    const subset = 'alpha section omega section';

    expect(subsetSimilarity(text, subset)).toBe(0.5);
    expect(isValidSubset(text, subset)).toBe(false);
    expect(isValidSubset(text, subset, { maxGap: 200 })).toBe(true);
  });

  it('should count the text inside a tolerated gap towards the span', () => {
    const text = `abcde${'z'.repeat(10)}klmno`;
    const subset = 'abcdefghijklmno';

    expect(subsetSimilarity(text, subset)).toBeCloseTo(20 / 15);
    expect(isValidSubset(text, subset)).toBe(true);
  });
});
