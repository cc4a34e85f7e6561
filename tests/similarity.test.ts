import { describe, expect, it } from 'vitest';

import { levenshteinDistance, similarity } from '../server/answers/similarity.js';

describe('levenshteinDistance', () => {
  it('counts insertions, deletions and substitutions', () => {
    expect(levenshteinDistance('kitten', 'sitting')).toBe(3);
    expect(levenshteinDistance('also', 'alsp')).toBe(1);
    expect(levenshteinDistance('', 'abc')).toBe(3);
    expect(levenshteinDistance('abc', '')).toBe(3);
    expect(levenshteinDistance('same', 'same')).toBe(0);
  });

  it('is symmetric', () => {
    expect(levenshteinDistance('because', 'becuase')).toBe(levenshteinDistance('becuase', 'because'));
  });
});

describe('similarity', () => {
  it('is 1 for identical strings', () => {
    expect(similarity('to be', 'to be')).toBe(1);
  });

  it('is 0 when either side is empty', () => {
    expect(similarity('', 'also')).toBe(0);
    expect(similarity('also', '')).toBe(0);
    expect(similarity('', '')).toBe(0);
  });

  it('scales the distance by the longer string', () => {
    expect(similarity('kitten', 'sitting')).toBeCloseTo(1 - 3 / 7, 10);
    expect(similarity('abc', 'xyz')).toBe(0);
  });
});
