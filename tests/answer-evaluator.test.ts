import { describe, expect, it } from 'vitest';

import { PASS_THRESHOLD, evaluate, expandCandidates } from '../server/answers/index.js';
import { InvalidInputError } from '../server/errors.js';

describe('expandCandidates', () => {
  it('lists each full meaning before its delimited parts', () => {
    expect(expandCandidates(['～ is/am/are ～', 'too; also'])).toEqual([
      { display: '～ is/am/are ～', normalized: 'is/am/are' },
      { display: '～ is', normalized: 'is' },
      { display: 'am', normalized: 'am' },
      { display: 'are ～', normalized: 'are' },
      { display: 'too; also', normalized: 'too; also' },
      { display: 'too', normalized: 'too' },
      { display: 'also', normalized: 'also' },
    ]);
  });

  it('does not repeat a meaning that has no delimiters', () => {
    expect(expandCandidates(['because'])).toEqual([{ display: 'because', normalized: 'because' }]);
  });
});

describe('evaluate', () => {
  it('accepts one sense of a multi-part meaning', () => {
    expect(evaluate('too', ['too; also'])).toEqual({ bestMatch: 'too', score: 1, passed: true });
  });

  it('accepts one variant of a slash-separated meaning', () => {
    expect(evaluate('is', ['～ is/am/are ～'])).toEqual({ bestMatch: '～ is', score: 1, passed: true });
  });

  it('rejects an unrelated answer', () => {
    const result = evaluate('completely unrelated text', ['meaning X']);
    expect(result.passed).toBe(false);
    expect(result.score).toBeLessThan(PASS_THRESHOLD);
    expect(result.bestMatch).toBe('meaning X');
  });

  it('scores an exact full meaning as 1', () => {
    expect(evaluate('too; also', ['too; also']).score).toBe(1);
  });

  it('ignores case, surrounding whitespace and trailing punctuation', () => {
    expect(evaluate('  ALSO!  ', ['too; also'])).toEqual({ bestMatch: 'also', score: 1, passed: true });
  });

  it('passes a typo that lands exactly on the threshold', () => {
    expect(evaluate('alsp', ['too; also'])).toEqual({ bestMatch: 'also', score: 0.75, passed: true });
  });

  it('keeps the first candidate when two score the same', () => {
    const result = evaluate('cat', ['bat', 'cap']);
    expect(result.bestMatch).toBe('bat');
    expect(result.score).toBeCloseTo(2 / 3, 10);
    expect(result.passed).toBe(false);
  });

  it('scores an empty answer as 0 against the first meaning', () => {
    expect(evaluate('   ', ['too; also', 'even'])).toEqual({
      bestMatch: 'too; also',
      score: 0,
      passed: false,
    });
  });

  it('requires at least one acceptable meaning', () => {
    expect(() => evaluate('too', [])).toThrow(InvalidInputError);
  });

  it('returns the same result for the same input', () => {
    const first = evaluate('becuase', ['because; since']);
    const second = evaluate('becuase', ['because; since']);
    expect(second).toEqual(first);
    expect(first.score).toBeGreaterThanOrEqual(0);
    expect(first.score).toBeLessThanOrEqual(1);
  });
});
