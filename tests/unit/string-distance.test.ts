import { describe, it, expect } from 'vitest';
import { editDistance, suggestClosest } from '../../src/utils/string-distance.js';

describe('editDistance', () => {
  it('counts single-character edits', () => {
    expect(editDistance('kitten', 'sitting')).toBe(3);
    expect(editDistance('', 'abc')).toBe(3);
    expect(editDistance('Sleep', 'sleep')).toBe(0);
  });
});

describe('suggestClosest', () => {
  const candidates = ['sleep', 'switch', 'set-state'];

  it('returns the nearest candidate within a third of the length', () => {
    expect(suggestClosest('slep', candidates)).toBe('sleep');
    expect(suggestClosest('set-stat', candidates)).toBe('set-state');
  });

  it('returns undefined when nothing is close', () => {
    expect(suggestClosest('timeout', candidates)).toBeUndefined();
  });

  it('prefers the earlier candidate on a tie', () => {
    expect(suggestClosest('ab', ['ac', 'ad'])).toBe('ac');
  });
});
