import { closestMatch, sequenceRatio } from '../../../src/utils/similarity';

describe('sequenceRatio', () => {
  it('scores identical strings as 1', () => {
    expect(sequenceRatio('michael huang', 'michael huang')).toBe(1);
  });

  it('scores two empty strings as 1 and one empty string as 0', () => {
    expect(sequenceRatio('', '')).toBe(1);
    expect(sequenceRatio('abc', '')).toBe(0);
  });

  it('counts the longest common block', () => {
    expect(sequenceRatio('abcd', 'bcde')).toBe(0.75);
  });

  it('adds blocks found on either side of the longest one', () => {
    // "n smith" plus "jo"
    expect(sequenceRatio('john smith', 'jon smith')).toBeCloseTo(18 / 19, 10);
  });

  it('returns 0 when nothing is shared', () => {
    expect(sequenceRatio('abc', 'xyz')).toBe(0);
  });
});

describe('closestMatch', () => {
  it('picks the highest scoring candidate above the cutoff', () => {
    expect(closestMatch('appel', ['ape', 'apple', 'peach', 'puppy'], 0.6)).toBe('apple');
  });

  it('returns undefined when no candidate reaches the cutoff', () => {
    expect(closestMatch('zzz', ['apple', 'peach'], 0.6)).toBeUndefined();
  });

  it('accepts a candidate scoring exactly the cutoff', () => {
    expect(closestMatch('ab', ['ac'], 0.5)).toBe('ac');
  });

  it('breaks ties toward the lexicographically greater candidate', () => {
    expect(closestMatch('ab', ['ac', 'ad'], 0.5)).toBe('ad');
    expect(closestMatch('ab', ['ad', 'ac'], 0.5)).toBe('ad');
  });

  it('accepts any iterable of candidates', () => {
    const names = new Map([['jon smith', 1], ['jane doe', 2]]);
    expect(closestMatch('john smith', names.keys(), 0.6)).toBe('jon smith');
  });
});
