// packages/lexicon/src/__tests__/sampler.test.ts
//
// Unit tests for pickWeighted().
//
// Goal: the sampler never returns an excluded word, returns undefined exactly
// when no positive-weight candidate is left, and prefers high scores.
// A seeded or stubbed random source keeps every run reproducible.

import { buildLexicon, pickWeighted, seededRandom } from '../index.js';

describe('pickWeighted', () => {
  const words = ['crane', 'slate', 'fjord', 'nymph', 'crwth', 'kayak', 'llama', 'qajaq'];
  const lexicon = buildLexicon(words.join('\n'));

  it('returns undefined for an empty lexicon', () => {
    expect(pickWeighted(new Map(), undefined, 2, seededRandom(1))).toBeUndefined();
  });

  it('returns undefined when everything is excluded', () => {
    expect(pickWeighted(lexicon, new Set(words), 2, seededRandom(1))).toBeUndefined();
  });

  it('never returns an excluded word', () => {
    for (let k = 0; k < words.length; k++) {
      const exclude = new Set(words.slice(0, k));
      const random = seededRandom(k + 1);
      for (let i = 0; i < 200; i++) {
        const w = pickWeighted(lexicon, exclude, 2, random);
        expect(w).toBeDefined();
        expect(exclude.has(w ?? '')).toBe(false);
        expect(lexicon.has(w ?? '')).toBe(true);
      }
    }
  });

  it('maps the bottom and top of the random range onto the first and last candidate', () => {
    const scores = new Map([
      ['alpha', 10],
      ['bravo', 1],
    ]);
    expect(pickWeighted(scores, undefined, 2, () => 0)).toBe('alpha');
    expect(pickWeighted(scores, undefined, 2, () => 0.9999999)).toBe('bravo');
  });

  it('prefers the higher score by a wide margin at alpha = 2', () => {
    const scores = new Map([
      ['alpha', 10],
      ['bravo', 1],
    ]);
    const random = seededRandom(42);
    let alpha = 0;
    for (let i = 0; i < 10_000; i++) {
      if (pickWeighted(scores, undefined, 2, random) === 'alpha') alpha++;
    }
    // expected share is 100/101
    expect(alpha).toBeGreaterThan(9_000);
  });

  it('still draws from words whose scores are negative', () => {
    const scores = new Map([['minus', -5]]);
    expect(pickWeighted(scores, undefined, 2, () => 0.5)).toBe('minus');
  });

  it('drops weights that underflow to zero or overflow to infinity', () => {
    expect(pickWeighted(new Map([['minus', -5]]), undefined, 100, () => 0)).toBeUndefined();

    const scores = new Map([
      ['giant', Number.POSITIVE_INFINITY],
      ['plain', 1],
    ]);
    expect(pickWeighted(scores, undefined, 2, () => 0)).toBe('plain');
  });
});
