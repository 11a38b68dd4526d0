// packages/lexicon/src/__tests__/lexicon.test.ts
//
// Unit tests for source parsing, lexicon building and ranking.

import {
  buildLexicon,
  computeStats,
  parseCandidates,
  rankLexicon,
  scoreWord,
} from '../index.js';

describe('parseCandidates', () => {
  it('keeps trimmed, lowercased 5-letter a–z tokens only', () => {
    const source = '  Crane\nslate\r\nabc\nTOOLONG\nsl4te\ncrane\n\n';
    expect(parseCandidates(source)).toEqual(['crane', 'slate', 'crane']);
  });

  it('returns nothing for an empty source', () => {
    expect(parseCandidates('')).toEqual([]);
  });
});

describe('buildLexicon', () => {
  it('scores every candidate against stats of the filtered set', () => {
    const lexicon = buildLexicon('CRANE\nslate\nnope\n');
    const stats = computeStats(['crane', 'slate']);

    expect([...lexicon.keys()]).toEqual(['crane', 'slate']);
    expect(lexicon.get('crane')).toBe(scoreWord('crane', stats));
    expect(lexicon.get('slate')).toBe(scoreWord('slate', stats));
  });

  it('counts repeated lines in the stats but lists each word once', () => {
    const lexicon = buildLexicon('crane\nfjord\ncrane\ncrane\n');
    const stats = computeStats(['crane', 'fjord', 'crane', 'crane']);

    expect([...lexicon.keys()]).toEqual(['crane', 'fjord']);
    expect(lexicon.get('fjord')).toBe(scoreWord('fjord', stats));
    expect(lexicon.get('fjord')).not.toBe(scoreWord('fjord', computeStats(['crane', 'fjord'])));
  });
});

describe('rankLexicon', () => {
  const lexicon = new Map([
    ['aaaaa', 1],
    ['ccccc', 3],
    ['bbbbb', 3],
    ['ddddd', 2],
  ]);

  it('lists the hardest words first, ties by word', () => {
    expect(rankLexicon(lexicon, 3).map((r) => r.word)).toEqual([
      'bbbbb',
      'ccccc',
      'ddddd',
    ]);
  });

  it('lists the easiest words first when asked', () => {
    expect(rankLexicon(lexicon, 2, 'easiest')).toEqual([
      { word: 'aaaaa', score: 1 },
      { word: 'ddddd', score: 2 },
    ]);
  });

  it('returns nothing for n = 0', () => {
    expect(rankLexicon(lexicon, 0)).toEqual([]);
  });
});
