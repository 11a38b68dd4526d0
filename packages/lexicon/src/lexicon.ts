// packages/lexicon/src/lexicon.ts
//
// Builds the scored lexicon from raw source text.
//
// The source is plain text, one candidate per line, in any case and with any
// surrounding whitespace. Only tokens of exactly 5 ASCII letters survive.
// Corpus statistics are computed once over the surviving lines, repeats
// included, then every distinct word is scored against them. The result never changes after startup.

import { computeStats } from './stats.js';
import { DEFAULT_WEIGHTS, scoreWord, type Weights } from './scoring.js';

/** word → difficulty score. Read-only once built. */
export type Lexicon = ReadonlyMap<string, number>;

export type RankOrder = 'hardest' | 'easiest';

export interface RankedWord {
  word: string;
  score: number;
}

/**
 * parseCandidates extracts the 5-letter words from a source text, in source
 * order. Repeated lines are kept.
 */
export function parseCandidates(sourceText: string): string[] {
  const words: string[] = [];
  for (const line of sourceText.split(/\r?\n/)) {
    const w = line.trim().toLowerCase();
    if (/^[a-z]{5}$/.test(w)) words.push(w);
  }
  return words;
}

export function buildLexicon(
  sourceText: string,
  weights: Readonly<Weights> = DEFAULT_WEIGHTS,
): Lexicon {
  const words = parseCandidates(sourceText);
  const stats = computeStats(words);
  const lexicon = new Map<string, number>();
  for (const w of words) {
    if (!lexicon.has(w)) lexicon.set(w, scoreWord(w, stats, weights));
  }
  return lexicon;
}

/**
 * rankLexicon lists the n hardest (or easiest) words.
 * Equal scores are ordered by word ascending in both directions.
 */
export function rankLexicon(
  lexicon: Lexicon,
  n: number,
  order: RankOrder = 'hardest',
): RankedWord[] {
  const rows = [...lexicon].map(([word, score]) => ({ word, score }));
  rows.sort((a, b) => {
    const diff = order === 'hardest' ? b.score - a.score : a.score - b.score;
    return diff !== 0 ? diff : a.word < b.word ? -1 : a.word > b.word ? 1 : 0;
  });
  return rows.slice(0, Math.max(0, n));
}
