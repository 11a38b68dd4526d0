// packages/lexicon/src/scoring.ts
//
// Word difficulty scoring, shared by the lexicon builder and the server.
// A score is a fixed-weight linear combination of per-word features. Some
// features look only at the word itself (vowels, repeats, patterns), the rest
// measure how rare its letters and bigrams are across the whole corpus.
//
// Higher score → more unusual word → preferred by the weighted sampler.
//
// Rules:
//   • Words must be exactly 5 characters, lowercase a–z.
//   • The score is pure: same word + same stats + same weights → same number.
//   • The score is always finite, even for words the corpus never saw.

import { rarity, type CorpusStats } from './stats.js';

export interface Weights {
  // corpus
  rareLetter: number; // × Σ ln(1/freq) per letter
  rareBoost: number; // added inside the letter sum for each j,q,x,z,k,v,w,y
  rareBigram: number; // × Σ ln(1/freq) per bigram

  // word-local
  noVowelsY: number; // none of a,e,i,o,u,y
  noVowels: number; // y is the only vowel
  lowVowelRatio: number;
  adjDouble: number;
  maxConsonantCluster: number;
  dupExtra: number; // per extra occurrence of a letter, adjacent or not
  lowUnique: number;
  ababa: number;
  repeatedBigram: number;
  qWithoutU: number;
}

export const DEFAULT_WEIGHTS: Readonly<Weights> = Object.freeze({
  rareLetter: 0.35,
  rareBoost: 0.25,
  rareBigram: 0.2,
  noVowelsY: 9.0,
  noVowels: 5.0,
  lowVowelRatio: 2.0,
  adjDouble: 1.0,
  maxConsonantCluster: 1.0,
  dupExtra: 1.6,
  lowUnique: 0.7,
  ababa: 3.0,
  repeatedBigram: 1.2,
  qWithoutU: 2.0,
});

const VOWELS = new Set(['a', 'e', 'i', 'o', 'u']);
const VOWELS_Y = new Set(['a', 'e', 'i', 'o', 'u', 'y']);
const RARE_LETTERS = new Set(['j', 'q', 'x', 'z', 'k', 'v', 'w', 'y']);

/**
 * Raw feature values for one word. Flags are 0 or 1 so that every feature
 * combines the same way: weight × value.
 */
export interface WordFeatures {
  noVowelsY: number;
  noVowels: number;
  lowVowelRatio: number;
  /** Σ ln(1/freq) over the five letters. */
  letterRarity: number;
  /** How many of the five letters are in the rare set. */
  rareLetterCount: number;
  /** Σ ln(1/freq) over the four adjacent bigrams. */
  bigramRarity: number;
  adjDoubles: number;
  maxConsonantRun: number;
  dupExtra: number;
  lowUnique: number;
  ababa: number;
  repeatedBigrams: number;
  qWithoutU: number;
}

export function wordFeatures(word: string, stats: CorpusStats): WordFeatures {
  const w = word.toLowerCase();
  if (!/^[a-z]{5}$/.test(w)) throw new Error(`Not a 5-letter a–z word: ${word}`);
  const letters = [...w];

  const hasVowel = letters.some((c) => VOWELS.has(c));
  const hasVowelY = letters.some((c) => VOWELS_Y.has(c));
  const vowelRatio = letters.filter((c) => VOWELS.has(c)).length / 5;

  const counts = new Map<string, number>();
  for (const c of letters) counts.set(c, (counts.get(c) ?? 0) + 1);
  let dupExtra = 0;
  for (const k of counts.values()) dupExtra += k - 1;

  let adjDoubles = 0;
  for (let i = 0; i < 4; i++) if (letters[i] === letters[i + 1]) adjDoubles++;

  // y counts as a vowel here
  let best = 0;
  let cur = 0;
  for (const c of letters) {
    if (VOWELS_Y.has(c)) {
      cur = 0;
    } else {
      cur++;
      best = Math.max(best, cur);
    }
  }

  const [p0, p1, p2, p3, p4] = letters;
  const ababa = p0 === p2 && p2 === p4 && p0 !== p1 && p1 === p3 ? 1 : 0;

  const bigrams = [0, 1, 2, 3].map((i) => w.slice(i, i + 2));
  const seen = new Set<string>();
  let repeatedBigrams = 0;
  for (const bg of bigrams) {
    if (seen.has(bg)) repeatedBigrams++;
    else seen.add(bg);
  }

  let letterRarity = 0;
  let rareLetterCount = 0;
  for (const ch of letters) {
    letterRarity += rarity(stats.letterCounts, ch, stats.totalLetters);
    if (RARE_LETTERS.has(ch)) rareLetterCount++;
  }
  let bigramRarity = 0;
  for (const bg of bigrams) {
    bigramRarity += rarity(stats.bigramCounts, bg, stats.totalBigrams);
  }

  return {
    noVowelsY: hasVowelY ? 0 : 1,
    noVowels: hasVowelY && !hasVowel ? 1 : 0,
    lowVowelRatio: vowelRatio < 0.2 ? 1 : 0,
    letterRarity,
    rareLetterCount,
    bigramRarity,
    adjDoubles,
    maxConsonantRun: best,
    dupExtra,
    lowUnique: Math.max(5 - counts.size, 0),
    ababa,
    repeatedBigrams,
    qWithoutU: w.includes('q') && !w.includes('u') ? 1 : 0,
  };
}

/**
 * scoreWord combines a word's features into its difficulty score.
 *
 * The rare-letter boost is added inside the letter-rarity sum, so it is
 * scaled by `rareLetter` together with the log terms.
 *
 * Example:
 *   stats over ["abcde"], word "abcde"
 *   → 0.35·5·ln 5 + 0.20·4·ln 4 + 1.0·3 ≈ 6.9256
 */
export function scoreWord(
  word: string,
  stats: CorpusStats,
  weights: Readonly<Weights> = DEFAULT_WEIGHTS,
): number {
  const f = wordFeatures(word, stats);
  let score = 0;

  score += weights.noVowelsY * f.noVowelsY;
  score += weights.noVowels * f.noVowels;
  score += weights.lowVowelRatio * f.lowVowelRatio;

  score +=
    weights.rareLetter *
    (f.letterRarity + weights.rareBoost * f.rareLetterCount);
  score += weights.rareBigram * f.bigramRarity;
  score += weights.adjDouble * f.adjDoubles;
  score += weights.maxConsonantCluster * f.maxConsonantRun;
  score += weights.dupExtra * f.dupExtra;
  score += weights.lowUnique * f.lowUnique;
  score += weights.ababa * f.ababa;
  score += weights.repeatedBigram * f.repeatedBigrams;
  score += weights.qWithoutU * f.qWithoutU;

  return score;
}
