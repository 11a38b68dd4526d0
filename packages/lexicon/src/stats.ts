// packages/lexicon/src/stats.ts
//
// Corpus statistics over the candidate list.
// Letter and adjacent-bigram counts are what the difficulty scorer uses to
// measure how unusual a word is relative to everything else in the lexicon.
//
// Every word is exactly 5 letters, so the totals are simply
//   letters = words × 5
//   bigrams = words × 4

export interface CorpusStats {
  letterCounts: ReadonlyMap<string, number>;
  bigramCounts: ReadonlyMap<string, number>;
  totalLetters: number;
  totalBigrams: number;
}

/** Floor applied to every frequency so the log-inverse never blows up. */
export const MIN_FREQUENCY = 1e-6;

export function computeStats(words: readonly string[]): CorpusStats {
  const letterCounts = new Map<string, number>();
  const bigramCounts = new Map<string, number>();

  for (const w of words) {
    for (const c of w) {
      letterCounts.set(c, (letterCounts.get(c) ?? 0) + 1);
    }
    for (let i = 0; i < 4; i++) {
      const bg = w.slice(i, i + 2);
      bigramCounts.set(bg, (bigramCounts.get(bg) ?? 0) + 1);
    }
  }

  return {
    letterCounts,
    bigramCounts,
    totalLetters: words.length * 5,
    totalBigrams: words.length * 4,
  };
}

/**
 * Relative frequency of a corpus item, floored at MIN_FREQUENCY.
 * Items the corpus never saw count as one occurrence.
 */
export function frequency(
  counts: ReadonlyMap<string, number>,
  key: string,
  total: number,
): number {
  if (total <= 0) return MIN_FREQUENCY;
  return Math.max((counts.get(key) ?? 1) / total, MIN_FREQUENCY);
}

/** ln(1/freq): larger for rarer letters and bigrams. */
export function rarity(
  counts: ReadonlyMap<string, number>,
  key: string,
  total: number,
): number {
  return Math.log(1 / frequency(counts, key, total));
}
