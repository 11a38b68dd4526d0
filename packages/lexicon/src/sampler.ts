// packages/lexicon/src/sampler.ts
//
// Weighted fallback picker.
//
// Every lexicon word outside the exclusion set gets the weight
//   (max(score, 0) + ε) ^ alpha
// and one word is drawn with probability proportional to its weight.
// alpha > 1 sharpens the preference for high-scoring (rare, odd) words.

import type { Lexicon } from './lexicon.js';
import { cryptoRandom, type RandomSource } from './random.js';

export const DEFAULT_ALPHA = 2.0;

const EPSILON = 1e-6;

/**
 * pickWeighted draws one word, or returns undefined when no candidate with a
 * positive, finite weight is left after exclusion.
 */
export function pickWeighted(
  lexicon: Lexicon,
  exclude?: ReadonlySet<string>,
  alpha: number = DEFAULT_ALPHA,
  random: RandomSource = cryptoRandom,
): string | undefined {
  const keys: string[] = [];
  const weights: number[] = [];
  let total = 0;

  for (const [word, score] of lexicon) {
    if (exclude?.has(word)) continue;
    const wt = (Math.max(score, 0) + EPSILON) ** alpha;
    if (Number.isFinite(wt) && wt > 0) {
      keys.push(word);
      weights.push(wt);
      total += wt;
    }
  }
  if (keys.length === 0 || !Number.isFinite(total)) return undefined;

  const r = random() * total;
  let acc = 0;
  for (let i = 0; i < keys.length; i++) {
    acc += weights[i];
    if (r < acc) return keys[i];
  }
  // floating-point slack when r lands on the very top of the range
  return keys[keys.length - 1];
}
