// packages/lexicon/src/random.ts
//
// Pluggable random sources for the sampler.
//   • cryptoRandom → full-entropy default used in production
//   • seededRandom → deterministic, for tests and reproducible runs

import { randomInt } from 'node:crypto';

/** Returns a number in [0, 1). */
export type RandomSource = () => number;

// randomInt needs max - min < 2^48
const SCALE = 2 ** 48 - 1;

export const cryptoRandom: RandomSource = () => randomInt(SCALE) / SCALE;

/**
 * Mulberry32, a small 32-bit seeded PRNG.
 * The same seed always yields the same sequence.
 */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
