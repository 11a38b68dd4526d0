// packages/lexicon/src/index.ts
//
// Entry point for the lexicon package.
// Re-exports the scorer, the lexicon builder and the weighted sampler so
// consumers can import from one place.
//
// Includes:
//   • stats.ts    → corpus letter/bigram counts (computeStats)
//   • scoring.ts  → difficulty features and score (scoreWord, DEFAULT_WEIGHTS)
//   • lexicon.ts  → source parsing, scored lexicon, ranking
//   • sampler.ts  → weighted fallback draw (pickWeighted)
//   • random.ts   → pluggable random sources
//
// Example usage:
//   import { buildLexicon, pickWeighted } from '@daily-starter/lexicon';

export * from './stats.js';
export * from './scoring.js';
export * from './lexicon.js';
export * from './sampler.js';
export * from './random.js';
