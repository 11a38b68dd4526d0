// apps/server/src/scheduler/dailyCycle.ts
//
// One cycle = make sure tomorrow's date has a word, then announce it.
//
//   1. Reuse     → tomorrow already in history (an earlier cycle selected it
//                  but may not have announced): announce that entry again
//   2. Queue     → first queued suggestion that is in the lexicon and unused;
//                  everything popped before it is dropped
//   3. Fallback  → weighted draw over unused words (alpha = 2)
//   4. Announce
//
// No step is retried inside a cycle; the next cycle is the retry.

import type { Logger } from 'pino';
import { pickWeighted, type Lexicon, type RandomSource } from '@daily-starter/lexicon';
import type { Announcer } from '../announce/announcer.js';
import { NoCandidateError, NotificationDeliveryError, errorMessage } from '../errors.js';
import { findEntry, markUsed } from '../state/botState.js';
import type { StateStore } from '../state/store.js';
import { addDays, localDate } from '../time/zonedClock.js';

export const SAMPLE_ALPHA = 2.0;

export type CycleSource = 'reused' | 'queue' | 'sampler';

export interface CycleOutcome {
  date: string;
  word: string;
  suggesterId?: string;
  source: CycleSource;
}

export interface CycleDeps {
  store: StateStore;
  lexicon: Lexicon;
  announcer: Announcer;
  timeZone: string;
  log: Logger;
  now?: () => Date;
  random?: RandomSource;
}

async function select(deps: CycleDeps, target: string): Promise<CycleOutcome> {
  const { store, lexicon, log } = deps;

  const existing = await store.withRead((s) => {
    const e = findEntry(s, target);
    return e ? { ...e } : undefined;
  });
  if (existing) {
    log.info({ date: target, word: existing.word }, 'reusing existing selection');
    return { ...existing, source: 'reused' };
  }

  const fromQueue = await store.withWrite((s) => {
    let next = s.queue.shift();
    while (next) {
      const w = next.word.toLowerCase();
      if (lexicon.has(w) && !s.used.has(w)) {
        markUsed(s, target, w, next.submitterId);
        return { word: w, suggesterId: next.submitterId };
      }
      log.debug({ word: next.word, submitterId: next.submitterId }, 'dropping queued suggestion');
      next = s.queue.shift();
    }
    return undefined;
  });
  if (fromQueue) {
    log.info({ date: target, word: fromQueue.word }, 'selected queued suggestion');
    return { date: target, ...fromQueue, source: 'queue' };
  }

  const used = await store.withRead((s) => new Set(s.used));
  const word = pickWeighted(lexicon, used, SAMPLE_ALPHA, deps.random);
  if (word === undefined) throw new NoCandidateError();
  await store.withWrite((s) => markUsed(s, target, word));
  log.info({ date: target, word }, 'selected weighted fallback');
  return { date: target, word, source: 'sampler' };
}

export async function runDailyCycle(deps: CycleDeps): Promise<CycleOutcome> {
  const now = (deps.now ?? (() => new Date()))();
  const target = addDays(localDate(now, deps.timeZone), 1);

  const outcome = await select(deps, target);

  try {
    await deps.announcer.announce({
      date: outcome.date,
      word: outcome.word,
      suggesterId: outcome.suggesterId,
    });
  } catch (err) {
    throw err instanceof NotificationDeliveryError
      ? err
      : new NotificationDeliveryError(errorMessage(err), { cause: err });
  }
  return outcome;
}
