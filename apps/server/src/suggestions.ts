// apps/server/src/suggestions.ts
//
// Suggestion intake. Checks run in a fixed order and the first failing one
// decides the rejection:
//   1. invalid_format  → not 5 a–z letters after trim + lowercase
//   2. not_in_lexicon
//   3. already_used
//   4. already_queued  → case-insensitive against the current queue
//
// Accepted words go to the back of the queue; the next cycle drains it.

import type { Lexicon } from '@daily-starter/lexicon';
import type { RejectionReason, SuggestionOutcome } from '@daily-starter/protocol';
import type { BotState } from './state/botState.js';
import type { StateStore } from './state/store.js';

export const REJECTION_MESSAGES: Record<RejectionReason, string> = {
  invalid_format: 'Rejected: provide a 5-letter a–z word.',
  not_in_lexicon: 'Rejected: not in dictionary.',
  already_used: 'Rejected: already used previously.',
  already_queued: 'Already queued.',
};

function reject(reason: RejectionReason): SuggestionOutcome {
  return { status: 'rejected', reason, message: REJECTION_MESSAGES[reason] };
}

function stateConflict(state: Readonly<BotState>, word: string): RejectionReason | null {
  if (state.used.has(word)) return 'already_used';
  if (state.queue.some((q) => q.word.toLowerCase() === word)) return 'already_queued';
  return null;
}

export async function submitSuggestion(
  store: StateStore,
  lexicon: Lexicon,
  submitterId: string,
  rawWord: string,
): Promise<SuggestionOutcome> {
  const word = rawWord.trim().toLowerCase();
  if (!/^[a-z]{5}$/.test(word)) return reject('invalid_format');
  if (!lexicon.has(word)) return reject('not_in_lexicon');

  const early = await store.withRead((s) => stateConflict(s, word));
  if (early) return reject(early);

  // re-checked under the write lock: another request may have won the race
  const late = await store.withWrite((s) => {
    const conflict = stateConflict(s, word);
    if (!conflict) s.queue.push({ submitterId, word });
    return conflict;
  });
  if (late) return reject(late);

  return { status: 'accepted', word };
}
