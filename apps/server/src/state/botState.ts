// apps/server/src/state/botState.ts
//
// In-memory shape of the service state and its snapshot conversions.
//
//   used    → every word ever selected (never selected again)
//   history → append-only date → word log, in insertion order
//   queue   → suggestions waiting for a cycle, front first

import type {
  QueuedSuggestion,
  StateSnapshot,
  UsedEntry,
} from '@daily-starter/protocol';

export interface BotState {
  used: Set<string>;
  history: UsedEntry[];
  queue: QueuedSuggestion[];
}

export function emptyState(): BotState {
  return { used: new Set(), history: [], queue: [] };
}

export function markUsed(
  state: BotState,
  date: string,
  word: string,
  suggesterId?: string,
): void {
  state.used.add(word);
  const entry: UsedEntry = { date, word };
  if (suggesterId !== undefined) entry.suggesterId = suggesterId;
  state.history.push(entry);
}

/** Latest history entry for `date`, if any. */
export function findEntry(state: BotState, date: string): UsedEntry | undefined {
  for (let i = state.history.length - 1; i >= 0; i--) {
    if (state.history[i].date === date) return state.history[i];
  }
  return undefined;
}

export function toSnapshot(state: BotState): StateSnapshot {
  return {
    used: [...state.used].sort(),
    history: state.history.map((e) => ({ ...e })),
    queue: state.queue.map((q) => ({ ...q })),
  };
}

/**
 * Rebuilds the state from a validated snapshot. History words missing from
 * `used` are added back and returned so the caller can report them.
 */
export function fromSnapshot(snapshot: StateSnapshot): {
  state: BotState;
  repaired: string[];
} {
  const state: BotState = {
    used: new Set(snapshot.used),
    history: snapshot.history.map((e) => ({ ...e })),
    queue: snapshot.queue.map((q) => ({ ...q })),
  };
  const repaired: string[] = [];
  for (const e of state.history) {
    if (!state.used.has(e.word)) {
      state.used.add(e.word);
      repaired.push(e.word);
    }
  }
  return { state, repaired };
}
