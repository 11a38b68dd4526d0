// apps/server/src/history.ts
//
// Past selections for the last N days, rendered for a chat message.
//
// Rows are sorted newest date first, same-date rows by word. Lines are added
// until the next one would push the text past HISTORY_TEXT_BUDGET.

import {
  HISTORY_DEFAULT_DAYS,
  HISTORY_MAX_DAYS,
  type HistoryReport,
  type UsedEntry,
} from '@daily-starter/protocol';
import type { StateStore } from './state/store.js';
import { addDays, localDate } from './time/zonedClock.js';

export const HISTORY_TEXT_BUDGET = 1900;

export interface HistoryQuery {
  timeZone: string;
  daysBack?: number;
  now?: Date;
}

export function compareEntries(a: UsedEntry, b: UsedEntry): number {
  if (a.date !== b.date) return a.date < b.date ? 1 : -1;
  return a.word < b.word ? -1 : a.word > b.word ? 1 : 0;
}

export async function queryHistory(
  store: StateStore,
  { timeZone, daysBack = HISTORY_DEFAULT_DAYS, now = new Date() }: HistoryQuery,
): Promise<HistoryReport> {
  const days = Math.min(Math.max(Math.trunc(daysBack), 1), HISTORY_MAX_DAYS);
  const cutoff = addDays(localDate(now, timeZone), -days);

  const rows = await store.withRead((s) =>
    s.history.filter((e) => e.date >= cutoff).map((e) => ({ ...e })),
  );
  rows.sort(compareEntries);

  if (rows.length === 0) {
    return { days, empty: true, entries: [], text: `No entries in the last ${days} days.` };
  }

  let text = `Previous starting words for the last ${days} days\n`;
  const entries: UsedEntry[] = [];
  for (const e of rows) {
    const line = `${e.date}: \`${e.word}\`\n`;
    if (text.length + line.length > HISTORY_TEXT_BUDGET) break;
    text += line;
    entries.push(e);
  }
  return { days, empty: false, entries, text };
}
