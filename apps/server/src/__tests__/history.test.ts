// apps/server/src/__tests__/history.test.ts
//
// History query: cutoff, ordering, the empty response and the text budget.

import { queryHistory } from '../history.js';
import { markUsed } from '../state/botState.js';
import type { StateStore } from '../state/store.js';
import { freshStore, tempDir } from './helpers.js';

const now = new Date('2026-03-20T12:00:00Z');
const HEADER = 'Previous starting words for the last 14 days\n';

describe('queryHistory', () => {
  let store: StateStore;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    const tmp = await tempDir();
    cleanup = tmp.cleanup;
    store = await freshStore(tmp.dir);
  });
  afterEach(async () => {
    await cleanup();
  });

  it('keeps entries from the cutoff on, newest first, same date by word', async () => {
    await store.withWrite((s) => {
      markUsed(s, '2026-03-05', 'crane');
      markUsed(s, '2026-03-06', 'slate');
      markUsed(s, '2026-03-18', 'nymph', 'u1');
      markUsed(s, '2026-03-18', 'fjord');
      markUsed(s, '2026-03-19', 'kayak');
    });

    const report = await queryHistory(store, { timeZone: 'UTC', now });

    expect(report.days).toBe(14);
    expect(report.empty).toBe(false);
    expect(report.entries.map((e) => e.word)).toEqual(['kayak', 'fjord', 'nymph', 'slate']);
    expect(report.text).toBe(
      HEADER +
        '2026-03-19: `kayak`\n' +
        '2026-03-18: `fjord`\n' +
        '2026-03-18: `nymph`\n' +
        '2026-03-06: `slate`\n',
    );
  });

  it('answers explicitly when nothing qualifies', async () => {
    await store.withWrite((s) => markUsed(s, '2026-01-01', 'crane'));
    const report = await queryHistory(store, { timeZone: 'UTC', daysBack: 1, now });
    expect(report).toEqual({
      days: 1,
      empty: true,
      entries: [],
      text: 'No entries in the last 1 days.',
    });
  });

  it('clamps the window to 1–3650 days', async () => {
    expect((await queryHistory(store, { timeZone: 'UTC', daysBack: 0, now })).days).toBe(1);
    expect((await queryHistory(store, { timeZone: 'UTC', daysBack: 99_999, now })).days).toBe(3650);
  });

  it('stops adding lines before the text budget is exceeded', async () => {
    await store.withWrite((s) => {
      for (let i = 0; i < 200; i++) markUsed(s, '2026-03-19', `w${String(i).padStart(4, '0')}`);
    });

    const report = await queryHistory(store, { timeZone: 'UTC', now });

    // every line is 20 characters: "2026-03-19: `w0000`\n"
    expect(report.entries).toHaveLength(92);
    expect(report.entries[0].word).toBe('w0000');
    expect(report.entries[91].word).toBe('w0091');
    expect(report.text.length).toBe(HEADER.length + 92 * 20);
  });

  it('counts days in the configured timezone', async () => {
    await store.withWrite((s) => markUsed(s, '2026-03-05', 'crane'));
    // 03:00Z on the 20th is still the 19th in New York, so the cutoff is the 5th
    const report = await queryHistory(store, {
      timeZone: 'America/New_York',
      now: new Date('2026-03-20T03:00:00Z'),
    });
    expect(report.entries.map((e) => e.word)).toEqual(['crane']);
  });
});
