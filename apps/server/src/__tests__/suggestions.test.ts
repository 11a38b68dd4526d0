// apps/server/src/__tests__/suggestions.test.ts
//
// Suggestion intake: each rejection reason, normalization and the
// duplicate check under concurrent submissions.

import { markUsed } from '../state/botState.js';
import type { StateStore } from '../state/store.js';
import { REJECTION_MESSAGES, submitSuggestion } from '../suggestions.js';
import { freshStore, lexicon, tempDir } from './helpers.js';

describe('submitSuggestion', () => {
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

  it('rejects anything that is not 5 a–z letters', async () => {
    for (const word of ['abcd', 'ab1de', 'cranes', '']) {
      expect(await submitSuggestion(store, lexicon, 'u1', word)).toEqual({
        status: 'rejected',
        reason: 'invalid_format',
        message: REJECTION_MESSAGES.invalid_format,
      });
    }
  });

  it('normalizes case and whitespace, then queues the word', async () => {
    expect(await submitSuggestion(store, lexicon, 'u1', '  CRANE ')).toEqual({
      status: 'accepted',
      word: 'crane',
    });
    expect(await store.withRead((s) => s.queue)).toEqual([{ submitterId: 'u1', word: 'crane' }]);
  });

  it('rejects words outside the lexicon', async () => {
    const outcome = await submitSuggestion(store, lexicon, 'u1', 'zebra');
    expect(outcome).toMatchObject({ status: 'rejected', reason: 'not_in_lexicon' });
  });

  it('rejects words that were already selected', async () => {
    await store.withWrite((s) => markUsed(s, '2026-03-01', 'slate'));
    const outcome = await submitSuggestion(store, lexicon, 'u1', 'slate');
    expect(outcome).toMatchObject({ status: 'rejected', reason: 'already_used' });
  });

  it('rejects words already waiting in the queue, ignoring case', async () => {
    await submitSuggestion(store, lexicon, 'u1', 'fjord');
    expect(await submitSuggestion(store, lexicon, 'u2', ' FJORD ')).toMatchObject({
      status: 'rejected',
      reason: 'already_queued',
      message: 'Already queued.',
    });

    await store.withWrite((s) => s.queue.push({ submitterId: 'u3', word: 'NYMPH' }));
    expect(await submitSuggestion(store, lexicon, 'u4', 'nymph')).toMatchObject({
      reason: 'already_queued',
    });
  });

  it('accepts only one of two concurrent identical suggestions', async () => {
    const outcomes = await Promise.all([
      submitSuggestion(store, lexicon, 'u1', 'kayak'),
      submitSuggestion(store, lexicon, 'u2', 'kayak'),
    ]);
    expect(outcomes.map((o) => o.status).sort()).toEqual(['accepted', 'rejected']);
    expect(await store.withRead((s) => s.queue.length)).toBe(1);
  });
});
