// apps/server/src/__tests__/helpers.ts
//
// Shared fixtures: a silent logger, a throwaway state directory and a small
// lexicon built from fixed words.

import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { pino } from 'pino';
import { buildLexicon } from '@daily-starter/lexicon';
import type { Announcement } from '@daily-starter/protocol';
import type { Announcer } from '../announce/announcer.js';
import { StateStore } from '../state/store.js';

export const silentLog = pino({ level: 'silent' });

export const WORDS = ['crane', 'slate', 'fjord', 'nymph', 'crwth', 'kayak', 'llama', 'qajaq'];

export const lexicon = buildLexicon(WORDS.join('\n'));

export async function tempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'daily-starter-'));
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}

export async function freshStore(dir: string, name = 'state.json'): Promise<StateStore> {
  const store = new StateStore(path.join(dir, name), silentLog);
  await store.load();
  return store;
}

export class RecordingAnnouncer implements Announcer {
  readonly sent: Announcement[] = [];
  failNext = false;

  async announce(a: Announcement): Promise<void> {
    if (this.failNext) {
      this.failNext = false;
      throw new Error('channel unavailable');
    }
    this.sent.push(a);
  }
}
