// apps/server/src/state/store.ts
//
// Durable, lock-guarded home of the service state.
//
// Callers never see the lock. They get two scoped accessors:
//   • withRead(fn)  → fn runs under the shared lock, nothing is written
//   • withWrite(fn) → fn runs under the exclusive lock and the full state is
//                     persisted before the lock is released
//
// Persisting writes `<path>.tmp`, fsyncs it, then renames it over `<path>`,
// so a reader of the file sees either the old snapshot or the new one.

import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { Logger } from 'pino';
import { stateSnapshotSchema } from '@daily-starter/protocol';
import { StateLoadError, StatePersistError, errorMessage } from '../errors.js';
import { emptyState, fromSnapshot, toSnapshot, type BotState } from './botState.js';
import { ReadWriteLock } from './rwLock.js';

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class StateStore {
  private state: BotState = emptyState();
  private readonly lock = new ReadWriteLock();
  private persistError: StatePersistError | null = null;

  constructor(
    readonly filePath: string,
    private readonly log: Logger,
  ) {}

  get tempPath(): string {
    return `${this.filePath}.tmp`;
  }

  /** Most recent persist failure; cleared by the next successful write. */
  get lastPersistError(): StatePersistError | null {
    return this.persistError;
  }

  /**
   * Loads the snapshot. A missing file leaves the empty state in place;
   * unreadable or malformed content is a StateLoadError.
   */
  async load(): Promise<void> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (err) {
      if (isNotFound(err)) {
        this.log.info({ file: this.filePath }, 'no state snapshot yet, starting empty');
        return;
      }
      throw new StateLoadError(`Failed to read ${this.filePath}: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new StateLoadError(`Malformed JSON in ${this.filePath}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    const parsed = stateSnapshotSchema.safeParse(json);
    if (!parsed.success) {
      throw new StateLoadError(`Invalid snapshot in ${this.filePath}`, { cause: parsed.error });
    }

    const { state, repaired } = fromSnapshot(parsed.data);
    if (repaired.length > 0) {
      this.log.warn({ words: repaired }, 'history words missing from used set, re-added');
    }
    await this.lock.withWrite(() => {
      this.state = state;
    });
    this.log.info(
      { used: state.used.size, history: state.history.length, queue: state.queue.length },
      'state loaded',
    );
  }

  /**
   * Writes the current state to disk. Throws StatePersistError on failure.
   * Holds the exclusive lock, as every persist shares one temp file.
   */
  async save(): Promise<void> {
    await this.lock.withWrite(() => this.persist());
  }

  withRead<R>(fn: (state: Readonly<BotState>) => R | Promise<R>): Promise<R> {
    return this.lock.withRead(() => fn(this.state));
  }

  /**
   * Mutates the state and persists it before returning. A failed persist is
   * logged and recorded, but the in-memory mutation stands.
   */
  withWrite<R>(fn: (state: BotState) => R | Promise<R>): Promise<R> {
    return this.lock.withWrite(async () => {
      const result = await fn(this.state);
      try {
        await this.persist();
        this.persistError = null;
      } catch (err) {
        const persistErr =
          err instanceof StatePersistError
            ? err
            : new StatePersistError(errorMessage(err), { cause: err });
        this.persistError = persistErr;
        this.log.error({ err: persistErr, file: this.filePath }, 'failed to persist state');
      }
      return result;
    });
  }

  private async persist(): Promise<void> {
    const body = JSON.stringify(toSnapshot(this.state), null, 2) + '\n';
    const tmp = this.tempPath;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      const handle = await fs.open(tmp, 'w');
      try {
        await handle.writeFile(body, 'utf8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.rename(tmp, this.filePath);
    } catch (err) {
      await fs.rm(tmp, { force: true });
      throw new StatePersistError(`Failed to write ${this.filePath}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }
}
