// apps/server/src/scheduler/scheduler.ts
//
// Runs the daily cycle once at startup and then every day at 23:55 local time.
// A failed cycle is logged and the loop carries on; stop() ends the loop at
// its next sleep.

import type { Logger } from 'pino';
import { nanoid } from 'nanoid';
import { errorMessage } from '../errors.js';
import { nextDailyRun, type LocalTime } from '../time/zonedClock.js';
import { runDailyCycle, type CycleDeps, type CycleOutcome } from './dailyCycle.js';

export const DAILY_RUN_AT: LocalTime = { hour: 23, minute: 55 };

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface SchedulerStatus {
  running: boolean;
  cycles: number;
  lastOutcome: CycleOutcome | null;
  lastError: string | null;
  nextRunAt: string | null;
}

export interface SchedulerDeps extends CycleDeps {
  runAt?: LocalTime;
  sleep?: Sleep;
  runCycle?: (deps: CycleDeps) => Promise<CycleOutcome>;
}

/** Resolves after `ms`, or early (without error) once `signal` aborts. */
export const abortableSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal.aborted) return resolve();
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));
    signal.addEventListener('abort', onAbort, { once: true });
  });

export class DailyScheduler {
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private cycles = 0;
  private lastOutcome: CycleOutcome | null = null;
  private lastError: string | null = null;
  private nextRunAt: Date | null = null;

  constructor(private readonly deps: SchedulerDeps) {}

  /** Starts the loop; the returned promise settles once the loop has exited. */
  start(): Promise<void> {
    if (this.loop) return this.loop;
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal).finally(() => {
      this.loop = null;
      this.controller = null;
    });
    return this.loop;
  }

  stop(): void {
    this.controller?.abort();
  }

  status(): SchedulerStatus {
    return {
      running: this.loop !== null,
      cycles: this.cycles,
      lastOutcome: this.lastOutcome,
      lastError: this.lastError,
      nextRunAt: this.nextRunAt?.toISOString() ?? null,
    };
  }

  private async run(signal: AbortSignal): Promise<void> {
    const { log, timeZone } = this.deps;
    const now = this.deps.now ?? (() => new Date());
    const sleep = this.deps.sleep ?? abortableSleep;
    const runAt = this.deps.runAt ?? DAILY_RUN_AT;

    log.info({ timeZone, runAt }, 'scheduler started');
    while (!signal.aborted) {
      await this.runCycleSafely();
      if (signal.aborted) break;

      const current = now();
      const next = nextDailyRun(current, timeZone, runAt);
      this.nextRunAt = next;
      log.info({ nextRunAt: next.toISOString() }, 'next cycle scheduled');
      await sleep(next.getTime() - current.getTime(), signal);
    }
    this.nextRunAt = null;
    log.info('scheduler stopped');
  }

  private async runCycleSafely(): Promise<void> {
    const cycleId = nanoid(10);
    const log = this.deps.log.child({ cycleId });
    const runCycle = this.deps.runCycle ?? runDailyCycle;
    this.cycles++;
    try {
      const outcome = await runCycle({ ...this.deps, log });
      this.lastOutcome = outcome;
      this.lastError = null;
      log.info({ ...outcome }, 'cycle complete');
    } catch (err) {
      this.lastError = errorMessage(err);
      log.error({ err }, 'cycle failed');
    }
  }
}
