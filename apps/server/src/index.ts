// apps/server/src/index.ts
//
// Service entry point.
//
// Startup (any failure here exits with code 1):
//   1. Read configuration from the environment (.env supported).
//   2. Build the scored lexicon from LEXICON_PATH.
//   3. Load the state snapshot from STATE_PATH (absent → empty state).
//
// Then two things run side by side, sharing one store and one lexicon:
//   • the daily scheduler (one cycle now, then every day at 23:55 local)
//   • the HTTP API for suggestions, history and health
//
// SIGINT/SIGTERM stop the scheduler and close the HTTP server.

import 'dotenv/config';
import { LogAnnouncer, WebhookAnnouncer, type Announcer } from './announce/announcer.js';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { loadLexicon } from './lexiconFile.js';
import { createLogger } from './logger.js';
import { DailyScheduler } from './scheduler/scheduler.js';
import { StateStore } from './state/store.js';

const bootLog = createLogger();

async function main(): Promise<void> {
  const config = loadConfig();
  const log = createLogger(config.logLevel);

  const lexicon = await loadLexicon(config.lexiconPath);
  log.info({ words: lexicon.size, file: config.lexiconPath }, 'lexicon loaded');

  const store = new StateStore(config.statePath, log.child({ component: 'store' }));
  await store.load();

  const announcer: Announcer = config.webhookUrl
    ? new WebhookAnnouncer(config.webhookUrl, config.roleId, log.child({ component: 'announcer' }))
    : new LogAnnouncer(log.child({ component: 'announcer' }), config.roleId);
  if (!config.webhookUrl) log.warn('ANNOUNCE_WEBHOOK_URL not set, announcements go to the log only');

  const scheduler = new DailyScheduler({
    store,
    lexicon,
    announcer,
    timeZone: config.timeZone,
    log: log.child({ component: 'scheduler' }),
  });

  const app = createApp({
    store,
    lexicon,
    timeZone: config.timeZone,
    log: log.child({ component: 'http' }),
    schedulerStatus: () => scheduler.status(),
  });
  const server = app.listen(config.port, () => log.info({ port: config.port }, 'server up'));

  const loop = scheduler.start();

  const shutdown = (signal: NodeJS.Signals) => {
    log.info({ signal }, 'shutting down');
    scheduler.stop();
    server.close((err) => {
      if (err) log.error({ err }, 'error closing http server');
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await loop;
}

main().catch((err: unknown) => {
  bootLog.fatal({ err }, 'startup failed');
  process.exitCode = 1;
});
