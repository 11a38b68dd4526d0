// apps/server/src/app.ts
//
// HTTP surface: suggestion intake, history, lexicon ranking and health.
// Request bodies and query strings are validated with the shared protocol
// schemas; async handler failures go to one error handler that logs them.

import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import type { Logger } from 'pino';
import { rankLexicon, type Lexicon } from '@daily-starter/lexicon';
import {
  historyReq,
  historyRes,
  rankingReq,
  rankingRes,
  suggestionReq,
  suggestionRes,
} from '@daily-starter/protocol';
import { errorMessage } from './errors.js';
import { queryHistory } from './history.js';
import type { SchedulerStatus } from './scheduler/scheduler.js';
import type { StateStore } from './state/store.js';
import { submitSuggestion } from './suggestions.js';

export interface AppDeps {
  store: StateStore;
  lexicon: Lexicon;
  timeZone: string;
  log: Logger;
  schedulerStatus?: () => SchedulerStatus;
  now?: () => Date;
}

type AsyncHandler = (req: Request, res: Response) => Promise<unknown>;

/** Client-side status carried by http-errors style errors, e.g. a body parse failure. */
function clientStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  const status =
    'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

const route =
  (fn: AsyncHandler) => (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };

export function createApp(deps: AppDeps): express.Express {
  const { store, lexicon, timeZone, log } = deps;
  const now = deps.now ?? (() => new Date());
  const app = express();
  app.use(cors());
  app.use(express.json());

  /* ------------------------------------------------------------------------ */
  /*                               Suggestions                                */
  /* ------------------------------------------------------------------------ */
  app.post(
    '/api/suggestions',
    route(async (req, res) => {
      const parsed = suggestionReq.safeParse(req.body);
      if (!parsed.success) return res.status(400).json(parsed.error.format());
      const { submitterId, word } = parsed.data;

      const outcome = await submitSuggestion(store, lexicon, submitterId, word);
      log.info({ submitterId, ...outcome }, 'suggestion');
      res.status(outcome.status === 'accepted' ? 201 : 422).json(suggestionRes.parse(outcome));
    }),
  );

  /* ------------------------------------------------------------------------ */
  /*                                 History                                  */
  /* ------------------------------------------------------------------------ */
  app.get(
    '/api/history',
    route(async (req, res) => {
      const parsed = historyReq.safeParse(req.query);
      if (!parsed.success) return res.status(400).json(parsed.error.format());

      const report = await queryHistory(store, {
        timeZone,
        daysBack: parsed.data.days,
        now: now(),
      });
      res.json(historyRes.parse(report));
    }),
  );

  /* ------------------------------------------------------------------------ */
  /*                                 Lexicon                                  */
  /* ------------------------------------------------------------------------ */
  app.get('/api/lexicon/ranking', (req, res) => {
    const parsed = rankingReq.safeParse(req.query);
    if (!parsed.success) return res.status(400).json(parsed.error.format());
    const { n, order } = parsed.data;
    res.json(rankingRes.parse({ order, words: rankLexicon(lexicon, n, order) }));
  });

  /* ------------------------------------------------------------------------ */
  /*                                  Health                                  */
  /* ------------------------------------------------------------------------ */
  app.get('/api/health', (_req, res) => {
    const persistError = store.lastPersistError;
    res.json({
      status: persistError ? 'degraded' : 'ok',
      lexiconSize: lexicon.size,
      lastPersistError: persistError ? persistError.message : null,
      scheduler: deps.schedulerStatus?.() ?? null,
    });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = clientStatus(err);
    if (status !== undefined) {
      log.debug({ err, status }, 'bad request');
      return res.status(status).json({ error: errorMessage(err) });
    }
    log.error({ err }, 'request failed');
    res.status(500).json({ error: errorMessage(err) });
  });

  return app;
}
