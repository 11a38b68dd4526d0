// apps/server/src/logger.ts
//
// Root pino logger. Components take a child with their own `component` field.

import { pino, type Logger } from 'pino';

export function createLogger(level: string = process.env.LOG_LEVEL ?? 'info'): Logger {
  return pino({ level });
}
