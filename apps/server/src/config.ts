// apps/server/src/config.ts
//
// Process configuration, read from the environment (and .env via dotenv).
//
//   TIMEZONE              IANA zone the calendar days are counted in (required)
//   LEXICON_PATH          plain-text word list, one per line (required)
//   STATE_PATH            JSON snapshot file (required)
//   ANNOUNCE_WEBHOOK_URL  chat webhook for announcements; logs only when unset
//   ANNOUNCE_ROLE_ID      role mentioned in each announcement
//   PORT                  HTTP port, default 3001
//   LOG_LEVEL             pino level, default "info"

import { z } from 'zod';
import { ConfigError } from './errors.js';
import { isValidTimeZone } from './time/zonedClock.js';

const optionalString = z
  .string()
  .trim()
  .transform((v) => (v === '' ? undefined : v))
  .optional();

const envSchema = z.object({
  TIMEZONE: z
    .string()
    .trim()
    .min(1)
    .refine(isValidTimeZone, { message: 'Invalid IANA timezone' }),
  LEXICON_PATH: z.string().trim().min(1),
  STATE_PATH: z.string().trim().min(1),
  ANNOUNCE_WEBHOOK_URL: optionalString.pipe(z.string().url().optional()),
  ANNOUNCE_ROLE_ID: optionalString,
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
});

export interface AppConfig {
  timeZone: string;
  lexiconPath: string;
  statePath: string;
  webhookUrl?: string;
  roleId?: string;
  port: number;
  logLevel: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${problems}`, {
      cause: parsed.error,
    });
  }
  const e = parsed.data;
  return {
    timeZone: e.TIMEZONE,
    lexiconPath: e.LEXICON_PATH,
    statePath: e.STATE_PATH,
    webhookUrl: e.ANNOUNCE_WEBHOOK_URL,
    roleId: e.ANNOUNCE_ROLE_ID,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
  };
}
