// apps/server/src/errors.ts
//
// Error taxonomy for the service.
//
//   Startup (fatal, process exits):  ConfigError, LexiconLoadError, StateLoadError
//   Steady state (logged, non-fatal): StatePersistError, NoCandidateError,
//                                     NotificationDeliveryError
//
// Suggestion rejections are not errors; they are returned as values.

export class AppError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG', message, options);
  }
}

export class LexiconLoadError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('LEXICON_LOAD', message, options);
  }
}

export class StateLoadError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STATE_LOAD', message, options);
  }
}

export class StatePersistError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STATE_PERSIST', message, options);
  }
}

/** The lexicon has no unused word left; fails the current cycle only. */
export class NoCandidateError extends AppError {
  constructor(message = 'No unused word left in the lexicon') {
    super('NO_CANDIDATE', message);
  }
}

export class NotificationDeliveryError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('NOTIFICATION_DELIVERY', message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
