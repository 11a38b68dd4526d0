// packages/protocol/src/index.ts
//
// Shared protocol definitions for the daily starter service.
// Uses Zod schemas for runtime validation + TypeScript types for compile-time safety.
//
// Defines:
//   - The persisted state snapshot (used words, history, suggestion queue).
//   - Request/response shapes for suggesting a word and querying history.
//   - The announcement payload handed to the notification channel.
//
// These schemas are consumed on both ends (the server validates inputs and the
// snapshot it loads, clients infer types and ensure consistent expectations).

import { z } from 'zod';

/** Calendar date in the configured timezone, "YYYY-MM-DD". */
export const isoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);
export type IsoDate = z.infer<typeof isoDateSchema>;

/** Exactly 5 lowercase a–z letters. */
export const wordSchema = z.string().regex(/^[a-z]{5}$/);

/* -------------------------------------------------------------------------- */
/*                               State snapshot                               */
/* -------------------------------------------------------------------------- */

/**
 * One selection:
 *  - date:        calendar date the word is for
 *  - word:        the selected word
 *  - suggesterId: who suggested it; absent when the sampler picked it
 */
export const usedEntrySchema = z.object({
  date: isoDateSchema,
  word: z.string(),
  suggesterId: z.string().optional(),
});
export type UsedEntry = z.infer<typeof usedEntrySchema>;

export const queuedSuggestionSchema = z.object({
  submitterId: z.string().min(1),
  word: z.string(),
});
export type QueuedSuggestion = z.infer<typeof queuedSuggestionSchema>;

/**
 * The document written to disk after every mutation.
 * `used` is a set in memory and a (sorted) array on disk.
 */
export const stateSnapshotSchema = z.object({
  used: z.array(z.string()),
  history: z.array(usedEntrySchema),
  queue: z.array(queuedSuggestionSchema),
});
export type StateSnapshot = z.infer<typeof stateSnapshotSchema>;

/* -------------------------------------------------------------------------- */
/*                          POST /api/suggestions                             */
/* -------------------------------------------------------------------------- */

/**
 * Request to queue a word for a future day.
 *  - submitterId: opaque id of the person suggesting (used for attribution)
 *  - word:        any string; trimmed and lowercased before validation
 */
export const suggestionReq = z.object({
  submitterId: z.string().trim().min(1),
  word: z.string(),
});

export const rejectionReasonSchema = z.enum([
  'invalid_format',
  'not_in_lexicon',
  'already_used',
  'already_queued',
]);
export type RejectionReason = z.infer<typeof rejectionReasonSchema>;

export const suggestionRes = z.discriminatedUnion('status', [
  z.object({ status: z.literal('accepted'), word: wordSchema }),
  z.object({
    status: z.literal('rejected'),
    reason: rejectionReasonSchema,
    message: z.string(),
  }),
]);
export type SuggestionOutcome = z.infer<typeof suggestionRes>;

/* -------------------------------------------------------------------------- */
/*                             GET /api/history                               */
/* -------------------------------------------------------------------------- */

export const HISTORY_DEFAULT_DAYS = 14;
export const HISTORY_MAX_DAYS = 3650;

/**
 * Query string for history.
 *  - days: how many days back (1–3650), defaults to 14
 */
export const historyReq = z.object({
  days: z.coerce
    .number()
    .int()
    .min(1)
    .max(HISTORY_MAX_DAYS)
    .default(HISTORY_DEFAULT_DAYS),
});

/**
 * History response:
 *  - entries: the rows that fit the message budget, newest first
 *  - text:    the rendered message (or the "no entries" line)
 *  - empty:   true when no entry qualified at all
 */
export const historyRes = z.object({
  days: z.number().int(),
  empty: z.boolean(),
  entries: z.array(usedEntrySchema),
  text: z.string(),
});
export type HistoryReport = z.infer<typeof historyRes>;

/* -------------------------------------------------------------------------- */
/*                         GET /api/lexicon/ranking                           */
/* -------------------------------------------------------------------------- */

export const rankingReq = z.object({
  n: z.coerce.number().int().min(1).max(500).default(10),
  order: z.enum(['hardest', 'easiest']).default('hardest'),
});

export const rankingRes = z.object({
  order: z.enum(['hardest', 'easiest']),
  words: z.array(z.object({ word: z.string(), score: z.number() })),
});

/* -------------------------------------------------------------------------- */
/*                               Announcement                                 */
/* -------------------------------------------------------------------------- */

export const announcementSchema = z.object({
  date: isoDateSchema,
  word: wordSchema,
  suggesterId: z.string().optional(),
});
export type Announcement = z.infer<typeof announcementSchema>;
