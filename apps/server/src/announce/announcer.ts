// apps/server/src/announce/announcer.ts
//
// Outbound notification of the day's word.
//
// Delivery is not exactly-once: a cycle that fails after selection re-announces
// the same date on its next run, so every Announcer must tolerate repeats.

import type { Logger } from 'pino';
import type { Announcement } from '@daily-starter/protocol';
import { NotificationDeliveryError, errorMessage } from '../errors.js';

export interface Announcer {
  announce(announcement: Announcement): Promise<void>;
}

export type FetchLike = typeof fetch;

/** Chat mention for a submitter id. */
export function mention(userId: string): string {
  return `<@${userId}>`;
}

/**
 * Message text, e.g.
 *   <@&42>
 *   Tomorrow's starting word (2026-03-11) is: ||`crane`||
 *   Suggested by <@7>
 */
export function formatAnnouncement(a: Announcement, roleId?: string): string {
  const lines: string[] = [];
  if (roleId) lines.push(`<@&${roleId}>`);
  lines.push(`Tomorrow's starting word (${a.date}) is: ||\`${a.word}\`||`);
  if (a.suggesterId) lines.push(`Suggested by ${mention(a.suggesterId)}`);
  return lines.join('\n');
}

/**
 * Posts announcements to a chat webhook that takes `{ content }` JSON
 * (Discord-compatible). Only the configured role and the suggester may be
 * pinged.
 */
export class WebhookAnnouncer implements Announcer {
  constructor(
    private readonly url: string,
    private readonly roleId: string | undefined,
    private readonly log: Logger,
    private readonly fetchImpl: FetchLike = fetch,
  ) {}

  async announce(a: Announcement): Promise<void> {
    const body = {
      content: formatAnnouncement(a, this.roleId),
      allowed_mentions: {
        roles: this.roleId ? [this.roleId] : [],
        users: a.suggesterId ? [a.suggesterId] : [],
      },
    };

    let res: Response;
    try {
      res = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
      });
    } catch (err) {
      throw new NotificationDeliveryError(`Webhook request failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    if (!res.ok) {
      const text = await res.text().catch(() => '');
      throw new NotificationDeliveryError(
        `Webhook responded ${res.status}${text ? `: ${text}` : ''}`,
      );
    }
    this.log.info({ date: a.date, suggested: Boolean(a.suggesterId) }, 'announcement delivered');
  }
}

/** Used when no webhook is configured: the announcement only goes to the log. */
export class LogAnnouncer implements Announcer {
  constructor(
    private readonly log: Logger,
    private readonly roleId?: string,
  ) {}

  async announce(a: Announcement): Promise<void> {
    this.log.info({ date: a.date, text: formatAnnouncement(a, this.roleId) }, 'announcement');
  }
}
