// apps/server/src/time/zonedClock.ts
//
// Calendar arithmetic in an IANA timezone, built on Intl.
// Dates are "YYYY-MM-DD" strings: they sort and compare lexically, and they
// are exactly what the snapshot stores.

export interface LocalTime {
  hour: number;
  minute: number;
}

interface ZonedParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let f = formatters.get(timeZone);
  if (!f) {
    f = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    formatters.set(timeZone, f);
  }
  return f;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    formatterFor(timeZone);
    return true;
  } catch {
    return false;
  }
}

function zonedParts(instant: Date, timeZone: string): ZonedParts {
  const out: ZonedParts = { year: 0, month: 0, day: 0, hour: 0, minute: 0, second: 0 };
  for (const p of formatterFor(timeZone).formatToParts(instant)) {
    switch (p.type) {
      case 'year':
      case 'month':
      case 'day':
      case 'hour':
      case 'minute':
      case 'second':
        out[p.type] = Number(p.value);
        break;
      default:
        break;
    }
  }
  return out;
}

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

function formatDate(year: number, month: number, day: number): string {
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

function parseDate(date: string): [number, number, number] {
  const m = /^(\d{4})-(\d{2})-(\d{2})$/.exec(date);
  if (!m) throw new Error(`Invalid date: ${date}`);
  return [Number(m[1]), Number(m[2]), Number(m[3])];
}

/** Calendar date of `instant` as seen in `timeZone`. */
export function localDate(instant: Date, timeZone: string): string {
  const p = zonedParts(instant, timeZone);
  return formatDate(p.year, p.month, p.day);
}

export function addDays(date: string, days: number): string {
  const [y, m, d] = parseDate(date);
  const t = new Date(Date.UTC(y, m - 1, d + days));
  return formatDate(t.getUTCFullYear(), t.getUTCMonth() + 1, t.getUTCDate());
}

/** Offset of `timeZone` from UTC at `instant`, in milliseconds. */
function offsetAt(instant: number, timeZone: string): number {
  const p = zonedParts(new Date(instant), timeZone);
  const asUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  return asUtc - Math.floor(instant / 1000) * 1000;
}

/**
 * The instant at which the wall clock in `timeZone` shows `date` `time`.
 * A wall time skipped by a DST jump resolves to the same offset before the
 * jump, which lands just after it; a repeated wall time resolves to its first
 * occurrence.
 */
export function zonedTimeToInstant(
  date: string,
  time: LocalTime,
  timeZone: string,
): Date {
  const [y, m, d] = parseDate(date);
  const wall = Date.UTC(y, m - 1, d, time.hour, time.minute, 0);
  const first = offsetAt(wall, timeZone);
  const second = offsetAt(wall - first, timeZone);
  if (second === first) return new Date(wall - first);

  const valid = [first, second]
    .filter((o) => offsetAt(wall - o, timeZone) === o)
    .map((o) => wall - o);
  if (valid.length > 0) return new Date(Math.min(...valid));
  // inside a gap: the pre-jump offset is the smaller one
  return new Date(wall - Math.min(first, second));
}

/**
 * Next occurrence of the local wall time `at`: today's if `now` is still
 * before it, otherwise tomorrow's.
 */
export function nextDailyRun(now: Date, timeZone: string, at: LocalTime): Date {
  const today = localDate(now, timeZone);
  const todays = zonedTimeToInstant(today, at, timeZone);
  if (now.getTime() < todays.getTime()) return todays;
  return zonedTimeToInstant(addDays(today, 1), at, timeZone);
}
