/**
 * Zoned Time
 * Wall-clock arithmetic in an IANA timezone over absolute instants.
 *
 * Bucket boundaries (day and week starts) are local midnights, so every
 * calendar step goes through local parts and back to an instant.
 */

export const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
] as const;

const WEEKDAYS: Record<string, number> = {
  Mon: 1, Tue: 2, Wed: 3, Thu: 4, Fri: 5, Sat: 6, Sun: 7,
};

export interface LocalDateTime {
  year: number;
  month: number;        // 1-12
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
  weekday: number;      // 1 = Monday ... 7 = Sunday
}

export type LocalFields = Pick<LocalDateTime, 'year' | 'month' | 'day'> &
  Partial<Pick<LocalDateTime, 'hour' | 'minute' | 'second' | 'millisecond'>>;

// ════════════════════════════════════════════════════════════════════
// ZONE LOOKUP
// ════════════════════════════════════════════════════════════════════

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timezone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timezone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone: timezone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      weekday: 'short',
    });
    formatters.set(timezone, formatter);
  }
  return formatter;
}

export function isValidTimeZone(timezone: string): boolean {
  try {
    formatterFor(timezone);
    return true;
  } catch {
    return false;
  }
}

export function systemTimeZone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone;
}

export function toLocal(instant: Date, timezone: string): LocalDateTime {
  const fields: Record<string, string> = {};
  for (const part of formatterFor(timezone).formatToParts(instant)) {
    fields[part.type] = part.value;
  }

  return {
    year: Number(fields.year),
    month: Number(fields.month),
    day: Number(fields.day),
    hour: Number(fields.hour) % 24,
    minute: Number(fields.minute),
    second: Number(fields.second),
    millisecond: ((instant.getTime() % 1000) + 1000) % 1000,
    weekday: WEEKDAYS[fields.weekday] ?? 1,
  };
}

/** UTC offset in minutes at the given instant (east positive) */
export function offsetMinutes(instant: Date, timezone: string): number {
  const local = toLocal(instant, timezone);
  const wall = Date.UTC(local.year, local.month - 1, local.day, local.hour, local.minute, local.second);
  const wholeSeconds = Math.floor(instant.getTime() / 1000) * 1000;
  return Math.round((wall - wholeSeconds) / 60_000);
}

/**
 * Instant of a local wall-clock time. Out-of-range fields roll over
 * (day 32 becomes the next month). Ambiguous wall times take the
 * earlier instant; wall times skipped by a DST gap move forward by the
 * length of the gap.
 */
export function fromLocal(fields: LocalFields, timezone: string): Date {
  const wall = Date.UTC(
    fields.year,
    fields.month - 1,
    fields.day,
    fields.hour ?? 0,
    fields.minute ?? 0,
    fields.second ?? 0,
    fields.millisecond ?? 0
  );

  const firstGuess = offsetMinutes(new Date(wall), timezone);
  const first = wall - firstGuess * 60_000;
  const secondGuess = offsetMinutes(new Date(first), timezone);
  const second = wall - secondGuess * 60_000;

  // A candidate is consistent when the zone really has that offset there
  const firstFits = secondGuess === firstGuess;
  const secondFits = offsetMinutes(new Date(second), timezone) === secondGuess;

  if (firstFits && secondFits) return new Date(Math.min(first, second));
  if (firstFits) return new Date(first);
  if (secondFits) return new Date(second);
  // Inside a gap: neither fits, and the later one is the wall time moved forward
  return new Date(Math.max(first, second));
}

// ════════════════════════════════════════════════════════════════════
// CALENDAR BOUNDARIES
// ════════════════════════════════════════════════════════════════════

export function startOfDay(instant: Date, timezone: string): Date {
  const { year, month, day } = toLocal(instant, timezone);
  return fromLocal({ year, month, day }, timezone);
}

/** Local midnight of the Monday on or before the instant */
export function startOfWeek(instant: Date, timezone: string): Date {
  const { year, month, day, weekday } = toLocal(instant, timezone);
  return fromLocal({ year, month, day: day - (weekday - 1) }, timezone);
}

/** Same wall-clock time `days` local days later */
export function addLocalDays(instant: Date, days: number, timezone: string): Date {
  const local = toLocal(instant, timezone);
  return fromLocal({ ...local, day: local.day + days }, timezone);
}

/** `[first of month, first of next month)` as instants */
export function monthBounds(year: number, month: number, timezone: string): { start: Date; end: Date } {
  return {
    start: fromLocal({ year, month, day: 1 }, timezone),
    end: fromLocal({ year, month: month + 1, day: 1 }, timezone),
  };
}

// ════════════════════════════════════════════════════════════════════
// LOG TIMESTAMP CODEC
// ════════════════════════════════════════════════════════════════════

const LOG_TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?(Z|[+-]\d{2}:?\d{2})$/;

const pad = (value: number, width = 2) => String(value).padStart(width, '0');

function formatOffset(minutes: number, separator: string): string {
  const sign = minutes < 0 ? '-' : '+';
  const abs = Math.abs(minutes);
  return `${sign}${pad(Math.floor(abs / 60))}${separator}${pad(abs % 60)}`;
}

/** `2023-05-01T09:00:00.000000000-0700`, nanosecond field, numeric offset */
export function formatLogTimestamp(instant: Date, timezone: string): string {
  const local = toLocal(instant, timezone);
  const offset = offsetMinutes(instant, timezone);
  return (
    `${pad(local.year, 4)}-${pad(local.month)}-${pad(local.day)}` +
    `T${pad(local.hour)}:${pad(local.minute)}:${pad(local.second)}` +
    `.${pad(local.millisecond, 3)}000000${formatOffset(offset, '')}`
  );
}

/**
 * Accepts 1-9 fractional digits and `±HHMM`, `±HH:MM` or `Z`.
 * Digits past the millisecond are dropped.
 */
export function parseLogTimestamp(text: string): Date | undefined {
  const match = LOG_TIMESTAMP.exec(text);
  if (!match) return undefined;

  const [, y, mo, d, h, mi, s, fraction = '', zone] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  const millisecond = Number(fraction.padEnd(3, '0').slice(0, 3));

  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) {
    return undefined;
  }

  const wall = Date.UTC(year, month - 1, day, hour, minute, second, millisecond);
  if (new Date(wall).getUTCDate() !== day) return undefined;

  let offset = 0;
  if (zone !== 'Z') {
    const digits = zone.replace(':', '');
    const hours = Number(digits.slice(1, 3));
    const minutes = Number(digits.slice(3, 5));
    if (minutes > 59) return undefined;
    offset = (hours * 60 + minutes) * (digits.startsWith('-') ? -1 : 1);
  }

  return new Date(wall - offset * 60_000);
}

// ════════════════════════════════════════════════════════════════════
// DISPLAY
// ════════════════════════════════════════════════════════════════════

/** `01 May 2023` */
export function formatDate(instant: Date, timezone: string): string {
  const { year, month, day } = toLocal(instant, timezone);
  return `${pad(day)} ${MONTH_NAMES[month - 1]} ${year}`;
}

/** `YYYY-MM-DD` */
export function formatIsoDate(instant: Date, timezone: string): string {
  const { year, month, day } = toLocal(instant, timezone);
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

/** `09:05:00 PM 01 May 2023` */
export function formatSlimDateTime(instant: Date, timezone: string): string {
  const { hour, minute, second } = toLocal(instant, timezone);
  const meridiem = hour < 12 ? 'AM' : 'PM';
  const hour12 = hour % 12 === 0 ? 12 : hour % 12;
  return `${pad(hour12)}:${pad(minute)}:${pad(second)} ${meridiem} ${formatDate(instant, timezone)}`;
}

/** `2023-05-01 09:05:00` */
export function formatHumanTimestamp(instant: Date, timezone: string): string {
  const { hour, minute, second } = toLocal(instant, timezone);
  return `${formatIsoDate(instant, timezone)} ${pad(hour)}:${pad(minute)}:${pad(second)}`;
}

/** Offset string for display, `UTC-07:00` */
export function formatZoneLabel(instant: Date, timezone: string): string {
  return `UTC${formatOffset(offsetMinutes(instant, timezone), ':')}`;
}
