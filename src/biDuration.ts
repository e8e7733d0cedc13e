/**
 * BiDuration
 * Signed duration that remembers its direction.
 *
 * Accepts offsets relative to "now":
 * - "in 1h 30m" -> forward
 * - "1h 30m"    -> forward
 * - "1h 30m ago" -> backward
 *
 * Stored as a bigint count of nanoseconds, limited to the signed 64-bit range.
 */

import { BiDurationParseError } from './errors';

// ════════════════════════════════════════════════════════════════════
// UNITS
// ════════════════════════════════════════════════════════════════════

const NANOSECOND = 1n;
const MICROSECOND = 1_000n;
const MILLISECOND = 1_000_000n;
const SECOND = 1_000_000_000n;
const MINUTE = 60n * SECOND;
const HOUR = 60n * MINUTE;
const DAY = 24n * HOUR;
const WEEK = 7n * DAY;
const MONTH = 2_630_016n * SECOND;  // 30.44 days
const YEAR = 31_557_600n * SECOND;  // 365.25 days

export const MAX_NANOSECONDS = 9_223_372_036_854_775_807n;
export const MIN_NANOSECONDS = -9_223_372_036_854_775_808n;

const UNITS = new Map<string, bigint>([
  ['nanos', NANOSECOND], ['nsec', NANOSECOND], ['ns', NANOSECOND],
  ['usec', MICROSECOND], ['us', MICROSECOND], ['µs', MICROSECOND],
  ['millis', MILLISECOND], ['msec', MILLISECOND], ['ms', MILLISECOND],
  ['seconds', SECOND], ['second', SECOND], ['secs', SECOND], ['sec', SECOND], ['s', SECOND],
  ['minutes', MINUTE], ['minute', MINUTE], ['mins', MINUTE], ['min', MINUTE], ['m', MINUTE],
  ['hours', HOUR], ['hour', HOUR], ['hrs', HOUR], ['hr', HOUR], ['h', HOUR],
  ['days', DAY], ['day', DAY], ['d', DAY],
  ['weeks', WEEK], ['week', WEEK], ['w', WEEK],
  ['months', MONTH], ['month', MONTH], ['M', MONTH],
  ['years', YEAR], ['year', YEAR], ['y', YEAR],
]);

export type Direction = 'forward' | 'backward';

// ════════════════════════════════════════════════════════════════════
// VALUE
// ════════════════════════════════════════════════════════════════════

export class BiDuration {
  private constructor(private readonly ns: bigint) {}

  static readonly ZERO = new BiDuration(0n);

  /** Saturates at the signed 64-bit limits */
  static fromNanoseconds(ns: bigint): BiDuration {
    return new BiDuration(clamp(ns));
  }

  static fromMilliseconds(ms: number): BiDuration {
    return BiDuration.fromNanoseconds(BigInt(Math.trunc(ms)) * MILLISECOND);
  }

  static seconds(n: number): BiDuration {
    return BiDuration.fromNanoseconds(BigInt(n) * SECOND);
  }

  static minutes(n: number): BiDuration {
    return BiDuration.fromNanoseconds(BigInt(n) * MINUTE);
  }

  static hours(n: number): BiDuration {
    return BiDuration.fromNanoseconds(BigInt(n) * HOUR);
  }

  /** `to - from`, negative when `to` is earlier */
  static between(from: Date, to: Date): BiDuration {
    return BiDuration.fromMilliseconds(to.getTime() - from.getTime());
  }

  static parse(input: string): BiDuration {
    const parts = input.split(/\s+/).filter(p => p.length > 0);
    if (parts.length === 0) {
      throw new BiDurationParseError({ code: 'InvalidDirection', input });
    }

    const explicitForward = parts[0] === 'in';
    const backward = parts[parts.length - 1] === 'ago';

    if (explicitForward && backward) {
      throw new BiDurationParseError({ code: 'BothDirections', input });
    }

    let direction: Direction = 'forward';
    let durationParts = parts;
    if (explicitForward) {
      durationParts = parts.slice(1);
    } else if (backward) {
      direction = 'backward';
      durationParts = parts.slice(0, -1);
    }

    const magnitude = parsePositiveDuration(durationParts.join(' '));
    if (magnitude > MAX_NANOSECONDS) {
      throw new BiDurationParseError({ code: 'OutOfRange', input });
    }

    return new BiDuration(direction === 'forward' ? magnitude : -magnitude);
  }

  // ── accessors ──────────────────────────────────────────────────────

  get nanoseconds(): bigint {
    return this.ns;
  }

  /** Truncated toward zero */
  get milliseconds(): number {
    return Number(this.ns / MILLISECOND);
  }

  get direction(): Direction {
    return this.ns < 0n ? 'backward' : 'forward';
  }

  isNegative(): boolean {
    return this.ns < 0n;
  }

  isZero(): boolean {
    return this.ns === 0n;
  }

  // ── arithmetic ─────────────────────────────────────────────────────

  negate(): BiDuration {
    return BiDuration.fromNanoseconds(-this.ns);
  }

  abs(): BiDuration {
    return BiDuration.fromNanoseconds(this.ns < 0n ? -this.ns : this.ns);
  }

  plus(other: BiDuration): BiDuration {
    return BiDuration.fromNanoseconds(this.ns + other.ns);
  }

  /** Integer division, truncating */
  dividedBy(divisor: number): BiDuration {
    if (!Number.isInteger(divisor) || divisor === 0) {
      throw new RangeError(`Cannot divide a duration by ${divisor}`);
    }
    return new BiDuration(this.ns / BigInt(divisor));
  }

  addTo(date: Date): Date {
    return new Date(date.getTime() + this.milliseconds);
  }

  equals(other: BiDuration): boolean {
    return this.ns === other.ns;
  }

  // ── formatting ─────────────────────────────────────────────────────

  /** "in 24days 12h 6m 3s" / "1h 30m ago" */
  toFriendlyString(): string {
    const text = formatExact(this.magnitude());
    return this.ns < 0n ? `${text} ago` : `in ${text}`;
  }

  /** Canonical unit form of the magnitude, no direction */
  toExactString(): string {
    return formatExact(this.magnitude());
  }

  /** Magnitude rounded to whole minutes: "1 hour 40 minutes", "2 hours", "0 minutes" */
  toFriendlyHoursString(): string {
    const totalMinutes = (this.magnitude() + 30n * SECOND) / MINUTE;
    const hours = totalMinutes / 60n;
    const minutes = totalMinutes % 60n;

    const hourText = `${hours} ${hours === 1n ? 'hour' : 'hours'}`;
    const minuteText = `${minutes} ${minutes === 1n ? 'minute' : 'minutes'}`;

    if (hours === 0n) return minuteText;
    if (minutes === 0n) return hourText;
    return `${hourText} ${minuteText}`;
  }

  /** "in 2 hours" / "45 minutes ago" */
  toFriendlyRelativeString(): string {
    const text = this.toFriendlyHoursString();
    return this.ns < 0n ? `${text} ago` : `in ${text}`;
  }

  toString(): string {
    return this.toFriendlyString();
  }

  toJSON(): string {
    return this.toFriendlyString();
  }

  private magnitude(): bigint {
    return clamp(this.ns < 0n ? -this.ns : this.ns);
  }
}

// ════════════════════════════════════════════════════════════════════
// GRAMMAR
// ════════════════════════════════════════════════════════════════════

const ITEM = /^(\d+)\s*([^\d\s]*)\s*/;

function parsePositiveDuration(text: string): bigint {
  const invalid = (reason: string) =>
    new BiDurationParseError({ code: 'InvalidDuration', input: text, reason });

  let rest = text.trim();
  if (rest.length === 0) {
    throw invalid('value was empty');
  }

  let total = 0n;
  while (rest.length > 0) {
    const match = ITEM.exec(rest);
    if (!match) {
      throw invalid(`expected a number at "${rest}"`);
    }

    const [whole, digits, unitName] = match;
    if (unitName.length === 0) {
      throw invalid(`time unit needed after ${digits}, for example ${digits}sec or ${digits}m`);
    }

    const unit = UNITS.get(unitName);
    if (unit === undefined) {
      throw invalid(`unknown time unit "${unitName}"`);
    }

    total += BigInt(digits) * unit;
    rest = rest.slice(whole.length);
  }

  return total;
}

function formatExact(ns: bigint): string {
  if (ns === 0n) return '0s';

  const seconds = ns / SECOND;
  const nanos = ns % SECOND;

  const years = seconds / (YEAR / SECOND);
  const yearRest = seconds % (YEAR / SECOND);
  const months = yearRest / (MONTH / SECOND);
  const monthRest = yearRest % (MONTH / SECOND);
  const days = monthRest / (DAY / SECOND);
  const daySeconds = monthRest % (DAY / SECOND);

  const items: Array<[bigint, string, string]> = [
    [years, 'year', 'years'],
    [months, 'month', 'months'],
    [days, 'day', 'days'],
    [daySeconds / 3600n, 'h', 'h'],
    [(daySeconds % 3600n) / 60n, 'm', 'm'],
    [daySeconds % 60n, 's', 's'],
    [nanos / 1_000_000n, 'ms', 'ms'],
    [(nanos / 1_000n) % 1_000n, 'us', 'us'],
    [nanos % 1_000n, 'ns', 'ns'],
  ];

  return items
    .filter(([value]) => value > 0n)
    .map(([value, one, many]) => `${value}${value === 1n ? one : many}`)
    .join(' ');
}

function clamp(ns: bigint): bigint {
  if (ns > MAX_NANOSECONDS) return MAX_NANOSECONDS;
  if (ns < MIN_NANOSECONDS) return MIN_NANOSECONDS;
  return ns;
}
