/**
 * Month Selector
 * Symbolic month argument for weekly reports, resolved against "now"
 */

import { MonthParseError } from './errors';
import type { MonthRange } from './types';
import { MONTH_NAMES, monthBounds, toLocal } from './zonedTime';

export type RelativeMonth = 'current' | 'previous' | 'next' | 'all';

export type MonthName =
  | 'january' | 'february' | 'march' | 'april' | 'may' | 'june'
  | 'july' | 'august' | 'september' | 'october' | 'november' | 'december';

export type Month = RelativeMonth | MonthName;

export const DEFAULT_MONTH: Month = 'current';

const MONTHS: readonly MonthName[] = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
];

const RELATIVE: readonly RelativeMonth[] = ['current', 'previous', 'next', 'all'];

/**
 * Accepts a month number (1-12), a month name in any case, or one of
 * `current`, `previous`, `next`, `all`.
 */
export function parseMonth(input: string): Month {
  // Integers that fit a byte are month numbers; anything else is a name
  if (/^\+?\d+$/.test(input) && Number(input) <= 255) {
    const value = Number(input);
    const name = MONTHS[value - 1];
    if (value < 1 || !name) {
      throw new MonthParseError({ code: 'InvalidMonthNumber', value });
    }
    return name;
  }

  const lower = input.toLowerCase();
  const relative = RELATIVE.find(r => r === lower);
  if (relative) return relative;

  const named = MONTHS.find(m => m === lower);
  if (named) return named;

  throw new MonthParseError({ code: 'UnknownMonth', input });
}

/** 1-12 for the month the selector points at, or undefined for `all` */
function resolveMonth(month: Month, now: Date, timezone: string): { year: number; month: number } | undefined {
  const local = toLocal(now, timezone);

  switch (month) {
    case 'all':
      return undefined;
    case 'current':
      return { year: local.year, month: local.month };
    case 'previous':
      return local.month === 1
        ? { year: local.year - 1, month: 12 }
        : { year: local.year, month: local.month - 1 };
    case 'next':
      return local.month === 12
        ? { year: local.year + 1, month: 1 }
        : { year: local.year, month: local.month + 1 };
    default:
      return { year: local.year, month: MONTHS.indexOf(month) + 1 };
  }
}

/** `[monthStart, monthEnd)` in the given zone, or undefined for `all` */
export function monthRange(month: Month, now: Date, timezone: string): MonthRange | undefined {
  const resolved = resolveMonth(month, now, timezone);
  return resolved && monthBounds(resolved.year, resolved.month, timezone);
}

/** "October (current)", "March", "all" */
export function describeMonth(month: Month, now: Date, timezone: string): string {
  const resolved = resolveMonth(month, now, timezone);
  if (!resolved) return 'all';

  const name = MONTH_NAMES[resolved.month - 1];
  return RELATIVE.some(r => r === month) ? `${name} (${month})` : name;
}
