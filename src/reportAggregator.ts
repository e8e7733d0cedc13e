/**
 * Report Aggregator
 * Completed shifts grouped into local calendar days or Monday-start weeks.
 *
 * A shift is an `out` entry paired with the entry right before it in time.
 * Alternation is guaranteed by the clock store, so pairs are not re-checked.
 */

import { BiDuration } from './biDuration';
import type { EventLog } from './eventLog';
import { monthRange, type Month } from './month';
import type { Clock, MonthRange, ReportBucket, Shift } from './types';
import { addLocalDays, startOfDay, startOfWeek } from './zonedTime';

export interface WeeklyReportOptions {
  month: Month;
  spillOver: boolean;
}

interface Period {
  periodStart: Date;
  periodEnd: Date;
}

export class ReportAggregator {
  constructor(
    private readonly log: EventLog,
    private readonly timezone: string,
    private readonly now: Clock = () => new Date()
  ) {}

  // ════════════════════════════════════════════════════════════════════
  // SHIFTS
  // ════════════════════════════════════════════════════════════════════

  shifts(): Shift[] {
    const events = [...this.log.readAll()].sort(
      (a, b) => a.timestamp.getTime() - b.timestamp.getTime()
    );

    const shifts: Shift[] = [];
    for (let i = 1; i < events.length; i++) {
      const event = events[i];
      if (event.kind !== 'out') continue;

      const start = events[i - 1].timestamp;
      shifts.push({
        start,
        end: event.timestamp,
        duration: BiDuration.between(start, event.timestamp),
      });
    }
    return shifts;
  }

  // ════════════════════════════════════════════════════════════════════
  // REPORTS
  // ════════════════════════════════════════════════════════════════════

  /** One bucket per local day of the current week that has shifts */
  daily(): ReportBucket[] {
    const weekStart = startOfWeek(this.now(), this.timezone);
    const week = {
      start: weekStart,
      end: addLocalDays(weekStart, 7, this.timezone),
    };

    const shifts = this.shifts().filter(shift => endsWithin(shift, week));
    return this.bucket(shifts, 1, end => startOfDay(end, this.timezone));
  }

  /**
   * One bucket per Monday-start week. Without spill-over only shifts ending
   * inside the month count; with it, whole weeks that touch the month are kept.
   */
  weekly({ month, spillOver }: WeeklyReportOptions): ReportBucket[] {
    const range = monthRange(month, this.now(), this.timezone);

    let shifts = this.shifts();
    if (range && !spillOver) {
      shifts = shifts.filter(shift => endsWithin(shift, range));
    }

    const buckets = this.bucket(shifts, 7, end => startOfWeek(end, this.timezone));

    if (range && spillOver) {
      return buckets.filter(bucket => touchesMonth(bucket, range));
    }
    return buckets;
  }

  private bucket(shifts: Shift[], lengthInDays: number, periodOf: (end: Date) => Date): ReportBucket[] {
    const groups = new Map<number, { periodStart: Date; total: BiDuration; count: number }>();

    for (const shift of shifts) {
      const periodStart = periodOf(shift.end);
      const key = periodStart.getTime();
      const group = groups.get(key) ?? { periodStart, total: BiDuration.ZERO, count: 0 };
      group.total = group.total.plus(shift.duration);
      group.count++;
      groups.set(key, group);
    }

    return [...groups.values()]
      .sort((a, b) => a.periodStart.getTime() - b.periodStart.getTime())
      .map(group => ({
        periodStart: group.periodStart,
        periodEnd: addLocalDays(group.periodStart, lengthInDays, this.timezone),
        totalDuration: group.total,
        shiftCount: group.count,
        avgShiftDuration: group.total.dividedBy(group.count),
      }));
  }
}

// ════════════════════════════════════════════════════════════════════
// BOUNDARY TESTS
// ════════════════════════════════════════════════════════════════════

function endsWithin(shift: Shift, range: { start: Date; end: Date }): boolean {
  const end = shift.end.getTime();
  return end >= range.start.getTime() && end < range.end.getTime();
}

/**
 * Kept when the period spills in from the previous month, spills out into
 * the next one, or starts inside the month.
 */
export function touchesMonth(period: Period, range: MonthRange): boolean {
  const start = period.periodStart.getTime();
  const end = period.periodEnd.getTime();
  const monthStart = range.start.getTime();
  const monthEnd = range.end.getTime();

  const spillsIn = start < monthStart && end >= monthStart;
  const spillsOut = start < monthEnd && end >= monthEnd;
  const contained = start >= monthStart && start < monthEnd;

  return spillsIn || spillsOut || contained;
}

/** Sum of every bucket's total */
export function grandTotal(buckets: ReportBucket[]): BiDuration {
  return buckets.reduce((sum, bucket) => sum.plus(bucket.totalDuration), BiDuration.ZERO);
}
