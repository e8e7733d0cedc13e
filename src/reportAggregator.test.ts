import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { BiDuration } from './biDuration';
import { LogError } from './errors';
import { EventLog, LOG_HEADER } from './eventLog';
import { silentLogger } from './logger';
import { grandTotal, ReportAggregator, touchesMonth } from './reportAggregator';
import type { ClockEvent, ReportBucket } from './types';

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'shiftlog-report-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function shiftsOf(...pairs: Array<[string, string]>): ClockEvent[] {
  return pairs.flatMap(([start, end]): ClockEvent[] => [
    { kind: 'in', timestamp: new Date(start) },
    { kind: 'out', timestamp: new Date(end) },
  ]);
}

function aggregatorFor(events: ClockEvent[], now: string, timezone = 'UTC'): ReportAggregator {
  const log = new EventLog(path.join(dir, 'hours.csv'), timezone, silentLogger);
  log.overwrite(events);
  return new ReportAggregator(log, timezone, () => new Date(now));
}

function summarize(bucket: ReportBucket) {
  return {
    start: bucket.periodStart.toISOString(),
    end: bucket.periodEnd.toISOString(),
    total: bucket.totalDuration.toExactString(),
    count: bucket.shiftCount,
    avg: bucket.avgShiftDuration.toExactString(),
  };
}

describe('ReportAggregator', () => {
  describe('shifts', () => {
    it('pairs each out with the entry before it in time', () => {
      const aggregator = aggregatorFor(
        [
          { kind: 'in', timestamp: new Date('2023-05-01T13:00:00Z') },
          { kind: 'out', timestamp: new Date('2023-05-01T14:00:00Z') },
          { kind: 'out', timestamp: new Date('2023-05-01T12:00:00Z') },
          { kind: 'in', timestamp: new Date('2023-05-01T09:00:00Z') },
        ],
        '2023-05-01T15:00:00Z'
      );

      expect(aggregator.shifts().map(s => [s.start.toISOString(), s.duration.toExactString()])).toEqual([
        ['2023-05-01T09:00:00.000Z', '3h'],
        ['2023-05-01T13:00:00.000Z', '1h'],
      ]);
    });

    it('skips an out with nothing before it', () => {
      const aggregator = aggregatorFor(
        [
          { kind: 'out', timestamp: new Date('2023-05-01T08:00:00Z') },
          ...shiftsOf(['2023-05-01T09:00:00Z', '2023-05-01T10:00:00Z']),
        ],
        '2023-05-01T15:00:00Z'
      );

      expect(aggregator.shifts()).toHaveLength(1);
    });

    it('ignores an open shift', () => {
      const aggregator = aggregatorFor([{ kind: 'in', timestamp: new Date('2023-05-01T09:00:00Z') }], '2023-05-01T15:00:00Z');
      expect(aggregator.shifts()).toEqual([]);
      expect(aggregator.daily()).toEqual([]);
    });
  });

  describe('daily', () => {
    const events = shiftsOf(
      ['2023-04-28T09:00:00Z', '2023-04-28T17:00:00Z'],
      ['2023-04-30T22:00:00Z', '2023-05-01T02:00:00Z'],
      ['2023-05-01T09:00:00Z', '2023-05-01T17:00:00Z'],
      ['2023-05-02T09:00:00Z', '2023-05-02T12:30:00Z'],
      ['2023-05-08T09:00:00Z', '2023-05-08T10:00:00Z']
    );

    it('buckets the current week by the day each shift ends', () => {
      expect(aggregatorFor(events, '2023-05-03T12:00:00Z').daily().map(summarize)).toEqual([
        { start: '2023-05-01T00:00:00.000Z', end: '2023-05-02T00:00:00.000Z', total: '12h', count: 2, avg: '6h' },
        { start: '2023-05-02T00:00:00.000Z', end: '2023-05-03T00:00:00.000Z', total: '3h 30m', count: 1, avg: '3h 30m' },
      ]);
    });

    it('uses local midnights on a day that loses an hour', () => {
      const berlin = aggregatorFor(
        shiftsOf(['2024-03-31T10:00:00Z', '2024-03-31T12:00:00Z']),
        '2024-03-31T12:00:00Z',
        'Europe/Berlin'
      );

      expect(berlin.daily().map(summarize)).toEqual([
        { start: '2024-03-30T23:00:00.000Z', end: '2024-03-31T22:00:00.000Z', total: '2h', count: 1, avg: '2h' },
      ]);
    });
  });

  describe('weekly', () => {
    // March 2023 starts on a Wednesday and ends on a Friday
    const events = shiftsOf(
      ['2023-02-20T09:00:00Z', '2023-02-20T17:00:00Z'],
      ['2023-02-28T09:00:00Z', '2023-02-28T17:00:00Z'],
      ['2023-03-02T09:00:00Z', '2023-03-02T13:00:00Z'],
      ['2023-03-15T09:00:00Z', '2023-03-15T15:00:00Z'],
      ['2023-03-31T09:00:00Z', '2023-03-31T17:00:00Z'],
      ['2023-03-31T23:00:00Z', '2023-04-01T00:30:00Z'],
      ['2023-04-05T09:00:00Z', '2023-04-05T10:00:00Z']
    );
    const now = '2023-05-15T12:00:00Z';

    it('counts only shifts ending inside the month without spill-over', () => {
      const buckets = aggregatorFor(events, now).weekly({ month: 'march', spillOver: false });

      expect(buckets.map(summarize)).toEqual([
        { start: '2023-02-27T00:00:00.000Z', end: '2023-03-06T00:00:00.000Z', total: '4h', count: 1, avg: '4h' },
        { start: '2023-03-13T00:00:00.000Z', end: '2023-03-20T00:00:00.000Z', total: '6h', count: 1, avg: '6h' },
        { start: '2023-03-27T00:00:00.000Z', end: '2023-04-03T00:00:00.000Z', total: '8h', count: 1, avg: '8h' },
      ]);
    });

    it('keeps whole weeks that touch the month with spill-over', () => {
      const buckets = aggregatorFor(events, now).weekly({ month: 'march', spillOver: true });

      expect(buckets.map(summarize)).toEqual([
        { start: '2023-02-27T00:00:00.000Z', end: '2023-03-06T00:00:00.000Z', total: '12h', count: 2, avg: '6h' },
        { start: '2023-03-13T00:00:00.000Z', end: '2023-03-20T00:00:00.000Z', total: '6h', count: 1, avg: '6h' },
        { start: '2023-03-27T00:00:00.000Z', end: '2023-04-03T00:00:00.000Z', total: '9h 30m', count: 2, avg: '4h 45m' },
      ]);
    });

    it('puts a straddling week in both months with spill-over', () => {
      const april = aggregatorFor(events, now).weekly({ month: 'april', spillOver: true });
      expect(april.map(b => b.periodStart.toISOString())).toEqual([
        '2023-03-27T00:00:00.000Z',
        '2023-04-03T00:00:00.000Z',
      ]);
    });

    it('gives a shift ending just after midnight to the next month', () => {
      const april = aggregatorFor(events, now).weekly({ month: 'april', spillOver: false });
      expect(april.map(summarize)).toEqual([
        { start: '2023-03-27T00:00:00.000Z', end: '2023-04-03T00:00:00.000Z', total: '1h 30m', count: 1, avg: '1h 30m' },
        { start: '2023-04-03T00:00:00.000Z', end: '2023-04-10T00:00:00.000Z', total: '1h', count: 1, avg: '1h' },
      ]);
    });

    it('reports every week for all', () => {
      const buckets = aggregatorFor(events, now).weekly({ month: 'all', spillOver: false });
      expect(buckets).toHaveLength(5);
      expect(grandTotal(buckets).toExactString()).toBe('1day 12h 30m');
    });

    it('resolves relative months against now', () => {
      const buckets = aggregatorFor(events, '2023-04-20T12:00:00Z').weekly({ month: 'previous', spillOver: false });
      expect(buckets.map(b => b.shiftCount)).toEqual([1, 1, 1]);
    });
  });
});

describe('ReportAggregator on a malformed log', () => {
  const malformed = `${LOG_HEADER}\nin,2023-05-01T09:00:00Z\nout,half past five\n`;
  let aggregator: ReportAggregator;

  beforeEach(() => {
    const file = path.join(dir, 'hours.csv');
    fs.writeFileSync(file, malformed);
    aggregator = new ReportAggregator(new EventLog(file, 'UTC', silentLogger), 'UTC', () => new Date('2023-05-02T12:00:00Z'));
  });

  function codeOf(report: () => ReportBucket[]): string {
    try {
      report();
    } catch (e) {
      if (e instanceof LogError) return e.detail.code;
      throw e;
    }
    throw new Error('expected the report to throw');
  }

  it('refuses daily and weekly reports', () => {
    expect(codeOf(() => aggregator.daily())).toBe('MalformedLog');
    expect(codeOf(() => aggregator.weekly({ month: 'current', spillOver: false }))).toBe('MalformedLog');
    expect(fs.readFileSync(path.join(dir, 'hours.csv'), 'utf-8')).toBe(malformed);
  });
});

describe('touchesMonth', () => {
  const march = { start: new Date('2023-03-01T00:00:00Z'), end: new Date('2023-04-01T00:00:00Z') };
  const period = (start: string, end: string) => ({ periodStart: new Date(start), periodEnd: new Date(end) });

  it('keeps periods spilling in, spilling out, or starting inside', () => {
    expect(touchesMonth(period('2023-02-27T00:00:00Z', '2023-03-06T00:00:00Z'), march)).toBe(true);
    expect(touchesMonth(period('2023-03-27T00:00:00Z', '2023-04-03T00:00:00Z'), march)).toBe(true);
    expect(touchesMonth(period('2023-03-13T00:00:00Z', '2023-03-20T00:00:00Z'), march)).toBe(true);
  });

  it('drops periods entirely outside', () => {
    expect(touchesMonth(period('2023-02-13T00:00:00Z', '2023-02-20T00:00:00Z'), march)).toBe(false);
    expect(touchesMonth(period('2023-04-03T00:00:00Z', '2023-04-10T00:00:00Z'), march)).toBe(false);
  });

  it('treats an end exactly at the month start as spilling in', () => {
    expect(touchesMonth(period('2023-02-22T00:00:00Z', '2023-03-01T00:00:00Z'), march)).toBe(true);
  });
});

describe('grandTotal', () => {
  it('is zero for no buckets', () => {
    expect(grandTotal([]).equals(BiDuration.ZERO)).toBe(true);
  });
});
