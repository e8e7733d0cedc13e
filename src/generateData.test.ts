import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { EventLog } from './eventLog';
import { generateEntries, writeGeneratedLog } from './generateData';
import { silentLogger } from './logger';

const START = new Date('2023-05-01T00:00:00Z');

describe('generateEntries', () => {
  it('alternates kinds starting with in', () => {
    const events = generateEntries({ count: 5, start: START, random: () => 0.5 });
    expect(events.map(e => e.kind)).toEqual(['in', 'out', 'in', 'out', 'in']);
  });

  it('spaces entries by the base gap times twice the random factor', () => {
    const events = generateEntries({ count: 3, start: START, random: () => 0.5 });
    expect(events.map(e => e.timestamp.toISOString())).toEqual([
      '2023-05-01T00:00:00.000Z',
      '2023-05-01T03:30:00.000Z',
      '2023-05-01T07:00:00.000Z',
    ]);
  });

  it('produces nothing for a count of zero', () => {
    expect(generateEntries({ count: 0, start: START })).toEqual([]);
  });
});

describe('writeGeneratedLog', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'shiftlog-generate-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('replaces the log with entries that read back', () => {
    const log = new EventLog(path.join(dir, 'hours.csv'), 'UTC', silentLogger);
    log.append({ kind: 'out', timestamp: new Date('2020-01-01T00:00:00Z') });

    const events = writeGeneratedLog(log, { count: 4, start: START, random: () => 0.25 });

    expect([...log.readAll()]).toEqual(events);
    expect(events[1].timestamp.toISOString()).toBe('2023-05-01T01:45:00.000Z');
  });
});
