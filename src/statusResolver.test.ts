import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { EventLog, LOG_HEADER } from './eventLog';
import { silentLogger } from './logger';
import { isClockedIn, StatusResolver } from './statusResolver';

const T0 = new Date('2023-05-01T09:00:00Z');
const T1 = new Date('2023-05-01T17:00:00Z');

let dir: string;
let file: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'shiftlog-status-'));
  file = path.join(dir, 'hours.csv');
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function resolverFor(lines: string[] | undefined): StatusResolver {
  if (lines) {
    fs.writeFileSync(file, [LOG_HEADER, ...lines, ''].join('\n'));
  }
  return new StatusResolver(new EventLog(file, 'UTC', silentLogger));
}

describe('StatusResolver', () => {
  it('reports a missing log', () => {
    const asOf = new Date('2023-05-01T12:00:00Z');
    expect(resolverFor(undefined).resolve(asOf)).toEqual({ state: 'no-log', asOf });
  });

  it('reports an empty log as having no entries', () => {
    const status = resolverFor([]).resolve(T0);
    expect(status.state).toBe('no-entries');
    expect(status.activeKind).toBeUndefined();
    expect(status.until).toBeUndefined();
  });

  it('reports no entries before the first one, with the first as until', () => {
    const status = resolverFor(['in,2023-05-01T09:00:00Z']).resolve(new Date('2023-05-01T08:00:00Z'));
    expect(status.state).toBe('no-entries');
    expect(status.until).toEqual(T0);
  });

  describe('during and after a shift', () => {
    const shift = ['in,2023-05-01T09:00:00Z', 'out,2023-05-01T17:00:00Z'];

    it('is clocked in from the in entry up to the out entry', () => {
      for (const asOf of [T0, new Date('2023-05-01T16:59:59.999Z')]) {
        expect(resolverFor(shift).resolve(asOf)).toEqual({
          state: 'in',
          activeKind: 'in',
          asOf,
          since: T0,
          until: T1,
        });
      }
    });

    it('is clocked out from the out entry on', () => {
      const asOf = new Date('2023-05-02T09:00:00Z');
      expect(resolverFor(shift).resolve(asOf)).toEqual({
        state: 'out',
        activeKind: 'out',
        asOf,
        since: T1,
        until: undefined,
      });
      expect(resolverFor(shift).resolve(T1).since).toEqual(T1);
    });
  });

  it('tells clocked in apart from the other states', () => {
    const resolver = resolverFor(['in,2023-05-01T09:00:00Z']);
    expect(isClockedIn(resolver.resolve(T1))).toBe(true);
    expect(isClockedIn(resolver.resolve(new Date('2023-05-01T08:00:00Z')))).toBe(false);
  });
});
