/**
 * Test Data Generator
 * Synthetic alternating log for trying out reports on a lot of history.
 */

import { BiDuration } from './biDuration';
import type { EventLog } from './eventLog';
import type { ClockEvent } from './types';

// Three and a half hours; each gap is this times a random factor in [0, 2)
const BASE_GAP_SECONDS = 60 * 30 * 7;

export interface GenerateOptions {
  count: number;
  start: Date;
  random?: () => number;
}

export function generateEntries({ count, start, random = Math.random }: GenerateOptions): ClockEvent[] {
  const events: ClockEvent[] = [];
  let previous = start;

  for (let i = 0; i < count; i++) {
    const timestamp =
      i === 0
        ? start
        : BiDuration.seconds(Math.floor(BASE_GAP_SECONDS * random() * 2)).addTo(previous);

    events.push({ kind: i % 2 === 0 ? 'in' : 'out', timestamp });
    previous = timestamp;
  }

  return events;
}

/** Replaces the target log with `count` generated entries */
export function writeGeneratedLog(log: EventLog, options: GenerateOptions): ClockEvent[] {
  const events = generateEntries(options);
  log.overwrite(events);
  return events;
}
