/**
 * Clock Store
 * The only write path. Every entry lands after the latest one and flips
 * the state, so the log keeps alternating in, out, in, ...
 */

import type { BiDuration } from './biDuration';
import { ClockError } from './errors';
import type { EventLog } from './eventLog';
import { createLogger, type Logger } from './logger';
import type { StatusResolver } from './statusResolver';
import { oppositeKind, type Clock, type ClockEvent, type ClockStatus, type EntryKind } from './types';

export type ClockResult = ClockEvent | { error: ClockError };

export class ClockStore {
  private readonly logger: Logger;

  constructor(
    private readonly log: EventLog,
    private readonly resolver: StatusResolver,
    private readonly now: Clock = () => new Date(),
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('ClockStore');
  }

  // ════════════════════════════════════════════════════════════════════
  // CLOCK IN / OUT
  // ════════════════════════════════════════════════════════════════════

  clockIn(offset?: BiDuration): ClockResult {
    return this.addEntry('in', offset);
  }

  clockOut(offset?: BiDuration): ClockResult {
    return this.addEntry('out', offset);
  }

  /** Picks the kind from the status right now, then applies the offset */
  toggle(offset?: BiDuration): ClockResult {
    const now = this.now();
    const kind = nextKind(this.resolver.resolve(now));
    return this.addEntry(kind, offset, now);
  }

  // ════════════════════════════════════════════════════════════════════
  // CONTINUITY GUARD
  // ════════════════════════════════════════════════════════════════════

  private addEntry(kind: EntryKind, offset?: BiDuration, now: Date = this.now()): ClockResult {
    const timestamp = offset ? offset.addTo(now) : now;
    return this.addEntryAt(kind, timestamp, this.resolver.resolve(timestamp));
  }

  private addEntryAt(kind: EntryKind, timestamp: Date, status: ClockStatus): ClockResult {
    // Nothing may come after the new entry.
    if (status.until) {
      this.logger.info(`Rejected clock ${kind}: entry exists after ${timestamp.toISOString()}`);
      return {
        error: new ClockError({ code: 'ContinuityViolation', attempted: timestamp, nextEntry: status.until }),
      };
    }

    if (status.activeKind === kind) {
      this.logger.info(`Rejected clock ${kind}: already clocked ${kind}`);
      return { error: new ClockError({ code: 'AlreadyInState', kind }) };
    }

    const event = this.log.append({ kind, timestamp });
    this.logger.info(`Clock ${kind.toUpperCase()} at ${timestamp.toISOString()}`);
    return event;
  }
}

/** The kind `toggle` would write next for a given status */
export function nextKind(status: ClockStatus): EntryKind {
  return status.activeKind ? oppositeKind(status.activeKind) : 'in';
}
