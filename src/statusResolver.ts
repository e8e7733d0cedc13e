/**
 * Status Resolver
 * Where the log stands at any moment, past or future. Read-only.
 */

import type { EventLog } from './eventLog';
import type { ClockStatus } from './types';

export class StatusResolver {
  constructor(private readonly log: EventLog) {}

  resolve(asOf: Date): ClockStatus {
    if (!this.log.exists()) {
      return { state: 'no-log', asOf };
    }

    const { current, next } = this.log.lastBefore(asOf);

    if (!current) {
      return { state: 'no-entries', asOf, until: next?.timestamp };
    }

    return {
      state: current.kind,
      activeKind: current.kind,
      asOf,
      since: current.timestamp,
      until: next?.timestamp,
    };
  }
}

/** Clocked in right now, as opposed to clocked out, empty, or missing */
export function isClockedIn(status: ClockStatus): boolean {
  return status.activeKind === 'in';
}
