/**
 * Event Log
 * Append-only CSV of clock events. One header line, then one record per line:
 *
 *   entry_type,timestamp
 *   in,2023-05-01T09:00:00.000000000-0700
 *   out,2023-05-01T17:30:00.000000000-0700
 *
 * Records keep insertion order. A file with any malformed record is
 * refused as a whole until it is fixed by hand.
 */

import fs from 'fs';
import path from 'path';
import { LogError, type MalformedRecord } from './errors';
import { createLogger, type Logger } from './logger';
import { ENTRY_KINDS, type ClockEvent, type EntryKind } from './types';
import { formatLogTimestamp, parseLogTimestamp } from './zonedTime';

export const LOG_HEADER = 'entry_type,timestamp';

export interface Neighbours {
  current?: ClockEvent;   // Last event at or before the query
  next?: ClockEvent;      // First event after it, later than the query
}

export class EventLog {
  private readonly logger: Logger;

  constructor(
    readonly file: string,
    private readonly timezone: string,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('EventLog');
  }

  // ════════════════════════════════════════════════════════════════════
  // READ
  // ════════════════════════════════════════════════════════════════════

  exists(): boolean {
    return fs.existsSync(this.file);
  }

  /**
   * Every event in file order. The file is validated up front and the
   * first iteration reuses that pass; iterating again re-reads it.
   */
  readAll(): Iterable<ClockEvent> {
    let validated: ClockEvent[] | undefined = this.parse();
    return {
      [Symbol.iterator]: () => {
        const events = validated ?? this.parse();
        validated = undefined;
        return events[Symbol.iterator]();
      },
    };
  }

  /** Single pass in file order */
  lastBefore(time: Date): Neighbours {
    let current: ClockEvent | undefined;
    let next: ClockEvent | undefined;

    for (const event of this.readAll()) {
      if (event.timestamp.getTime() > time.getTime()) {
        next = event;
        break;
      }
      current = event;
    }

    return { current, next };
  }

  private readText(): string {
    try {
      return fs.readFileSync(this.file, 'utf-8');
    } catch (cause) {
      throw new LogError({ code: 'Io', file: this.file, operation: 'read', cause });
    }
  }

  private parse(): ClockEvent[] {
    if (!this.exists()) return [];

    const lines = this.readText().split(/\r?\n/);
    const events: ClockEvent[] = [];
    const malformed: MalformedRecord[] = [];

    let headerSeen = false;
    lines.forEach((text, index) => {
      const line = index + 1;
      if (text.trim() === '') return;

      if (!headerSeen) {
        headerSeen = true;
        if (text.trim() !== LOG_HEADER) {
          malformed.push({ line, text, reason: `expected header "${LOG_HEADER}"` });
        }
        return;
      }

      const result = parseRecord(text);
      if ('reason' in result) {
        malformed.push({ line, text, reason: result.reason });
      } else {
        events.push(result);
      }
    });

    if (malformed.length > 0) {
      this.logger.error(`${malformed.length} malformed record(s) in ${this.file}`);
      throw new LogError({ code: 'MalformedLog', file: this.file, records: malformed });
    }

    return events;
  }

  // ════════════════════════════════════════════════════════════════════
  // WRITE (append only)
  // ════════════════════════════════════════════════════════════════════

  append(event: ClockEvent): ClockEvent {
    const size = this.size();

    if (size === undefined) {
      try {
        fs.mkdirSync(path.dirname(this.file), { recursive: true });
      } catch (cause) {
        throw new LogError({ code: 'Io', file: path.dirname(this.file), operation: 'create', cause });
      }
    }

    // Empty or missing files get the header; a hand-edited last line may lack its newline
    let prefix = '';
    if (!size) {
      prefix = `${LOG_HEADER}\n`;
    } else if (this.lastByte(size) !== '\n') {
      prefix = '\n';
    }

    const record = formatRecord(event, this.timezone);
    try {
      fs.appendFileSync(this.file, prefix + record);
    } catch (cause) {
      throw new LogError({ code: 'Io', file: this.file, operation: 'write', cause });
    }

    this.logger.debug(`Appended ${record.trim()}`);
    return event;
  }

  private size(): number | undefined {
    if (!this.exists()) return undefined;
    try {
      return fs.statSync(this.file).size;
    } catch (cause) {
      throw new LogError({ code: 'Io', file: this.file, operation: 'read', cause });
    }
  }

  private lastByte(size: number): string {
    const buffer = Buffer.alloc(1);
    try {
      const fd = fs.openSync(this.file, 'r');
      try {
        fs.readSync(fd, buffer, 0, 1, size - 1);
      } finally {
        fs.closeSync(fd);
      }
    } catch (cause) {
      throw new LogError({ code: 'Io', file: this.file, operation: 'read', cause });
    }
    return buffer.toString('utf-8');
  }

  /** Replaces the file with a fresh header and the given events */
  overwrite(events: ClockEvent[]): void {
    try {
      fs.mkdirSync(path.dirname(this.file), { recursive: true });
      fs.writeFileSync(this.file, formatLog(events, this.timezone));
    } catch (cause) {
      throw new LogError({ code: 'Io', file: this.file, operation: 'write', cause });
    }

    this.logger.info(`Wrote ${events.length} entries to ${this.file}`);
  }
}

// ════════════════════════════════════════════════════════════════════
// RECORD CODEC
// ════════════════════════════════════════════════════════════════════

function formatRecord(event: ClockEvent, timezone: string): string {
  return `${event.kind},${formatLogTimestamp(event.timestamp, timezone)}\n`;
}

/** A complete log file: header plus one record per event */
export function formatLog(events: ClockEvent[], timezone: string): string {
  return LOG_HEADER + '\n' + events.map(event => formatRecord(event, timezone)).join('');
}

function isEntryKind(value: string): value is EntryKind {
  return ENTRY_KINDS.some(kind => kind === value);
}

export function parseRecord(text: string): ClockEvent | { reason: string } {
  const fields = text.split(',');
  if (fields.length !== 2) {
    return { reason: `expected 2 fields, found ${fields.length}` };
  }

  const [kind, rawTimestamp] = fields.map(f => f.trim());
  if (!isEntryKind(kind)) {
    return { reason: `unknown entry type "${kind}"` };
  }

  const timestamp = parseLogTimestamp(rawTimestamp);
  if (!timestamp) {
    return { reason: `invalid timestamp "${rawTimestamp}"` };
  }

  return { kind, timestamp };
}
