/**
 * Shift Log Types
 * Append-only clock events and the views derived from them
 */

import type { BiDuration } from './biDuration';

// ════════════════════════════════════════════════════════════════════
// CLOCK EVENTS (Immutable once written)
// ════════════════════════════════════════════════════════════════════

export type EntryKind =
  | 'in'    // Clock in, start of a shift
  | 'out';  // Clock out, end of a shift

export const ENTRY_KINDS: readonly EntryKind[] = ['in', 'out'];

export interface ClockEvent {
  kind: EntryKind;
  timestamp: Date;
}

export function oppositeKind(kind: EntryKind): EntryKind {
  return kind === 'in' ? 'out' : 'in';
}

// ════════════════════════════════════════════════════════════════════
// STATUS (derived, never persisted)
// ════════════════════════════════════════════════════════════════════

export type ClockState =
  | 'no-log'      // Data file does not exist yet
  | 'no-entries'  // File exists, nothing at or before the query time
  | EntryKind;

export interface ClockStatus {
  state: ClockState;
  activeKind?: EntryKind;
  asOf: Date;
  since?: Date;   // Last entry at or before asOf
  until?: Date;   // First entry after that one
}

// ════════════════════════════════════════════════════════════════════
// SHIFTS / REPORTS
// ════════════════════════════════════════════════════════════════════

export interface Shift {
  start: Date;
  end: Date;
  duration: BiDuration;
}

export interface ReportBucket {
  periodStart: Date;      // Local midnight, inclusive
  periodEnd: Date;        // Local midnight, exclusive
  totalDuration: BiDuration;
  shiftCount: number;
  avgShiftDuration: BiDuration;
}

export type ReportMode = 'daily' | 'weekly';

export interface MonthRange {
  start: Date;
  end: Date;
}

// ════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ════════════════════════════════════════════════════════════════════

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface AppConfig {
  dataFolder: string;
  outputFile: string;
  timezone: string;
  logLevel: LogLevel;
  port: number;
  apiSecret?: string;
}

/** Source of "now"; swapped out in tests */
export type Clock = () => Date;
