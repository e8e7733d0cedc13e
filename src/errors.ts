/**
 * Errors
 * Tagged error classes, one per component. Callers branch on `detail.code`.
 */

import type { EntryKind } from './types';

// ════════════════════════════════════════════════════════════════════
// BASE
// ════════════════════════════════════════════════════════════════════

export class ShiftlogError extends Error {
  /** Remediation shown under the message by the CLI */
  readonly hint?: string;

  constructor(message: string, hint?: string) {
    super(message);
    this.name = new.target.name;
    this.hint = hint;
  }
}

// ════════════════════════════════════════════════════════════════════
// DURATION PARSING
// ════════════════════════════════════════════════════════════════════

export type BiDurationParseDetail =
  | { code: 'InvalidDirection'; input: string }
  | { code: 'BothDirections'; input: string }
  | { code: 'InvalidDuration'; input: string; reason: string }
  | { code: 'OutOfRange'; input: string };

export class BiDurationParseError extends ShiftlogError {
  constructor(readonly detail: BiDurationParseDetail) {
    super(describeBiDurationError(detail));
  }
}

function describeBiDurationError(detail: BiDurationParseDetail): string {
  switch (detail.code) {
    case 'InvalidDirection':
      return `Invalid direction: "${detail.input}"`;
    case 'BothDirections':
      return 'Both forward and backward directions specified';
    case 'InvalidDuration':
      return `Invalid duration: ${detail.reason}`;
    case 'OutOfRange':
      return `Out of range: "${detail.input}" is too large`;
  }
}

// ════════════════════════════════════════════════════════════════════
// SELECTORS
// ════════════════════════════════════════════════════════════════════

export type MonthParseDetail =
  | { code: 'InvalidMonthNumber'; value: number }
  | { code: 'UnknownMonth'; input: string };

export class MonthParseError extends ShiftlogError {
  constructor(readonly detail: MonthParseDetail) {
    super(
      detail.code === 'InvalidMonthNumber'
        ? `Month ${detail.value} is not a valid month number`
        : `Unknown month ${detail.input}. Expected a month number, name, or 'current', 'previous', 'next' or 'all'`
    );
  }
}

export type QuantityDetail = { code: 'Zero' } | { code: 'Unknown'; input: string };

export class QuantityError extends ShiftlogError {
  constructor(readonly detail: QuantityDetail) {
    super(
      detail.code === 'Zero'
        ? 'Quantity cannot be zero'
        : 'Unknown value. Must be a positive integer or "all"'
    );
  }
}

// ════════════════════════════════════════════════════════════════════
// CLOCK (user-correctable)
// ════════════════════════════════════════════════════════════════════

export type ClockErrorDetail =
  | { code: 'ContinuityViolation'; attempted: Date; nextEntry: Date }
  | { code: 'AlreadyInState'; kind: EntryKind };

export class ClockError extends ShiftlogError {
  constructor(readonly detail: ClockErrorDetail) {
    super(
      detail.code === 'AlreadyInState'
        ? `Already clocked ${detail.kind}`
        : 'Adding this entry would violate continuity! There is an entry after the given time.\n' +
            `Time given: ${detail.attempted.toISOString()}\n` +
            `Next entry: ${detail.nextEntry.toISOString()}`,
      detail.code === 'ContinuityViolation'
        ? 'Use an offset that lands after the latest entry'
        : undefined
    );
  }
}

// ════════════════════════════════════════════════════════════════════
// EVENT LOG (integrity and I/O)
// ════════════════════════════════════════════════════════════════════

export interface MalformedRecord {
  line: number;
  text: string;
  reason: string;
}

export type LogErrorDetail =
  | { code: 'MalformedLog'; file: string; records: MalformedRecord[] }
  | { code: 'Io'; file: string; operation: 'read' | 'write' | 'create'; cause: unknown };

export class LogError extends ShiftlogError {
  constructor(readonly detail: LogErrorDetail) {
    super(describeLogError(detail), logErrorHint(detail));
  }
}

function describeLogError(detail: LogErrorDetail): string {
  if (detail.code === 'MalformedLog') {
    const lines = detail.records.map(r => `  line ${r.line}: ${r.reason} (${JSON.stringify(r.text)})`);
    return [
      `There are malformed entries in ${detail.file}. Please fix them manually and try again.`,
      ...lines,
    ].join('\n');
  }
  const reason = detail.cause instanceof Error ? detail.cause.message : String(detail.cause);
  return `Failed to ${detail.operation} ${detail.file}: ${reason}`;
}

function logErrorHint(detail: LogErrorDetail): string {
  if (detail.code === 'MalformedLog') {
    return 'If you have not manually modified this file, please report this issue';
  }
  return `Ensure you have proper permissions for ${detail.file}, or point DATA_FOLDER elsewhere`;
}

// ════════════════════════════════════════════════════════════════════
// CONFIG
// ════════════════════════════════════════════════════════════════════

export class ConfigError extends ShiftlogError {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map(i => `  ${i}`).join('\n')}`);
  }
}
