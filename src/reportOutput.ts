/**
 * REPORT OUTPUT
 * =============
 *
 * Responsibility: Turn report buckets into rows, a terminal table or CSV,
 * and write them to stdout or a file.
 */

import fs from 'fs';
import path from 'path';
import { LogError } from './errors';
import { createLogger, type Logger } from './logger';
import type { ReportBucket, ReportMode } from './types';
import { formatDate } from './zonedTime';

export interface ReportTable {
  columns: string[];
  rows: string[][];
}

export interface RowOptions {
  timezone: string;
  /** Exact unit form instead of rounded hours and minutes */
  exact?: boolean;
}

/** `-` is stdout, anything else a file path */
export type Destination = { kind: 'stdout' } | { kind: 'file'; path: string };

export function parseDestination(value: string): Destination {
  return value === '-' ? { kind: 'stdout' } : { kind: 'file', path: value };
}

const DAILY_COLUMNS = ['Date', 'Total Hours', 'Number of Shifts', 'Avg. Shift Duration'];
const WEEKLY_COLUMNS = ['Week Of', 'Total Hours', 'Week End', 'Number of Shifts', 'Avg. Shift Duration'];

// ════════════════════════════════════════════════════════════════════
// ROWS
// ════════════════════════════════════════════════════════════════════

export function toReportTable(buckets: ReportBucket[], mode: ReportMode, options: RowOptions): ReportTable {
  const duration = (bucket: ReportBucket, field: 'totalDuration' | 'avgShiftDuration') =>
    options.exact ? bucket[field].toExactString() : bucket[field].toFriendlyHoursString();

  if (mode === 'daily') {
    return {
      columns: DAILY_COLUMNS,
      rows: buckets.map(bucket => [
        formatDate(bucket.periodStart, options.timezone),
        duration(bucket, 'totalDuration'),
        String(bucket.shiftCount),
        duration(bucket, 'avgShiftDuration'),
      ]),
    };
  }

  return {
    columns: WEEKLY_COLUMNS,
    rows: buckets.map(bucket => [
      formatDate(bucket.periodStart, options.timezone),
      duration(bucket, 'totalDuration'),
      formatDate(bucket.periodEnd, options.timezone),
      String(bucket.shiftCount),
      duration(bucket, 'avgShiftDuration'),
    ]),
  };
}

// ════════════════════════════════════════════════════════════════════
// RENDERING
// ════════════════════════════════════════════════════════════════════

/** Plain aligned text, one line per row */
export function renderTable(table: ReportTable): string {
  const widths = table.columns.map((column, i) =>
    Math.max(column.length, ...table.rows.map(row => row[i].length))
  );

  const line = (cells: string[]) =>
    cells.map((cell, i) => cell.padEnd(widths[i])).join(' | ').trimEnd();

  return [
    line(table.columns),
    widths.map(w => '-'.repeat(w)).join('-+-'),
    ...table.rows.map(line),
  ].join('\n');
}

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function toCsv(table: ReportTable): string {
  return [table.columns, ...table.rows]
    .map(cells => cells.map(csvField).join(','))
    .join('\n') + '\n';
}

// ════════════════════════════════════════════════════════════════════
// EXPORT
// ════════════════════════════════════════════════════════════════════

export class ReportOutput {
  constructor(
    private readonly stdout: (content: string) => void = content => process.stdout.write(content),
    private readonly logger: Logger = createLogger('ReportOutput')
  ) {}

  /** Creates or truncates the destination file */
  export(content: string, destination: Destination): void {
    if (destination.kind === 'stdout') {
      this.stdout(content);
      return;
    }

    try {
      fs.mkdirSync(path.dirname(destination.path), { recursive: true });
      fs.writeFileSync(destination.path, content);
    } catch (cause) {
      throw new LogError({ code: 'Io', file: destination.path, operation: 'write', cause });
    }

    this.logger.info(`Exported report to: ${destination.path}`);
  }
}
