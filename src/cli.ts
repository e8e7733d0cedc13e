/**
 * Command Line
 * shiftlog in | out | toggle | status | report | now | serve | token | generate-data
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { BiDuration } from './biDuration';
import type { ClockResult } from './clockStore';
import { ClockError, ShiftlogError } from './errors';
import { EventLog, formatLog } from './eventLog';
import { generateEntries, writeGeneratedLog } from './generateData';
import { createLogger } from './logger';
import { DEFAULT_MONTH, describeMonth, parseMonth, type Month } from './month';
import { parseQuantity, takeLast, type Quantity } from './quantity';
import { grandTotal } from './reportAggregator';
import { parseDestination, renderTable, ReportOutput, toCsv, toReportTable, type Destination } from './reportOutput';
import { issueToken, startServer } from './server';
import type { Tracker } from './tracker';
import type { ClockStatus, ReportBucket, ReportMode } from './types';
import {
  formatHumanTimestamp,
  formatLogTimestamp,
  formatSlimDateTime,
  formatZoneLabel,
} from './zonedTime';

export interface CliIo {
  out: (text: string) => void;
  err: (text: string) => void;
}

const defaultIo: CliIo = {
  out: text => process.stdout.write(`${text}\n`),
  err: text => process.stderr.write(`${text}\n`),
};

// ════════════════════════════════════════════════════════════════════
// ARGUMENT PARSERS
// ════════════════════════════════════════════════════════════════════

/** Re-throws our parse errors as commander argument errors */
function argument<T>(parse: (value: string) => T): (value: string) => T {
  return value => {
    try {
      return parse(value);
    } catch (e) {
      if (e instanceof ShiftlogError) throw new InvalidArgumentError(e.message);
      throw e;
    }
  };
}

const offsetOption = () =>
  new Option('-o, --offset <duration>', 'offset from now, e.g. "15m ago" or "in 1h"').argParser(
    argument(BiDuration.parse)
  );

function positiveInteger(value: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value) || n === 0) {
    throw new InvalidArgumentError('Expected a positive integer');
  }
  return n;
}

function portNumber(value: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value) || n > 65535) {
    throw new InvalidArgumentError('Expected a port between 0 and 65535');
  }
  return n;
}

// ════════════════════════════════════════════════════════════════════
// OUTPUT
// ════════════════════════════════════════════════════════════════════

export function describeClockError(error: ClockError, timezone: string): string {
  const { detail } = error;
  if (detail.code === 'AlreadyInState') {
    return `Already clocked ${detail.kind}`;
  }
  return [
    'Adding this entry would violate continuity! There is an entry after the given time.',
    `Time given: ${formatSlimDateTime(detail.attempted, timezone)}`,
    `Next entry: ${formatSlimDateTime(detail.nextEntry, timezone)}`,
  ].join('\n');
}

export function describeStatus(status: ClockStatus, timezone: string, now: Date): string[] {
  const header =
    status.asOf.getTime() === now.getTime()
      ? 'Status Report:'
      : `Status Report @ ${formatSlimDateTime(status.asOf, timezone)} (${BiDuration.between(now, status.asOf).toFriendlyRelativeString()}):`;

  let state: string;
  switch (status.state) {
    case 'no-log':
      state = 'Clocked out (no data file)';
      break;
    case 'no-entries':
      state = 'Clocked out (no entries)';
      break;
    default:
      state = `Clocked ${status.state}`;
  }

  const when = (date?: Date) => (date ? formatSlimDateTime(date, timezone) : 'N/A');

  return [header, `   Status: ${state}`, `    Since: ${when(status.since)}`, `    Until: ${when(status.until)}`];
}

// ════════════════════════════════════════════════════════════════════
// PROGRAM
// ════════════════════════════════════════════════════════════════════

interface ReportFlags {
  rows: Quantity;
  exact?: boolean;
  output?: Destination;
  justTable?: boolean;
}

export function buildProgram(tracker: Tracker, io: CliIo = defaultIo): Command {
  const { config } = tracker;
  const logger = createLogger('Cli', config.logLevel);
  const program = new Command();

  program
    .name('shiftlog')
    .description('Track work hours with an append-only clock in/out log')
    .version('0.1.0')
    .configureOutput({
      writeOut: text => io.out(text.trimEnd()),
      writeErr: text => io.err(text.trimEnd()),
    })
    .exitOverride();

  const printClock = (result: ClockResult, offset?: BiDuration) => {
    if ('error' in result) {
      throw result.error;
    }
    const suffix = offset ? ` (${offset.toFriendlyString()})` : '';
    io.out(
      `Clocked ${result.kind} @ ${formatSlimDateTime(result.timestamp, config.timezone)} ` +
        `(${formatZoneLabel(result.timestamp, config.timezone)})${suffix}`
    );
  };

  // ── clock ──────────────────────────────────────────────────────────

  program
    .command('in')
    .description('Clock in')
    .addOption(offsetOption())
    .action((opts: { offset?: BiDuration }) => printClock(tracker.clockIn(opts.offset), opts.offset));

  program
    .command('out')
    .description('Clock out')
    .addOption(offsetOption())
    .action((opts: { offset?: BiDuration }) => printClock(tracker.clockOut(opts.offset), opts.offset));

  program
    .command('toggle')
    .description('Clock out if clocked in, otherwise clock in')
    .addOption(offsetOption())
    .action((opts: { offset?: BiDuration }) => printClock(tracker.toggle(opts.offset), opts.offset));

  program
    .command('status')
    .description('Show whether you are clocked in, now or at an offset')
    .addOption(offsetOption())
    .action((opts: { offset?: BiDuration }) => {
      const now = tracker.now();
      const status = tracker.status(opts.offset ? opts.offset.addTo(now) : now);
      describeStatus(status, config.timezone, now).forEach(line => io.out(line));
    });

  // ── reports ────────────────────────────────────────────────────────

  const report = program.command('report').description('Summarize hours by day or week');

  const withReportFlags = (command: Command) =>
    command
      .addOption(
        new Option('-n, --rows <quantity>', 'print the last N rows, or "all"')
          .argParser(argument(parseQuantity))
          .default(parseQuantity('10'), '10')
      )
      .option('--exact', 'print exact durations instead of rounded')
      .addOption(
        new Option('--output <destination>', "save the report as CSV to a file, or '-' for stdout").argParser(
          parseDestination
        )
      )
      .option('-j, --just-table', 'only print the table');

  const printReport = (mode: ReportMode, buckets: ReportBucket[], flags: ReportFlags, title: string) => {
    const table = toReportTable(buckets, mode, { timezone: config.timezone, exact: flags.exact });

    if (flags.output) {
      new ReportOutput(csv => io.out(csv.trimEnd()), logger.child('ReportOutput')).export(toCsv(table), flags.output);
      if (flags.output.kind === 'stdout') return;
    }

    const shown = { ...table, rows: takeLast(table.rows, flags.rows) };

    if (!flags.justTable) {
      const now = tracker.now();
      io.out(`${title} generated at ${formatSlimDateTime(now, config.timezone)} (${formatZoneLabel(now, config.timezone)}):`);
      io.out('');
    }
    io.out(renderTable(shown));
    if (!flags.justTable) {
      io.out('');
      io.out(`Total: ${grandTotal(buckets).toFriendlyHoursString()}`);
    }
  };

  withReportFlags(report.command('daily').description('Report by day for the current week')).action(
    (flags: ReportFlags) => printReport('daily', tracker.dailyReport(), flags, 'Daily report')
  );

  withReportFlags(
    report
      .command('weekly', { isDefault: true })
      .description('Report by week for a month')
      .addOption(
        new Option('-m, --month <month>', 'month name or number, or current, previous, next, all')
          .argParser(argument(parseMonth))
          .default(DEFAULT_MONTH)
      )
      .option('-s, --spill-over', 'include weeks that cross into or out of the month')
  ).action((flags: ReportFlags & { month: Month; spillOver?: boolean }) => {
    const buckets = tracker.weeklyReport(flags.month, flags.spillOver ?? false);
    const title = `Weekly report for ${describeMonth(flags.month, tracker.now(), config.timezone)}`;
    printReport('weekly', buckets, flags, title);
  });

  // ── utilities ──────────────────────────────────────────────────────

  program
    .command('now')
    .description('Print the current time in the log timestamp format')
    .option('-H, --human-readable', 'print "YYYY-MM-DD HH:MM:SS" instead')
    .action((opts: { humanReadable?: boolean }) => {
      const now = tracker.now();
      io.out(opts.humanReadable ? formatHumanTimestamp(now, config.timezone) : formatLogTimestamp(now, config.timezone));
    });

  program
    .command('serve')
    .description('Serve the clock and reports over HTTP')
    .option('-p, --port <port>', 'port to listen on', portNumber)
    .action(async (opts: { port?: number }) => {
      await startServer(tracker, opts.port ?? config.port);
    });

  program
    .command('token')
    .description('Print a bearer token for the HTTP API (needs SHIFTLOG_API_SECRET)')
    .option('--expires-in <seconds>', 'token lifetime in seconds', positiveInteger)
    .action((opts: { expiresIn?: number }) => {
      if (!config.apiSecret) {
        throw new ShiftlogError('SHIFTLOG_API_SECRET is not set', 'Set it in the environment of both the server and this command');
      }
      io.out(issueToken(config.apiSecret, opts.expiresIn));
    });

  program
    .command('generate-data')
    .description('Write a synthetic log for trying out reports (replaces the target file)')
    .option('-c, --count <n>', 'number of entries', positiveInteger, 10_000)
    .addOption(
      new Option('--output <destination>', "file to write instead of the data file, or '-' for stdout").argParser(
        parseDestination
      )
    )
    .action((opts: { count: number; output?: Destination }) => {
      const options = { count: opts.count, start: tracker.now() };
      if (opts.output?.kind === 'stdout') {
        io.out(formatLog(generateEntries(options), config.timezone).trimEnd());
        return;
      }

      const log = opts.output ? new EventLog(opts.output.path, config.timezone, logger.child('EventLog')) : tracker.log;
      writeGeneratedLog(log, options);
      io.out(`Wrote ${opts.count} entries to ${log.file}`);
    });

  return program;
}

/** Runs one invocation; resolves to the process exit code */
export async function runCli(tracker: Tracker, argv: string[], io: CliIo = defaultIo): Promise<number> {
  const program = buildProgram(tracker, io);

  try {
    await program.parseAsync(argv, { from: 'user' });
    return 0;
  } catch (e) {
    return reportError(e, tracker.config.timezone, io);
  }
}

function reportError(e: unknown, timezone: string, io: CliIo): number {
  if (isCommanderExit(e)) {
    return e.exitCode;
  }

  if (e instanceof ClockError) {
    io.err(`Error: ${describeClockError(e, timezone)}`);
  } else if (e instanceof ShiftlogError) {
    io.err(`Error: ${e.message}`);
  } else {
    throw e;
  }

  if (e.hint) io.err(`Hint: ${e.hint}`);
  return 1;
}

function isCommanderExit(e: unknown): e is { exitCode: number; code: string } {
  return (
    typeof e === 'object' &&
    e !== null &&
    'code' in e &&
    typeof e.code === 'string' &&
    e.code.startsWith('commander.') &&
    'exitCode' in e &&
    typeof e.exitCode === 'number'
  );
}
