/**
 * shiftlog
 * Clock-in/clock-out tracking on an append-only CSV log
 */

export * from './types';
export * from './errors';
export { BiDuration, MAX_NANOSECONDS, MIN_NANOSECONDS } from './biDuration';
export { EventLog, LOG_HEADER } from './eventLog';
export { StatusResolver, isClockedIn } from './statusResolver';
export { ClockStore, nextKind, type ClockResult } from './clockStore';
export { ReportAggregator, grandTotal, touchesMonth, type WeeklyReportOptions } from './reportAggregator';
export { createTracker, type Tracker } from './tracker';
export { loadConfig, LOG_FILE_NAME, DEFAULT_PORT } from './config';
export { parseMonth, monthRange, describeMonth, DEFAULT_MONTH, type Month } from './month';
export { parseQuantity, formatQuantity, takeLast, ALL, type Quantity } from './quantity';
export { toReportTable, renderTable, toCsv, ReportOutput, parseDestination, type Destination, type ReportTable } from './reportOutput';
export { createApp, startServer, issueToken } from './server';
export { generateEntries, writeGeneratedLog } from './generateData';
export { createLogger, type Logger } from './logger';
