/**
 * Tracker
 * Wires the log, resolver, clock store and aggregator for one configuration.
 */

import type { BiDuration } from './biDuration';
import { ClockStore, type ClockResult } from './clockStore';
import { EventLog } from './eventLog';
import { createLogger } from './logger';
import { DEFAULT_MONTH, type Month } from './month';
import { ReportAggregator } from './reportAggregator';
import { StatusResolver } from './statusResolver';
import type { AppConfig, Clock, ClockStatus, ReportBucket, Shift } from './types';

export interface Tracker {
  readonly config: AppConfig;
  readonly log: EventLog;
  now(): Date;
  clockIn(offset?: BiDuration): ClockResult;
  clockOut(offset?: BiDuration): ClockResult;
  toggle(offset?: BiDuration): ClockResult;
  status(queryTime?: Date): ClockStatus;
  dailyReport(): ReportBucket[];
  weeklyReport(month?: Month, spillOver?: boolean): ReportBucket[];
  shifts(): Shift[];
}

export function createTracker(config: AppConfig, clock: Clock = () => new Date()): Tracker {
  const logger = createLogger('Tracker', config.logLevel);
  const log = new EventLog(config.outputFile, config.timezone, logger.child('EventLog'));
  const resolver = new StatusResolver(log);
  const store = new ClockStore(log, resolver, clock, logger.child('ClockStore'));
  const aggregator = new ReportAggregator(log, config.timezone, clock);

  logger.debug(`Using ${config.outputFile} (${config.timezone})`);

  return {
    config,
    log,
    now: clock,
    clockIn: offset => store.clockIn(offset),
    clockOut: offset => store.clockOut(offset),
    toggle: offset => store.toggle(offset),
    status: queryTime => resolver.resolve(queryTime ?? clock()),
    dailyReport: () => aggregator.daily(),
    weeklyReport: (month = DEFAULT_MONTH, spillOver = false) => aggregator.weekly({ month, spillOver }),
    shifts: () => aggregator.shifts(),
  };
}
