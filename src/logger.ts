/**
 * Logger
 * Tagged console output ("[EventLog] ..."), filtered by level.
 * Everything goes to stderr so command output on stdout stays clean.
 */

import type { LogLevel } from './types';

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  child(tag: string): Logger;
}

export function createLogger(tag: string, level: LogLevel = 'warn'): Logger {
  const enabled = (at: LogLevel) => RANK[at] >= RANK[level];
  const prefix = `[${tag}]`;

  return {
    debug: (message, ...details) => {
      if (enabled('debug')) console.error(prefix, message, ...details);
    },
    info: (message, ...details) => {
      if (enabled('info')) console.error(prefix, message, ...details);
    },
    warn: (message, ...details) => {
      if (enabled('warn')) console.warn(prefix, message, ...details);
    },
    error: (message, ...details) => {
      if (enabled('error')) console.error(prefix, message, ...details);
    },
    child: childTag => createLogger(childTag, level),
  };
}

export const silentLogger: Logger = createLogger('silent', 'silent');
