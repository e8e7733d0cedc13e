/**
 * Configuration
 * Read from the environment once at start-up and passed down explicitly.
 */

import os from 'os';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors';
import type { AppConfig } from './types';
import { isValidTimeZone, systemTimeZone } from './zonedTime';

export const LOG_FILE_NAME = 'hours.csv';
export const DEFAULT_PORT = 3002;

const blankAsUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const EnvSchema = z.object({
  DATA_FOLDER: z.preprocess(blankAsUndefined, z.string().optional()),
  TIMEZONE: z.preprocess(
    blankAsUndefined,
    z
      .string()
      .refine(isValidTimeZone, value => ({ message: `"${value}" is not a known IANA timezone` }))
      .optional()
  ),
  LOG_LEVEL: z.preprocess(
    blankAsUndefined,
    z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('warn')
  ),
  PORT: z.preprocess(blankAsUndefined, z.coerce.number().int().min(0).max(65535).default(DEFAULT_PORT)),
  SHIFTLOG_API_SECRET: z.preprocess(blankAsUndefined, z.string().optional()),
  XDG_DATA_HOME: z.preprocess(blankAsUndefined, z.string().optional()),
});

export type Env = Record<string, string | undefined>;

function defaultDataFolder(xdgDataHome: string | undefined): string {
  const base = xdgDataHome ?? path.join(os.homedir(), '.local', 'share');
  return path.join(base, 'shiftlog');
}

export function loadConfig(env: Env = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  const dataFolder = path.resolve(vars.DATA_FOLDER ?? defaultDataFolder(vars.XDG_DATA_HOME));

  return Object.freeze({
    dataFolder,
    outputFile: path.join(dataFolder, LOG_FILE_NAME),
    timezone: vars.TIMEZONE ?? systemTimeZone(),
    logLevel: vars.LOG_LEVEL,
    port: vars.PORT,
    apiSecret: vars.SHIFTLOG_API_SECRET,
  });
}
