#!/usr/bin/env node
/**
 * shiftlog entry point
 */

import { runCli } from './cli';
import { loadConfig } from './config';
import { ShiftlogError } from './errors';
import { createTracker } from './tracker';

async function main(): Promise<number> {
  try {
    const tracker = createTracker(loadConfig());
    return await runCli(tracker, process.argv.slice(2));
  } catch (e) {
    if (!(e instanceof ShiftlogError)) throw e;
    console.error(`Error: ${e.message}`);
    if (e.hint) console.error(`Hint: ${e.hint}`);
    return 1;
  }
}

main().then(
  code => {
    process.exitCode = code;
  },
  error => {
    console.error('[shiftlog] Fatal error:', error);
    process.exitCode = 1;
  }
);
