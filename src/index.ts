#!/usr/bin/env node
/**
 * Command-line entry point.
 *
 * Scans a subnet (or reads a candidate list), verifies every candidate
 * as an HTTP proxy, and prints the working ones ranked by latency.
 */

import { errorMessage } from './shared/errors.js';

async function start(): Promise<void> {
  // Loading the logger loads and validates the environment (.env included);
  // a bad variable prints its own report before this import rejects.
  let getLogger: Awaited<typeof import('./shared/logger.js')>['getLogger'];
  let main: Awaited<typeof import('./cli/run.js')>['main'];
  try {
    ({ getLogger } = await import('./shared/logger.js'));
    ({ main } = await import('./cli/run.js'));
  } catch (error) {
    process.stderr.write(`error: ${errorMessage(error)}\n`);
    process.exit(1);
  }

  const logger = getLogger('cli');

  process.on('unhandledRejection', (reason: unknown) => {
    logger.fatal({ err: reason }, 'Unhandled rejection');
    process.exit(1);
  });

  process.on('uncaughtException', (error: Error) => {
    logger.fatal({ err: error }, 'Uncaught exception');
    process.exit(1);
  });

  process.exitCode = await main(process.argv.slice(2));
}

void start();
