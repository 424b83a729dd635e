import { env } from '../env.js';
import { getLogger } from '../shared/logger.js';
import { TypedEventEmitter } from '../shared/events.js';
import { isOperationalError, errorMessage } from '../shared/errors.js';
import { APP_NAME, APP_VERSION, EXIT_CODES } from '../shared/constants.js';
import { createSource, type ProbeFn } from '../discovery/index.js';
import { ProxyVerifier, type Verifier } from '../proxy/index.js';
import { runPipeline, type PipelineResult } from '../pipeline/index.js';
import { ConsoleReporter, writeResultsCsv, type OutputStream } from '../report/index.js';
import { parseCommandLine, USAGE, type RunOptions } from './options.js';

const log = getLogger('cli');

/** Seams for tests; production runs use the defaults. */
export interface RunDependencies {
  verify?: Verifier;
  probe?: ProbeFn;
  out?: OutputStream;
  status?: OutputStream;
  color?: boolean;
}

/**
 * Executes one scan: builds the source, runs the pipeline with console
 * reporting attached, prints the ranking and writes the CSV report.
 * Source and report errors propagate to the caller.
 */
export async function runScan(
  options: RunOptions,
  deps: RunDependencies = {},
): Promise<PipelineResult> {
  const source = await createSource(
    options.source.mode === 'range'
      ? {
          mode: 'range',
          subnet: options.source.subnet,
          port: options.port,
          scanTimeoutMs: options.scanTimeoutMs,
          scanConcurrency: env.SCAN_CONCURRENCY,
          probe: deps.probe,
        }
      : { mode: 'file', input: options.source.input, port: options.port },
  );

  const verify =
    deps.verify ??
    new ProxyVerifier({
      timeoutSec: options.testTimeoutSec,
      geoApiUrl: env.GEO_API_URL,
    }).asVerifier();

  const events = new TypedEventEmitter();
  const reporter = new ConsoleReporter({
    verbose: options.verbose,
    out: deps.out,
    status: deps.status,
    color: deps.color,
  });
  reporter.attach(events);

  let outcome: PipelineResult;
  try {
    outcome = await runPipeline({
      source,
      verify,
      channelCapacity: env.CHANNEL_CAPACITY,
      events,
    });
  } catch (error) {
    reporter.abort();
    throw error;
  }

  reporter.printResults(outcome.results);

  if (options.output && outcome.results.length > 0) {
    await writeResultsCsv(options.output, outcome.results);
    reporter.printSaved(options.output);
  }

  return outcome;
}

/**
 * Command-line entry: parses argv, runs the scan and maps failures to
 * exit codes. Operational errors print one line; anything else is
 * logged with its stack.
 */
export async function main(argv: readonly string[], deps: RunDependencies = {}): Promise<number> {
  const out = deps.out ?? process.stdout;
  const errOut = deps.status ?? process.stderr;

  try {
    const command = parseCommandLine(argv);
    switch (command.kind) {
      case 'help':
        out.write(USAGE);
        return EXIT_CODES.OK;
      case 'version':
        out.write(`${APP_NAME} ${APP_VERSION}\n`);
        return EXIT_CODES.OK;
      case 'run':
        await runScan(command.options, deps);
        return EXIT_CODES.OK;
    }
  } catch (error) {
    if (isOperationalError(error)) {
      errOut.write(`error: ${error.message}\n`);
      if (error.exitCode === EXIT_CODES.USAGE) {
        errOut.write(`\n${USAGE}`);
      }
      return error.exitCode;
    }

    log.fatal({ err: error }, 'Unexpected failure');
    errOut.write(`error: ${errorMessage(error)}\n`);
    return EXIT_CODES.FAILURE;
  }
}
