import chalk, { Chalk, type ChalkInstance } from 'chalk';
import { formatEndpoint } from '../discovery/endpoint.js';
import { errorMessage } from '../shared/errors.js';
import type { TypedEventEmitter } from '../shared/events.js';
import type { ProxyResult } from '../proxy/types.js';
import { ProgressDisplay, type OutputStream } from './progress.js';
import { renderResultsTable } from './table.js';

export const NO_RESULTS_MESSAGE = 'No working HTTP proxies were found.';
export const FINISHED_MESSAGE = 'All tasks completed!';
const SCANNING_MESSAGE = 'Scanning subnet...';

export interface ConsoleReporterOptions {
  verbose: boolean;
  /** Report and results. Default: process.stdout */
  out?: OutputStream;
  /** Progress indicator and verbose status lines. Default: process.stderr */
  status?: OutputStream;
  /** Force colours on or off; default follows terminal support. */
  color?: boolean;
}

/**
 * Console front end for a run: drives the progress indicator from
 * pipeline events, prints per-candidate status lines in verbose mode,
 * and prints the final ranking.
 */
export class ConsoleReporter {
  private readonly verbose: boolean;
  private readonly out: OutputStream;
  private readonly status: OutputStream;
  private readonly paint: ChalkInstance;
  private progress: ProgressDisplay | null = null;
  private spinner = false;
  private found = 0;

  constructor(options: ConsoleReporterOptions) {
    this.verbose = options.verbose;
    this.out = options.out ?? process.stdout;
    this.status = options.status ?? process.stderr;
    this.paint =
      options.color === undefined ? chalk : new Chalk({ level: options.color ? 1 : 0 });
  }

  attach(events: TypedEventEmitter): void {
    events.on('pipeline:started', ({ total }) => {
      this.spinner = total === undefined;
      this.progress = new ProgressDisplay(
        this.status,
        total,
        total === undefined ? SCANNING_MESSAGE : '',
      );
      this.progress.start();
    });

    events.on('candidate:found', ({ candidate }) => {
      this.found++;
      if (this.progress && this.spinner) {
        this.progress.setMessage(`${SCANNING_MESSAGE} ${this.found} found`);
      }
      this.log(
        `[${this.paint.cyan.bold('FOUND')}]   Potential proxy at ${formatEndpoint(candidate)}`,
      );
    });

    events.on('verify:success', ({ result }) => {
      this.progress?.inc();
      this.log(
        `[${this.paint.green.bold('SUCCESS')}] ${result.ip} connected in ${result.responseTimeMs}ms`,
      );
      this.log(`[${this.paint.blue.bold('GEO')}]      ${result.ip} located in ${result.location}`);
    });

    events.on('verify:failure', ({ candidate, reason }) => {
      this.progress?.inc();
      this.log(`[${this.paint.red.bold('FAIL')}]     ${formatEndpoint(candidate)}: ${reason}`);
    });

    events.on('verify:fault', ({ error }) => {
      this.progress?.inc();
      this.log(`[${this.paint.yellow.bold('ERROR')}]   A test task failed: ${errorMessage(error)}`);
    });

    events.on('pipeline:completed', () => {
      this.progress?.finish(FINISHED_MESSAGE);
    });
  }

  /** Prints the ranking, or the no-results line when nothing worked. */
  printResults(results: readonly ProxyResult[]): void {
    if (results.length === 0) {
      this.out.write(`\n${NO_RESULTS_MESSAGE}\n`);
      return;
    }
    this.out.write('\n--- Final Results ---\n');
    this.out.write(`${renderResultsTable(results)}\n`);
  }

  printSaved(path: string): void {
    this.out.write(`\nResults saved to ${path}\n`);
  }

  /** Stops the indicator when a run ends without completing. */
  abort(): void {
    this.progress?.finish('Aborted');
  }

  private log(line: string): void {
    if (!this.verbose) return;
    if (this.progress) {
      this.progress.println(line);
    } else {
      this.status.write(`${line}\n`);
    }
  }
}
