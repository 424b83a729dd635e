import { FileSource } from './record-reader.js';
import { SubnetScanner } from './subnet-scanner.js';
import type { CandidateSource, ProbeFn } from './types.js';

/** Exactly one of `subnet` or `input` is set; the CLI guarantees it. */
export type SourceConfig =
  | {
      mode: 'range';
      subnet: string;
      port: number;
      scanTimeoutMs: number;
      scanConcurrency?: number;
      probe?: ProbeFn;
    }
  | {
      mode: 'file';
      input: string;
      port: number;
    };

/**
 * Builds the address source for a run. File mode reads and validates
 * the whole list here, so its errors surface before verification starts.
 */
export async function createSource(config: SourceConfig): Promise<CandidateSource> {
  switch (config.mode) {
    case 'range':
      return new SubnetScanner(config.subnet, {
        port: config.port,
        timeoutMs: config.scanTimeoutMs,
        concurrency: config.scanConcurrency,
        probe: config.probe,
      });
    case 'file':
      return FileSource.load(config.input, config.port);
  }
}
