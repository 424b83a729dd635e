import { parseArgs } from 'node:util';
import { z } from 'zod';
import { ValidationError, errorMessage } from '../shared/errors.js';
import { APP_NAME, DEFAULT_PORT } from '../shared/constants.js';
import { DEFAULT_SCAN_TIMEOUT_MS } from '../discovery/index.js';
import { DEFAULT_TEST_TIMEOUT_SEC } from '../proxy/index.js';

export const USAGE = `Usage: ${APP_NAME} (--subnet <CIDR> | --input <FILE>) [options]

Find working HTTP proxies on a subnet or in a CSV list and rank them by latency.

Source (exactly one):
      --subnet <CIDR>         Subnet to scan, e.g. 192.168.1.0/24
  -i, --input <FILE>          CSV file with an "IP Address" column to test (skips scanning)

Options:
  -p, --port <PORT>           Port to scan, and default port for bare addresses [default: ${DEFAULT_PORT}]
      --scan-timeout <MS>     Connect timeout per scanned host in milliseconds [default: ${DEFAULT_SCAN_TIMEOUT_MS}]
      --test-timeout <SEC>    Timeout for each proxy test in seconds [default: ${DEFAULT_TEST_TIMEOUT_SEC}]
  -v, --verbose               Print detailed real-time logs
  -o, --output <FILE>         Save the final results to a CSV file
  -h, --help                  Print help
  -V, --version               Print version
`;

const optionsSchema = z
  .object({
    subnet: z.string().trim().min(1, 'must not be empty').optional(),
    input: z.string().min(1, 'must not be empty').optional(),
    port: z.coerce
      .number({ invalid_type_error: 'must be a number' })
      .int('must be an integer')
      .min(1)
      .max(65535)
      .default(DEFAULT_PORT),
    scanTimeout: z.coerce
      .number({ invalid_type_error: 'must be a number' })
      .int('must be an integer')
      .positive()
      .default(DEFAULT_SCAN_TIMEOUT_MS),
    testTimeout: z.coerce
      .number({ invalid_type_error: 'must be a number' })
      .int('must be an integer')
      .positive()
      .default(DEFAULT_TEST_TIMEOUT_SEC),
    verbose: z.boolean().default(false),
    output: z.string().min(1, 'must not be empty').optional(),
  })
  .transform((value, ctx): RunOptions => {
    let source: RunSource;
    if (value.subnet !== undefined && value.input === undefined) {
      source = { mode: 'range', subnet: value.subnet };
    } else if (value.input !== undefined && value.subnet === undefined) {
      source = { mode: 'file', input: value.input };
    } else {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'exactly one of --subnet or --input is required',
        path: ['source'],
      });
      return z.NEVER;
    }

    return {
      source,
      port: value.port,
      scanTimeoutMs: value.scanTimeout,
      testTimeoutSec: value.testTimeout,
      verbose: value.verbose,
      output: value.output,
    };
  });

export type RunSource =
  | { mode: 'range'; subnet: string }
  | { mode: 'file'; input: string };

export interface RunOptions {
  source: RunSource;
  port: number;
  scanTimeoutMs: number;
  testTimeoutSec: number;
  verbose: boolean;
  output?: string;
}

export type Command =
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'run'; options: RunOptions };

const FLAG_NAMES: Record<string, string> = {
  scanTimeout: '--scan-timeout',
  testTimeout: '--test-timeout',
  source: '--subnet/--input',
};

function flagName(field: string): string {
  return FLAG_NAMES[field] ?? `--${field}`;
}

function readFlags(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      strict: true,
      allowPositionals: false,
      options: {
        subnet: { type: 'string' },
        input: { type: 'string', short: 'i' },
        port: { type: 'string', short: 'p' },
        'scan-timeout': { type: 'string' },
        'test-timeout': { type: 'string' },
        verbose: { type: 'boolean', short: 'v' },
        output: { type: 'string', short: 'o' },
        help: { type: 'boolean', short: 'h' },
        version: { type: 'boolean', short: 'V' },
      },
    });
  } catch (error) {
    throw new ValidationError(errorMessage(error), 'argv', argv.join(' '));
  }
}

/**
 * Parses command-line arguments (without the node and script entries).
 * Unknown flags, missing values and out-of-range numbers raise a
 * ValidationError naming the offending flag.
 */
export function parseCommandLine(argv: readonly string[]): Command {
  const { values } = readFlags(argv);
  if (values.help) return { kind: 'help' };
  if (values.version) return { kind: 'version' };

  const result = optionsSchema.safeParse({
    subnet: values.subnet,
    input: values.input,
    port: values.port,
    scanTimeout: values['scan-timeout'],
    testTimeout: values['test-timeout'],
    verbose: values.verbose,
    output: values.output,
  });

  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue ? String(issue.path[0] ?? 'argv') : 'argv';
    const message = issue ? `${flagName(field)}: ${issue.message}` : 'invalid arguments';
    throw new ValidationError(message, field);
  }

  return { kind: 'run', options: result.data };
}
