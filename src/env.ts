import { config } from 'dotenv';
import { z } from 'zod';

// Load .env file before validation
config();

/**
 * Schema for the environment variables the scanner reads.
 * Per-run settings (range, port, timeouts) come from the command line;
 * these cover process-wide knobs that rarely change between runs.
 */
const envSchema = z.object({
  // ---------- General ----------
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('production'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('warn'),

  // ---------- Verification ----------
  /** Geolocation endpoint requested through every candidate proxy. */
  GEO_API_URL: z.string().url().default('http://ip-api.com/json'),

  // ---------- Pipeline ----------
  /** How many discovered candidates may wait ahead of verification. */
  CHANNEL_CAPACITY: z.coerce.number().int().positive().default(200),
  /** Parallel TCP probes during a range scan. Defaults to the CPU count. */
  SCAN_CONCURRENCY: z.coerce.number().int().positive().optional(),
});

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const formatted = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');

    // eslint-disable-next-line no-console
    console.error(
      `\n[env] Invalid environment variables:\n${formatted}\n`,
    );
    throw new Error('Environment validation failed. See above for details.');
  }

  return result.data;
}

/**
 * Typed, validated environment variables.
 * Importing this module will eagerly parse process.env and throw
 * at startup if any variable is malformed.
 */
export const env: Env = validateEnv();
