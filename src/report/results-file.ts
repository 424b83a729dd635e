import { writeFile } from 'node:fs/promises';
import { getLogger } from '../shared/logger.js';
import { ReportError, errorMessage } from '../shared/errors.js';
import type { ProxyResult } from '../proxy/types.js';
import { toCsv } from './csv.js';

const log = getLogger('report', { component: 'results-file' });

export const RESULT_CSV_COLUMNS = ['IP Address', 'Response Time (ms)', 'Location'] as const;

/**
 * Writes the ranked results as CSV, one row per proxy, in the order given.
 * Any filesystem failure becomes a ReportError.
 */
export async function writeResultsCsv(path: string, results: readonly ProxyResult[]): Promise<void> {
  const rows = results.map((result) => ({
    'IP Address': result.ip,
    'Response Time (ms)': result.responseTimeMs,
    Location: result.location,
  }));

  try {
    await writeFile(path, toCsv(rows, RESULT_CSV_COLUMNS), 'utf-8');
  } catch (error) {
    throw new ReportError(
      `Cannot write results to ${path}: ${errorMessage(error)}`,
      path,
      { cause: error },
    );
  }

  log.info({ path, rows: rows.length }, 'Results file written');
}
