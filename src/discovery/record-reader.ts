import { readFile } from 'node:fs/promises';
import { getLogger } from '../shared/logger.js';
import { SourceError, errorMessage } from '../shared/errors.js';
import { parseCsv, type CsvRow } from '../report/csv.js';
import { parseEndpoint } from './endpoint.js';
import type { Candidate, CandidateSource, SendCandidate } from './types.js';

const log = getLogger('discovery', { component: 'record-reader' });

export const ADDRESS_COLUMN = 'IP Address';

/**
 * Reads a candidate list: CSV with a header row holding an
 * "IP Address" column whose values are "IP" or "IP:port".
 *
 * Structural problems (unreadable file, missing column, ragged rows)
 * throw a SourceError. Rows whose address does not parse are skipped
 * without a report. Candidates keep file order; duplicates are kept.
 */
export async function readCandidateFile(
  path: string,
  defaultPort: number,
): Promise<Candidate[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new SourceError(
      `Cannot read input file ${path}: ${errorMessage(error)}`,
      'SOURCE_UNREADABLE',
      path,
      undefined,
      { cause: error },
    );
  }

  let rows: CsvRow[];
  try {
    rows = parseCsv(text.replace(/^\uFEFF/, ''));
  } catch (error) {
    throw new SourceError(
      `Malformed CSV in ${path}: ${errorMessage(error)}`,
      'SOURCE_MALFORMED',
      path,
      undefined,
      { cause: error },
    );
  }

  const [header, ...records] = rows;
  // A file with no rows at all is an empty list, not an error.
  if (!header) return [];

  const column = header.fields.indexOf(ADDRESS_COLUMN);
  if (column === -1) {
    throw new SourceError(
      `Input file ${path} has no "${ADDRESS_COLUMN}" column`,
      'SOURCE_MALFORMED',
      path,
      header.line,
    );
  }

  const candidates: Candidate[] = [];
  let skipped = 0;

  for (const record of records) {
    if (record.fields.length !== header.fields.length) {
      throw new SourceError(
        `Line ${record.line} of ${path} has ${record.fields.length} fields, expected ${header.fields.length}`,
        'SOURCE_MALFORMED',
        path,
        record.line,
      );
    }

    const candidate = parseEndpoint(record.fields[column] ?? '', defaultPort);
    if (candidate) {
      candidates.push(candidate);
    } else {
      skipped++;
    }
  }

  log.info({ path, candidates: candidates.length, skipped }, 'Candidate list loaded');
  return candidates;
}

/**
 * File-mode address source. The list is parsed before the pipeline
 * starts so that a broken file aborts the run with nothing verified;
 * `produce` then replays the candidates in file order.
 */
export class FileSource implements CandidateSource {
  readonly kind = 'file';

  private constructor(
    readonly path: string,
    private readonly candidates: readonly Candidate[],
  ) {}

  static async load(path: string, defaultPort: number): Promise<FileSource> {
    return new FileSource(path, await readCandidateFile(path, defaultPort));
  }

  static fromCandidates(path: string, candidates: readonly Candidate[]): FileSource {
    return new FileSource(path, candidates);
  }

  get total(): number {
    return this.candidates.length;
  }

  async produce(send: SendCandidate): Promise<void> {
    for (const candidate of this.candidates) {
      await send(candidate);
    }
  }
}
