/**
 * CSV helpers (no external dependency).
 * Reading covers what candidate lists need: a header row, quoted fields,
 * doubled quotes, and LF or CRLF line endings. A quote that does not open
 * a field is kept as a literal character.
 */

/**
 * Escapes a single CSV field value following RFC 4180.
 * - If the value contains commas, double quotes, or newlines, it is quoted.
 * - Double quotes within the value are escaped by doubling them.
 */
export function escapeCsvField(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }

  const str = String(value);

  if (
    str.includes(',') ||
    str.includes('"') ||
    str.includes('\n') ||
    str.includes('\r')
  ) {
    return `"${str.replace(/"/g, '""')}"`;
  }

  return str;
}

/**
 * Converts rows to a CSV document with a header line. An empty row list
 * still produces the header. The document ends with a newline.
 */
export function toCsv(
  rows: ReadonlyArray<Record<string, unknown>>,
  columns: readonly string[],
): string {
  const headerLine = columns.map(escapeCsvField).join(',');
  const dataLines = rows.map((row) =>
    columns.map((column) => escapeCsvField(row[column])).join(','),
  );
  return [headerLine, ...dataLines].join('\n') + '\n';
}

export interface CsvRow {
  /** 1-based line on which the row starts. */
  line: number;
  fields: string[];
}

/**
 * Splits CSV text into rows of raw fields. Blank lines produce no row.
 * Throws when a quoted field is never closed.
 */
export function parseCsv(text: string): CsvRow[] {
  const rows: CsvRow[] = [];
  let fields: string[] = [];
  let field = '';
  let quoted = false;
  let fieldStarted = false;
  let line = 1;
  let rowLine = 1;

  const endRow = (): void => {
    if (fieldStarted || fields.length > 0) {
      fields.push(field);
      rows.push({ line: rowLine, fields });
    }
    fields = [];
    field = '';
    fieldStarted = false;
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);

    if (quoted) {
      if (ch === '"') {
        if (text.charAt(i + 1) === '"') {
          field += '"';
          i++;
        } else {
          quoted = false;
        }
      } else {
        if (ch === '\n') line++;
        field += ch;
      }
      continue;
    }

    switch (ch) {
      case '"':
        // Only an opening quote starts a quoted field; elsewhere it is data.
        if (!fieldStarted) quoted = true;
        else field += ch;
        fieldStarted = true;
        break;
      case ',':
        fields.push(field);
        field = '';
        fieldStarted = false;
        break;
      case '\r':
        break;
      case '\n':
        endRow();
        line++;
        rowLine = line;
        break;
      default:
        field += ch;
        fieldStarted = true;
    }
  }

  if (quoted) {
    throw new Error(`Unterminated quoted field starting on line ${rowLine}`);
  }
  endRow();

  return rows;
}
