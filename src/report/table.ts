import type { ProxyResult } from '../proxy/types.js';

export const RESULT_TABLE_HEADERS = ['Rank', 'IP Address', 'Response Time', 'Location'] as const;

// East Asian Wide and Fullwidth blocks that terminals draw two columns wide.
const WIDE_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x1100, 0x115f],
  [0x2e80, 0x303e],
  [0x3041, 0x33ff],
  [0x3400, 0x4dbf],
  [0x4e00, 0x9fff],
  [0xa000, 0xa4cf],
  [0xac00, 0xd7a3],
  [0xf900, 0xfaff],
  [0xfe30, 0xfe4f],
  [0xff00, 0xff60],
  [0xffe0, 0xffe6],
  [0x1f300, 0x1f64f],
  [0x1f900, 0x1f9ff],
  [0x20000, 0x3fffd],
];

const graphemes = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

function isWide(codePoint: number): boolean {
  return WIDE_RANGES.some(([from, to]) => codePoint >= from && codePoint <= to);
}

/**
 * Terminal columns taken by `text`. Combining marks join the preceding
 * character; wide characters take two columns.
 */
export function displayWidth(text: string): number {
  let width = 0;
  for (const { segment } of graphemes.segment(text)) {
    const codePoint = segment.codePointAt(0) ?? 0;
    if (codePoint < 0x20 || (codePoint >= 0x7f && codePoint < 0xa0)) continue;
    width += isWide(codePoint) ? 2 : 1;
  }
  return width;
}

function padDisplay(text: string, width: number): string {
  return text + ' '.repeat(Math.max(0, width - displayWidth(text)));
}

/**
 * Draws a box table with one header row:
 *
 *   ┌──────┬─────────┐
 *   │ Rank │ Address │
 *   ╞══════╪═════════╡
 *   │ 1    │ 1.2.3.4 │
 *   └──────┴─────────┘
 *
 * Data rows are separated by thin rules. Cells are left-aligned and
 * padded by display width, not string length.
 */
export function renderTable(headers: readonly string[], rows: readonly (readonly string[])[]): string {
  const widths = headers.map((header, col) =>
    Math.max(displayWidth(header), ...rows.map((row) => displayWidth(row[col] ?? ''))),
  );

  const rule = (left: string, fill: string, join: string, right: string): string =>
    left + widths.map((width) => fill.repeat(width + 2)).join(join) + right;

  const line = (cells: readonly string[]): string =>
    '│' + widths.map((width, col) => ` ${padDisplay(cells[col] ?? '', width)} `).join('│') + '│';

  const out = [rule('┌', '─', '┬', '┐'), line(headers), rule('╞', '═', '╪', '╡')];
  rows.forEach((row, index) => {
    if (index > 0) out.push(rule('├', '─', '┼', '┤'));
    out.push(line(row));
  });
  out.push(rule('└', '─', '┴', '┘'));

  return out.join('\n');
}

export function renderResultsTable(results: readonly ProxyResult[]): string {
  const rows = results.map((result, index) => [
    String(index + 1),
    result.ip,
    `${result.responseTimeMs} ms`,
    result.location,
  ]);
  return renderTable(RESULT_TABLE_HEADERS, rows);
}
