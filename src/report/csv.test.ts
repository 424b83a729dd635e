import { describe, expect, it } from 'vitest';
import { escapeCsvField, parseCsv, toCsv } from './csv.js';

describe('escapeCsvField', () => {
  it('quotes values with separators or quotes', () => {
    expect(escapeCsvField('Paris, France')).toBe('"Paris, France"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField('plain')).toBe('plain');
    expect(escapeCsvField(42)).toBe('42');
    expect(escapeCsvField(undefined)).toBe('');
  });
});

describe('toCsv', () => {
  it('writes a header and one line per row in column order', () => {
    const csv = toCsv(
      [
        { b: 2, a: 'x' },
        { a: 'y, z', b: 3 },
      ],
      ['a', 'b'],
    );
    expect(csv).toBe('a,b\nx,2\n"y, z",3\n');
  });

  it('writes only the header when there are no rows', () => {
    expect(toCsv([], ['IP Address', 'Location'])).toBe('IP Address,Location\n');
  });
});

describe('parseCsv', () => {
  it('splits rows and fields with line numbers', () => {
    expect(parseCsv('a,b\n1,2\n')).toEqual([
      { line: 1, fields: ['a', 'b'] },
      { line: 2, fields: ['1', '2'] },
    ]);
  });

  it('handles quotes, escaped quotes, CRLF and blank lines', () => {
    const text = 'name,note\r\n"Paris, France","say ""hi"""\r\n\r\nlast,\r\n';
    expect(parseCsv(text)).toEqual([
      { line: 1, fields: ['name', 'note'] },
      { line: 2, fields: ['Paris, France', 'say "hi"'] },
      { line: 4, fields: ['last', ''] },
    ]);
  });

  it('keeps newlines inside quoted fields', () => {
    expect(parseCsv('a\n"one\ntwo"\nnext')).toEqual([
      { line: 1, fields: ['a'] },
      { line: 2, fields: ['one\ntwo'] },
      { line: 4, fields: ['next'] },
    ]);
  });

  it('reads a final row without a trailing newline', () => {
    expect(parseCsv('IP Address\n203.0.113.5')).toEqual([
      { line: 1, fields: ['IP Address'] },
      { line: 2, fields: ['203.0.113.5'] },
    ]);
  });

  it('keeps a quote inside an unquoted field as data', () => {
    expect(parseCsv('a,b\n10.0.0.1 "x,y"\n10.0.0.2",z\n')).toEqual([
      { line: 1, fields: ['a', 'b'] },
      { line: 2, fields: ['10.0.0.1 "x', 'y"'] },
      { line: 3, fields: ['10.0.0.2"', 'z'] },
    ]);
  });

  it('opens a quoted field after a separator', () => {
    expect(parseCsv('x,"1,2"\n')).toEqual([{ line: 1, fields: ['x', '1,2'] }]);
  });

  it('returns no rows for empty input', () => {
    expect(parseCsv('')).toEqual([]);
  });

  it('throws on an unterminated quote', () => {
    expect(() => parseCsv('a\n"open')).toThrow('Unterminated quoted field starting on line 2');
  });
});
