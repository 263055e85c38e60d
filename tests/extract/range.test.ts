import { describe, expect, it } from 'vitest';
import { columnIndexToLetter, letterToColumnIndex } from '@/lib/excel/parser';
import { extractRange, parseRangeReference, rowNumberToOffset } from '@/lib/extract/range';
import { gridRows } from '../helpers';

describe('column letters', () => {
  it('follows spreadsheet numbering', () => {
    const cases: Array<[string, number]> = [
      ['A', 0],
      ['B', 1],
      ['Z', 25],
      ['AA', 26],
      ['AB', 27],
      ['AZ', 51],
      ['BA', 52],
      ['ZZ', 701],
      ['AAA', 702],
    ];
    for (const [letter, index] of cases) {
      expect(letterToColumnIndex(letter)).toBe(index);
      expect(columnIndexToLetter(index)).toBe(letter);
    }
  });

  it('accepts lower-case letters', () => {
    expect(letterToColumnIndex('ab')).toBe(27);
  });
});

describe('rowNumberToOffset', () => {
  it('skips the header row when present', () => {
    expect(rowNumberToOffset(2, true)).toBe(0);
    expect(rowNumberToOffset(6, true)).toBe(4);
    expect(rowNumberToOffset(1, false)).toBe(0);
    expect(rowNumberToOffset(6, false)).toBe(5);
  });
});

describe('parseRangeReference', () => {
  it('parses A1-style references', () => {
    expect(parseRangeReference(' f2:h6 ')).toEqual({
      ok: true,
      value: { startColumn: 'F', endColumn: 'H', startRow: 2, endRow: 6 },
    });
  });

  it('rejects anything else', () => {
    expect(parseRangeReference('F2-H6')).toEqual({
      ok: false,
      failure: { kind: 'invalid_range', reason: 'Invalid range reference: "F2-H6"' },
    });
  });
});

describe('extractRange', () => {
  const table = gridRows(10, 8);

  it('slices F2:H6 to five rows and three columns', () => {
    const result = extractRange(table, {
      startColumn: 'F',
      endColumn: 'H',
      startRow: 2,
      endRow: 6,
      headerPresent: true,
    });

    expect(result).toEqual({
      ok: true,
      value: {
        columns: ['c5', 'c6', 'c7'],
        rows: table.rows.slice(0, 5).map((row) => row.slice(5, 8)),
      },
    });
    expect(result.ok && result.value.rows[0]).toEqual(['r0c5', 'r0c6', 'r0c7']);
  });

  it('uses row - 1 without a header', () => {
    const result = extractRange(table, {
      startColumn: 'A',
      endColumn: 'B',
      startRow: 1,
      endRow: 2,
      headerPresent: false,
    });
    expect(result.ok && result.value.rows).toEqual([
      ['r0c0', 'r0c1'],
      ['r1c0', 'r1c1'],
    ]);
  });

  it('fails when rows run past the table', () => {
    const result = extractRange(table, {
      startColumn: 'F',
      endColumn: 'H',
      startRow: 2,
      endRow: 10,
      headerPresent: true,
    });
    expect(result).toEqual({
      ok: false,
      failure: { kind: 'range_out_of_bounds', reason: 'Range F2:H10 exceeds table extent A1:J9' },
    });
  });

  it('fails when columns run past the table', () => {
    const result = extractRange(table, {
      startColumn: 'K',
      endColumn: 'K',
      startRow: 2,
      endRow: 3,
      headerPresent: true,
    });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure.kind).toBe('range_out_of_bounds');
    }
  });

  it('rejects reversed ranges', () => {
    const result = extractRange(table, {
      startColumn: 'H',
      endColumn: 'F',
      startRow: 2,
      endRow: 6,
      headerPresent: true,
    });
    expect(result).toEqual({
      ok: false,
      failure: { kind: 'invalid_range', reason: 'Range H2:F6 ends before it starts' },
    });
  });

  it('rejects a range covering the header row', () => {
    const result = extractRange(table, {
      startColumn: 'F',
      endColumn: 'H',
      startRow: 1,
      endRow: 3,
      headerPresent: true,
    });
    expect(result).toEqual({
      ok: false,
      failure: { kind: 'invalid_range', reason: 'Range F1:H3 includes the header row' },
    });
  });

  it('rejects malformed column letters', () => {
    const result = extractRange(table, {
      startColumn: 'F1',
      endColumn: 'H',
      startRow: 2,
      endRow: 3,
      headerPresent: true,
    });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure.reason).toBe('Invalid column letters in F12:H3');
    }
  });
});
