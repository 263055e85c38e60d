/**
 * Range extraction
 * Addresses a table with spreadsheet coordinates ("F2:H6") and slices the
 * matching block out of its positional rows and columns.
 *
 * Row numbers are visual spreadsheet rows. When the header occupies row 1,
 * data row offsets start at row 2:
 *
 *   | row | A    | B    |        offset (header) | offset (no header)
 *   |  1  | id   | ms   |        header          | 0
 *   |  2  | a    | 10   |        0               | 1
 *   |  3  | b    | 12   |        1               | 2
 */

import { columnIndexToLetter, letterToColumnIndex } from '@/lib/excel/parser';
import { fail, ok } from '@/lib/errors';
import type { ExtractResult, RangeSpec, Result, Table } from '@/lib/types';

const COLUMN_PATTERN = /^[A-Za-z]+$/;
const REFERENCE_PATTERN = /^\s*([A-Za-z]+)(\d+)\s*:\s*([A-Za-z]+)(\d+)\s*$/;

export type RangeCoordinates = Omit<RangeSpec, 'headerPresent'>;

/**
 * Convert a 1-based spreadsheet row number to a zero-based data row offset
 */
export function rowNumberToOffset(rowNumber: number, headerPresent: boolean): number {
  return headerPresent ? rowNumber - 2 : rowNumber - 1;
}

/**
 * Parse an A1-style reference such as "F2:H6"
 */
export function parseRangeReference(reference: string): Result<RangeCoordinates> {
  const match = REFERENCE_PATTERN.exec(reference);
  if (!match) {
    return fail('invalid_range', `Invalid range reference: "${reference}"`);
  }

  const [, startColumn, startRow, endColumn, endRow] = match;
  return ok({
    startColumn: startColumn.toUpperCase(),
    endColumn: endColumn.toUpperCase(),
    startRow: Number(startRow),
    endRow: Number(endRow),
  });
}

export function formatRange(spec: RangeCoordinates): string {
  return `${spec.startColumn}${spec.startRow}:${spec.endColumn}${spec.endRow}`;
}

/**
 * Slice the rectangular block addressed by `spec`, keeping the original
 * column names found at those positions. Regions reaching past the table
 * fail with range_out_of_bounds rather than coming back short.
 */
export function extractRange(table: Table, spec: RangeSpec): ExtractResult {
  const label = formatRange(spec);

  if (!COLUMN_PATTERN.test(spec.startColumn) || !COLUMN_PATTERN.test(spec.endColumn)) {
    return fail('invalid_range', `Invalid column letters in ${label}`);
  }
  if (!Number.isInteger(spec.startRow) || !Number.isInteger(spec.endRow) || spec.startRow < 1) {
    return fail('invalid_range', `Invalid row numbers in ${label}`);
  }

  const firstColumn = letterToColumnIndex(spec.startColumn);
  const lastColumn = letterToColumnIndex(spec.endColumn);
  if (firstColumn > lastColumn || spec.startRow > spec.endRow) {
    return fail('invalid_range', `Range ${label} ends before it starts`);
  }
  if (spec.headerPresent && spec.startRow < 2) {
    return fail('invalid_range', `Range ${label} includes the header row`);
  }

  const firstRow = rowNumberToOffset(spec.startRow, spec.headerPresent);
  const lastRow = rowNumberToOffset(spec.endRow, spec.headerPresent);

  if (lastRow >= table.rows.length || lastColumn >= table.columns.length) {
    return fail(
      'range_out_of_bounds',
      `Range ${label} exceeds table extent ${describeExtent(table, spec.headerPresent)}`
    );
  }

  return ok({
    columns: table.columns.slice(firstColumn, lastColumn + 1),
    rows: table.rows
      .slice(firstRow, lastRow + 1)
      .map((row) => row.slice(firstColumn, lastColumn + 1)),
  });
}

function describeExtent(table: Table, headerPresent: boolean): string {
  const lastRowNumber = table.rows.length + (headerPresent ? 1 : 0);
  if (table.columns.length === 0 || lastRowNumber === 0) {
    return '(empty)';
  }
  return `A1:${columnIndexToLetter(table.columns.length - 1)}${lastRowNumber}`;
}
