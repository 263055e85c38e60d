/**
 * Delimited-text parser using Papa Parse
 */

import Papa from 'papaparse';
import type { CellValue } from '@/lib/types';

/** Plain decimal or scientific literal, as spreadsheet tools infer numbers */
const NUMERIC_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export interface DelimitedOptions {
  /**
   * Keep interior blank lines as empty rows so row numbers stay equal to
   * line numbers. Trailing blank lines are always dropped.
   */
  keepBlankLines?: boolean;
}

/**
 * Decode UTF-8 bytes (dropping a leading byte-order mark) and split them
 * into a grid of typed cells. Blank lines are skipped unless kept.
 */
export function parseDelimitedBuffer(buffer: Uint8Array, options: DelimitedOptions = {}): CellValue[][] {
  const keepBlankLines = options.keepBlankLines ?? false;
  // TextDecoder strips the BOM unless ignoreBOM is set; fatal rejects bad UTF-8
  const text = new TextDecoder('utf-8', { fatal: true }).decode(buffer);

  const { data, errors } = Papa.parse<string[]>(text, {
    delimiter: ',',
    skipEmptyLines: !keepBlankLines,
  });

  if (errors.length > 0) {
    const first = errors[0];
    const where = first.row !== undefined ? ` (row ${first.row + 1})` : '';
    throw new Error(`${first.message}${where}`);
  }

  const rows = [...data];
  while (rows.length > 0 && isBlankLine(rows[rows.length - 1])) {
    rows.pop();
  }
  return rows.map((row) => (isBlankLine(row) ? [] : row.map(coerceCell)));
}

function isBlankLine(row: string[]): boolean {
  return row.length === 1 && row[0] === '';
}

/**
 * Empty fields become null, numeric literals become numbers
 */
export function coerceCell(raw: string): CellValue {
  const trimmed = raw.trim();
  if (trimmed === '') {
    return null;
  }
  if (NUMERIC_PATTERN.test(trimmed)) {
    return Number(trimmed);
  }
  return raw;
}
