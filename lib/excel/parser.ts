/**
 * Workbook parser using SheetJS
 * Reads the first sheet of a workbook into a positional grid of cell values
 */

import * as XLSX from 'xlsx';
import type { CellValue } from '@/lib/types';

// ============================================================================
// Types
// ============================================================================

/** Raw parsed sheet from SheetJS */
export interface RawParsedSheet {
  name: string;
  /** Grid anchored at A1: data[r][c] is the cell at row r + 1, column c */
  data: CellValue[][];
}

// ============================================================================
// Main Parser
// ============================================================================

/**
 * Parse the first sheet of a workbook buffer, whatever the sheet count
 */
export function parseFirstSheet(buffer: Uint8Array): RawParsedSheet {
  const workbook = XLSX.read(buffer, {
    type: 'array',
    sheets: 0,
    cellDates: true,
    cellNF: false,
    cellStyles: false,
  });

  const name = workbook.SheetNames[0];
  if (name === undefined) {
    throw new Error('Workbook contains no sheets');
  }

  const worksheet = workbook.Sheets[name];
  if (!worksheet) {
    throw new Error(`Sheet "${name}" could not be read`);
  }

  return { name, data: parseWorksheet(worksheet) };
}

/**
 * Parse a single worksheet into a rectangular grid.
 * Starts at A1 even when the used range does not, so grid positions
 * stay equal to spreadsheet coordinates.
 */
function parseWorksheet(worksheet: XLSX.WorkSheet): CellValue[][] {
  const ref = worksheet['!ref'];
  if (!ref) {
    return [];
  }

  const range = XLSX.utils.decode_range(ref);
  const rowCount = range.e.r + 1;
  const colCount = range.e.c + 1;

  const data: CellValue[][] = Array.from({ length: rowCount }, () =>
    Array<CellValue>(colCount).fill(null)
  );

  for (let row = range.s.r; row <= range.e.r; row++) {
    for (let col = range.s.c; col <= range.e.c; col++) {
      const cellAddress = XLSX.utils.encode_cell({ r: row, c: col });
      const cell: XLSX.CellObject | undefined = worksheet[cellAddress];

      if (cell) {
        data[row][col] = getCellValue(cell);
      }
    }
  }

  return data;
}

/**
 * Extract a text/number/empty value from a SheetJS cell
 */
function getCellValue(cell: XLSX.CellObject): CellValue {
  const value = cell.v;

  if (value === undefined || value === null || cell.t === 'e' || cell.t === 'z') {
    return null;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'boolean') {
    return value ? 'TRUE' : 'FALSE';
  }
  if (typeof value === 'string') {
    return value === '' ? null : value;
  }
  return value;
}

// ============================================================================
// Coordinate Helpers
// ============================================================================

/**
 * Convert column index to Excel letter (0 -> A, 25 -> Z, 26 -> AA)
 */
export function columnIndexToLetter(index: number): string {
  let letter = '';
  let temp = index;

  while (temp >= 0) {
    letter = String.fromCharCode((temp % 26) + 65) + letter;
    temp = Math.floor(temp / 26) - 1;
  }

  return letter;
}

/**
 * Convert Excel letter to column index (A -> 0, Z -> 25, AA -> 26)
 */
export function letterToColumnIndex(letter: string): number {
  const upper = letter.toUpperCase();
  let index = 0;
  for (let i = 0; i < upper.length; i++) {
    index = index * 26 + (upper.charCodeAt(i) - 64);
  }
  return index - 1;
}
