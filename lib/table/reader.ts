/**
 * Table reader
 * Turns a named byte source into a Table, choosing the codec by file suffix
 */

import { parseDelimitedBuffer } from '@/lib/csv/parser';
import { columnIndexToLetter, parseFirstSheet } from '@/lib/excel/parser';
import { errorMessage, fail, ok } from '@/lib/errors';
import type { CellValue, FileKind, InputFile, InputSource, ReadResult, Table } from '@/lib/types';

// ============================================================================
// Configuration
// ============================================================================

const SUFFIXES: Record<FileKind, string[]> = {
  delimited: ['.csv', '.txt'],
  workbook: ['.xlsx', '.xlsm', '.xls'],
};

export const SUPPORTED_SUFFIXES = [...SUFFIXES.delimited, ...SUFFIXES.workbook];

export interface ReadOptions {
  /** Treat row 1 as column names (default). Headerless tables are named A, B, ... */
  headerPresent?: boolean;
  /** Delimited text only: keep interior blank lines as empty rows (range mode) */
  keepBlankLines?: boolean;
}

// ============================================================================
// Main Reader
// ============================================================================

/**
 * Detect the file kind from its name; null for unsupported suffixes
 */
export function detectFileKind(fileName: string): FileKind | null {
  const lower = fileName.toLowerCase();
  for (const kind of ['delimited', 'workbook'] as const) {
    if (SUFFIXES[kind].some((suffix) => lower.endsWith(suffix))) {
      return kind;
    }
  }
  return null;
}

/**
 * Read a file into a Table. Codec errors are returned as read_failed.
 */
export function readTable(file: InputFile, options: ReadOptions = {}): ReadResult {
  const kind = detectFileKind(file.name);
  if (!kind) {
    return fail('unsupported_format', `Unsupported format: ${file.name}`);
  }

  let grid: CellValue[][];
  try {
    grid =
      kind === 'delimited'
        ? parseDelimitedBuffer(file.data, { keepBlankLines: options.keepBlankLines })
        : parseFirstSheet(file.data).data;
  } catch (error) {
    return fail('read_failed', `Failed to read ${file.name}: ${errorMessage(error)}`);
  }

  return gridToTable(grid, options.headerPresent ?? true, kind === 'delimited');
}

/**
 * Read a source that may already have failed to load; the load error
 * becomes a read_failed result like any codec error
 */
export function readSource(source: InputSource, options: ReadOptions = {}): ReadResult {
  if ('error' in source) {
    return fail('read_failed', source.error);
  }
  return readTable(source, options);
}

/**
 * Split a raw grid into column names and equal-width rows
 */
export function gridToTable(
  grid: CellValue[][],
  headerPresent: boolean,
  strictWidth = false
): ReadResult {
  if (grid.length === 0) {
    return ok({ columns: [], rows: [] });
  }

  const width = Math.max(...grid.map((row) => row.length));
  const header = headerPresent ? grid[0] : [];
  const body = headerPresent ? grid.slice(1) : grid;

  const columns = headerPresent
    ? Array.from({ length: header.length }, (_, i) => headerName(header[i], i))
    : Array.from({ length: width }, (_, i) => columnIndexToLetter(i));

  if (strictWidth) {
    const offender = body.findIndex((row) => row.length > columns.length);
    if (offender >= 0) {
      const lineNumber = offender + (headerPresent ? 2 : 1);
      return fail(
        'read_failed',
        `Expected ${columns.length} fields in line ${lineNumber}, saw ${body[offender].length}`
      );
    }
  }

  const table: Table = {
    columns: widen(columns, width),
    rows: body.map((row) => pad(row, width)),
  };
  return ok(table);
}

// ============================================================================
// Helper Functions
// ============================================================================

function headerName(cell: CellValue, index: number): string {
  if (cell === null || String(cell).trim() === '') {
    return `Unnamed: ${index}`;
  }
  return String(cell);
}

/** Workbook rows may run past the header; name the extra positions */
function widen(columns: string[], width: number): string[] {
  const out = [...columns];
  for (let i = out.length; i < width; i++) {
    out.push(`Unnamed: ${i}`);
  }
  return out;
}

function pad(row: CellValue[], width: number): CellValue[] {
  if (row.length >= width) {
    return row.slice(0, width);
  }
  return [...row, ...Array<CellValue>(width - row.length).fill(null)];
}
