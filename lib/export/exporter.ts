/**
 * Exporters for consolidated tables
 * Delimited text through Papa Parse, workbooks through SheetJS
 */

import Papa from 'papaparse';
import * as XLSX from 'xlsx';
import type { CellValue, Table } from '@/lib/types';

// ============================================================================
// Configuration
// ============================================================================

const UTF8_BOM = '\uFEFF';

/** Excel's limit on sheet name length */
const MAX_SHEET_NAME_LENGTH = 31;

// ============================================================================
// Delimited Text
// ============================================================================

/**
 * Comma-separated UTF-8 bytes with a leading byte-order mark, header first
 */
export function toDelimitedText(table: Table): Uint8Array {
  const text = Papa.unparse(
    {
      fields: table.columns,
      data: table.rows.map((row) => row.map(toTextField)),
    },
    { delimiter: ',', newline: '\r\n', header: true }
  );

  return new TextEncoder().encode(UTF8_BOM + text);
}

function toTextField(value: CellValue): string {
  return value === null ? '' : String(value);
}

// ============================================================================
// Workbook
// ============================================================================

/**
 * One sheet per entry, in insertion order, header row then plain values
 */
export function toSpreadsheet(namedTables: Map<string, Table>): Uint8Array {
  const workbook = XLSX.utils.book_new();
  const taken = new Set<string>();

  for (const [name, table] of namedTables) {
    const sheetName = sanitizeSheetName(name, taken);
    taken.add(sheetName.toLowerCase());

    const worksheet = XLSX.utils.aoa_to_sheet([table.columns, ...table.rows]);
    XLSX.utils.book_append_sheet(workbook, worksheet, sheetName);
  }

  const output: unknown = XLSX.write(workbook, { type: 'array', bookType: 'xlsx' });
  if (!(output instanceof ArrayBuffer)) {
    throw new Error('Workbook writer returned an unexpected payload');
  }
  return new Uint8Array(output);
}

/**
 * Make a name Excel accepts: no []:*?/\ characters, at most 31 characters,
 * unique (case-insensitively) among `taken`
 */
export function sanitizeSheetName(name: string, taken: ReadonlySet<string> = new Set()): string {
  const cleaned = name.replace(/[[\]:*?/\\]/g, '_').replace(/^'+|'+$/g, '').trim() || 'Sheet';
  const base = cleaned.substring(0, MAX_SHEET_NAME_LENGTH);

  let candidate = base;
  let counter = 2;
  while (taken.has(candidate.toLowerCase())) {
    const suffix = `_${counter}`;
    candidate = base.substring(0, MAX_SHEET_NAME_LENGTH - suffix.length) + suffix;
    counter++;
  }
  return candidate;
}
