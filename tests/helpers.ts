import * as XLSX from 'xlsx';
import type { CellValue, InputFile } from '@/lib/types';

export function csvFile(name: string, lines: string[], bom = false): InputFile {
  return {
    name,
    data: new TextEncoder().encode((bom ? '\uFEFF' : '') + lines.join('\n')),
  };
}

export function workbookFile(name: string, sheets: Record<string, CellValue[][]>): InputFile {
  const workbook = XLSX.utils.book_new();
  for (const [sheetName, rows] of Object.entries(sheets)) {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), sheetName);
  }
  const output: unknown = XLSX.write(workbook, { type: 'array', bookType: 'xlsx' });
  if (!(output instanceof ArrayBuffer)) {
    throw new Error('expected an ArrayBuffer');
  }
  return { name, data: new Uint8Array(output) };
}

/** Columns c0..c{width-1}, cells "r{row}c{col}" */
export function gridRows(width: number, height: number): { columns: string[]; rows: CellValue[][] } {
  const columns = Array.from({ length: width }, (_, c) => `c${c}`);
  const rows = Array.from({ length: height }, (_, r) =>
    Array.from({ length: width }, (_, c): CellValue => `r${r}c${c}`)
  );
  return { columns, rows };
}
