/**
 * Long-format conversion for range blocks
 *
 * INPUT (block "B1" of file a.xlsx, condition "ctrl", range F2:G3):
 * | speed | load |
 * | 10    | 0.5  |
 * | 12    | 0.7  |
 *
 * OUTPUT:
 * | Condition | File   | Block | Row | Column | Field | Value |
 * | ctrl      | a.xlsx | B1    | 2   | F      | speed | 10    |
 * | ctrl      | a.xlsx | B1    | 2   | G      | load  | 0.5   |
 * | ctrl      | a.xlsx | B1    | 3   | F      | speed | 12    |
 * | ctrl      | a.xlsx | B1    | 3   | G      | load  | 0.7   |
 */

import { columnIndexToLetter } from '@/lib/excel/parser';
import type { CellValue, ExtractedBlock, Table } from '@/lib/types';

export interface MeltOptions {
  conditionColumn: string;
  fileColumn: string;
}

/**
 * One row per (row, column, value) triple across every block, empty cells included
 */
export function meltBlocks(blocks: ExtractedBlock[], options: MeltOptions): Table {
  const rows: CellValue[][] = [];

  for (const block of blocks) {
    const { condition, fileName, blockLabel } = block.provenance;
    const firstRow = block.origin?.row ?? 1;
    const firstColumn = block.origin?.columnIndex ?? 0;

    block.table.rows.forEach((row, r) => {
      row.forEach((value, c) => {
        rows.push([
          condition ?? null,
          fileName,
          blockLabel ?? null,
          firstRow + r,
          columnIndexToLetter(firstColumn + c),
          block.table.columns[c],
          value,
        ]);
      });
    });
  }

  return {
    columns: [options.conditionColumn, options.fileColumn, 'Block', 'Row', 'Column', 'Field', 'Value'],
    rows,
  };
}
