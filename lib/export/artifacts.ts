/**
 * Downloadable artifacts for a finished batch
 */

import type { BatchResult } from '@/lib/consolidate/pipeline';
import type { Table } from '@/lib/types';
import { toDelimitedText, toSpreadsheet } from './exporter';

export interface BatchArtifacts {
  csv: Uint8Array;
  xlsx: Uint8Array;
  /** Sheet names in workbook order, before sanitising */
  sheets: string[];
}

/**
 * Build the CSV and workbook bytes, or null when the batch produced nothing.
 *
 * Named-column mode: one "consolidated" sheet, CSV of the same table.
 * Range mode: a "wide" sheet ("wide_<block>" per block when there are several)
 * plus a "long" sheet. The CSV holds the wide table for a single block and
 * the long table otherwise, since differently shaped blocks cannot share
 * one header.
 */
export function buildArtifacts(batch: BatchResult): BatchArtifacts | null {
  const { outcome } = batch;
  if (outcome.status === 'empty') {
    return null;
  }

  const sheets = new Map<string, Table>();
  let csvTable: Table;

  if (batch.mode === 'columns') {
    // every named-column block shares the unlabelled group
    csvTable = outcome.groups[0].table;
    sheets.set('consolidated', csvTable);
  } else {
    const single = outcome.groups.length === 1;
    for (const group of outcome.groups) {
      sheets.set(single ? 'wide' : `wide_${group.label}`, group.table);
    }
    const long = batch.long ?? { columns: [], rows: [] };
    sheets.set('long', long);
    csvTable = single ? outcome.groups[0].table : long;
  }

  return {
    csv: toDelimitedText(csvTable),
    xlsx: toSpreadsheet(sheets),
    sheets: [...sheets.keys()],
  };
}

