/**
 * Batch pipelines
 * Read -> extract -> tag -> consolidate, one file at a time in upload order.
 * A failing file is recorded and the batch moves on to the next one.
 */

import { v4 as uuidv4 } from 'uuid';
import type { AppConfig } from '@/lib/config';
import { ConfigError, describeFailure } from '@/lib/errors';
import { extractNamedColumns } from '@/lib/extract/named-columns';
import { extractRange, parseRangeReference } from '@/lib/extract/range';
import type { RangeCoordinates } from '@/lib/extract/range';
import { letterToColumnIndex } from '@/lib/excel/parser';
import { readSource } from '@/lib/table/reader';
import type { ConsolidationOutcome, InputSource, Table } from '@/lib/types';
import { Consolidator } from './consolidator';
import { meltBlocks } from './melt';

// ============================================================================
// Types
// ============================================================================

export interface NamedColumnsBatch {
  mode: 'columns';
  batchId: string;
  outcome: ConsolidationOutcome;
}

export interface RangeBatch {
  mode: 'range';
  batchId: string;
  outcome: ConsolidationOutcome;
  /** Long-format table spanning every block; null when nothing succeeded */
  long: Table | null;
}

export type BatchResult = NamedColumnsBatch | RangeBatch;

interface ResolvedBlock {
  label: string;
  coordinates: RangeCoordinates;
}

// ============================================================================
// Named-column mode
// ============================================================================

/**
 * Extract the configured columns from every file and stack them under a
 * leading file column
 */
export function consolidateNamedColumns(files: InputSource[], config: AppConfig): NamedColumnsBatch {
  const batchId = uuidv4();
  const { requiredColumns } = config.namedColumns;
  const consolidator = new Consolidator({ fileColumn: config.provenance.fileColumn });

  console.log(
    `[Consolidate] Batch ${batchId}: ${files.length} files, ${requiredColumns.length} required columns`
  );

  for (const file of files) {
    const read = readSource(file);
    if (!read.ok) {
      consolidator.add({ fileName: file.name, ...read.failure });
      continue;
    }

    const extracted = extractNamedColumns(read.value, requiredColumns);
    if (!extracted.ok) {
      consolidator.add({ fileName: file.name, ...extracted.failure });
      continue;
    }

    console.log(`[Consolidate] ${file.name}: ${extracted.value.rows.length} rows`);
    consolidator.add({ table: extracted.value, provenance: { fileName: file.name } });
  }

  const outcome = consolidator.finalize();
  logOutcome(batchId, outcome);
  return { mode: 'columns', batchId, outcome };
}

// ============================================================================
// Range mode
// ============================================================================

/**
 * Extract every configured block from every file. Files are paired with
 * condition labels by position; a file without a label is labelled by name.
 * Blank lines in delimited text are kept so row numbers match line numbers.
 */
export function consolidateRanges(files: InputSource[], config: AppConfig): RangeBatch {
  const batchId = uuidv4();
  const { headerPresent, conditions } = config.range;
  const blocks = resolveBlocks(config);
  const { fileColumn, conditionColumn } = config.provenance;
  const consolidator = new Consolidator({ fileColumn, conditionColumn });

  console.log(
    `[Consolidate] Batch ${batchId}: ${files.length} files, ${blocks.length} blocks, header ${headerPresent ? 'present' : 'absent'}`
  );
  if (conditions.length > files.length) {
    console.log(`[Consolidate] Unused condition labels: ${conditions.slice(files.length).join(', ')}`);
  }

  files.forEach((file, index) => {
    const condition = conditions[index] ?? file.name;
    const read = readSource(file, { headerPresent, keepBlankLines: true });
    if (!read.ok) {
      consolidator.add({ fileName: file.name, condition, ...read.failure });
      return;
    }

    for (const block of blocks) {
      const extracted = extractRange(read.value, { ...block.coordinates, headerPresent });
      if (!extracted.ok) {
        consolidator.add({ fileName: file.name, condition, blockLabel: block.label, ...extracted.failure });
        continue;
      }

      consolidator.add({
        table: extracted.value,
        provenance: { fileName: file.name, condition, blockLabel: block.label },
        origin: {
          row: block.coordinates.startRow,
          columnIndex: letterToColumnIndex(block.coordinates.startColumn),
        },
      });
    }
  });

  const outcome = consolidator.finalize();
  logOutcome(batchId, outcome);

  const long =
    outcome.status === 'ok' ? meltBlocks(outcome.blocks, { fileColumn, conditionColumn }) : null;
  return { mode: 'range', batchId, outcome, long };
}

/**
 * Parse every block reference up front; a bad reference is a config problem,
 * not a per-file one
 */
function resolveBlocks(config: AppConfig): ResolvedBlock[] {
  const { blocks } = config.range;
  if (blocks.length === 0) {
    throw new ConfigError('Range mode needs at least one block');
  }

  const issues: string[] = [];
  const resolved: ResolvedBlock[] = [];
  const labels = new Set<string>();

  for (const block of blocks) {
    if (labels.has(block.label)) {
      issues.push(`Duplicate block label "${block.label}"`);
    }
    labels.add(block.label);

    const parsed = parseRangeReference(block.range);
    if (parsed.ok) {
      resolved.push({ label: block.label, coordinates: parsed.value });
    } else {
      issues.push(`${block.label}: ${parsed.failure.reason}`);
    }
  }

  if (issues.length > 0) {
    throw new ConfigError('Invalid range blocks', issues);
  }
  return resolved;
}

// ============================================================================
// Helper Functions
// ============================================================================

function logOutcome(batchId: string, outcome: ConsolidationOutcome): void {
  for (const failure of outcome.failures) {
    console.error(`[Consolidate] Failed ${describeFailure(failure)}`);
  }

  if (outcome.status === 'empty') {
    console.error(`[Consolidate] Batch ${batchId}: nothing to export`);
    return;
  }

  const rows = outcome.groups.reduce((sum, group) => sum + group.table.rows.length, 0);
  console.log(
    `[Consolidate] Batch ${batchId}: ${rows} rows from ${outcome.blocks.length} blocks, ${outcome.failures.length} failures`
  );
}
