/**
 * Consolidator
 * Accumulates tagged blocks and per-file failures, then concatenates the
 * blocks of each label into one table with leading provenance columns.
 */

import type {
  CellValue,
  ConsolidatedGroup,
  ConsolidationOutcome,
  ExtractedBlock,
  FileFailure,
} from '@/lib/types';

// ============================================================================
// Types
// ============================================================================

export interface ConsolidatorOptions {
  /** Header of the provenance column naming the source file */
  fileColumn: string;
  /** Header of the condition column; omitted in named-column mode */
  conditionColumn?: string;
}

export type ConsolidatorEntry = ExtractedBlock | FileFailure;

interface GroupState {
  columns: string[];
  blocks: ExtractedBlock[];
}

export function isFailure(entry: ConsolidatorEntry): entry is FileFailure {
  return 'kind' in entry;
}

// ============================================================================
// Consolidator
// ============================================================================

export class Consolidator {
  private readonly options: ConsolidatorOptions;
  private readonly groups = new Map<string, GroupState>();
  private readonly blocks: ExtractedBlock[] = [];
  private readonly failures: FileFailure[] = [];

  constructor(options: ConsolidatorOptions) {
    this.options = options;
  }

  get blockCount(): number {
    return this.blocks.length;
  }

  get failureCount(): number {
    return this.failures.length;
  }

  /**
   * Record a block or a failure. A block whose columns differ from the first
   * block of its label is turned into a schema_mismatch failure.
   */
  add(entry: ConsolidatorEntry): void {
    if (isFailure(entry)) {
      this.failures.push(entry);
      return;
    }

    const { provenance, table } = entry;
    const label = provenance.blockLabel ?? '';
    const group = this.groups.get(label);

    if (group && !sameColumns(group.columns, table.columns)) {
      this.failures.push({
        ...provenance,
        kind: 'schema_mismatch',
        reason: `Columns [${table.columns.join(', ')}] do not match [${group.columns.join(', ')}]`,
      });
      return;
    }

    if (group) {
      group.blocks.push(entry);
    } else {
      this.groups.set(label, { columns: [...table.columns], blocks: [entry] });
    }
    this.blocks.push(entry);
  }

  /**
   * Concatenate every group in insertion order
   */
  finalize(): ConsolidationOutcome {
    const failures = [...this.failures];
    if (this.blocks.length === 0) {
      return { status: 'empty', failures };
    }

    const groups: ConsolidatedGroup[] = [];
    for (const [label, group] of this.groups) {
      groups.push({
        label,
        blockCount: group.blocks.length,
        table: {
          columns: [...this.provenanceHeaders(), ...group.columns],
          rows: group.blocks.flatMap((block) => {
            const tag = this.provenanceValues(block);
            return block.table.rows.map((row) => [...tag, ...row]);
          }),
        },
      });
    }

    return { status: 'ok', groups, blocks: [...this.blocks], failures };
  }

  private provenanceHeaders(): string[] {
    const { conditionColumn, fileColumn } = this.options;
    return conditionColumn !== undefined ? [conditionColumn, fileColumn] : [fileColumn];
  }

  private provenanceValues(block: ExtractedBlock): CellValue[] {
    const { fileName, condition } = block.provenance;
    return this.options.conditionColumn !== undefined
      ? [condition ?? null, fileName]
      : [fileName];
  }
}

function sameColumns(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((column, i) => column === b[i]);
}
