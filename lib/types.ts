/**
 * Core type definitions for the table consolidation toolkit
 */

// ============================================================================
// Cell & Table Types
// ============================================================================

/** Primitive cell value types (null is the empty marker) */
export type CellValue = string | number | null;

/** Rectangular table: every row has exactly `columns.length` values */
export interface Table {
  columns: string[];
  rows: CellValue[][];
}

/** Kinds of input files recognised by suffix */
export type FileKind = 'delimited' | 'workbook';

/** A named byte source */
export interface InputFile {
  name: string;
  data: Uint8Array;
}

/** A source whose bytes could not be loaded; it still takes its place in the batch */
export interface UnreadableFile {
  name: string;
  error: string;
}

export type InputSource = InputFile | UnreadableFile;

// ============================================================================
// Extraction Types
// ============================================================================

/** Rectangular region addressed with spreadsheet coordinates */
export interface RangeSpec {
  startColumn: string;
  endColumn: string;
  /** 1-based visual spreadsheet row */
  startRow: number;
  endRow: number;
  /** Whether spreadsheet row 1 holds the column names */
  headerPresent: boolean;
}

/** A labelled region to pull out of every file in range mode */
export interface BlockSpec {
  label: string;
  /** A1-style reference such as "F2:H6" */
  range: string;
}

export interface Provenance {
  fileName: string;
  condition?: string;
  blockLabel?: string;
}

/** Extracted table tagged with where it came from */
export interface ExtractedBlock {
  table: Table;
  provenance: Provenance;
  /** Spreadsheet position of the block's top-left cell (range mode only) */
  origin?: {
    row: number;
    columnIndex: number;
  };
}

// ============================================================================
// Failure Types
// ============================================================================

export type FailureKind =
  | 'unsupported_format'
  | 'missing_columns'
  | 'ambiguous_column'
  | 'invalid_range'
  | 'range_out_of_bounds'
  | 'schema_mismatch'
  | 'read_failed';

/** A failure local to one operation, before it is tied to a file */
export interface Failure {
  kind: FailureKind;
  reason: string;
  /** Names behind missing_columns / ambiguous_column */
  names?: string[];
}

/** A failure recorded against one input file */
export interface FileFailure extends Failure {
  fileName: string;
  condition?: string;
  blockLabel?: string;
}

export type Result<T> = { ok: true; value: T } | { ok: false; failure: Failure };

export type ReadResult = Result<Table>;
export type ExtractResult = Result<Table>;

// ============================================================================
// Consolidation Types
// ============================================================================

/** Concatenated rows of every block sharing a label */
export interface ConsolidatedGroup {
  /** Empty string for the unlabelled group of named-column mode */
  label: string;
  table: Table;
  blockCount: number;
}

export type ConsolidationOutcome =
  | {
      status: 'ok';
      groups: ConsolidatedGroup[];
      blocks: ExtractedBlock[];
      failures: FileFailure[];
    }
  | {
      status: 'empty';
      failures: FileFailure[];
    };
