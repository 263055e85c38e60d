/**
 * Table consolidation toolkit exports
 */

export { detectFileKind, readSource, readTable, SUPPORTED_SUFFIXES } from './table/reader';
export type { ReadOptions } from './table/reader';
export { normalizeColumnName, buildColumnMap } from './table/normalize';

export { extractNamedColumns } from './extract/named-columns';
export {
  extractRange,
  formatRange,
  parseRangeReference,
  rowNumberToOffset,
} from './extract/range';
export { columnIndexToLetter, letterToColumnIndex } from './excel';

export { Consolidator } from './consolidate/consolidator';
export type { ConsolidatorEntry, ConsolidatorOptions } from './consolidate/consolidator';
export { meltBlocks } from './consolidate/melt';
export { consolidateNamedColumns, consolidateRanges } from './consolidate/pipeline';
export type { BatchResult, NamedColumnsBatch, RangeBatch } from './consolidate/pipeline';

export { toDelimitedText, toSpreadsheet, sanitizeSheetName } from './export/exporter';
export { buildArtifacts } from './export/artifacts';
export type { BatchArtifacts } from './export/artifacts';

export { loadConfig, parseConfig, DEFAULT_CONFIG, DEFAULT_REQUIRED_COLUMNS } from './config';
export type { AppConfig, ConfigOverrides } from './config';
export { ConfigError, describeFailure, errorMessage } from './errors';

export type {
  BlockSpec,
  CellValue,
  ConsolidatedGroup,
  ConsolidationOutcome,
  ExtractedBlock,
  Failure,
  FailureKind,
  FileFailure,
  FileKind,
  InputFile,
  InputSource,
  Provenance,
  RangeSpec,
  Result,
  Table,
  UnreadableFile,
} from './types';
