/**
 * Workbook parsing exports
 */

export { parseFirstSheet, columnIndexToLetter, letterToColumnIndex } from './parser';
export type { RawParsedSheet } from './parser';
