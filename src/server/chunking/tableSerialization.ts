/**
 * Readable row/column text form for table chunks. Cells are joined with " | ",
 * rows with newlines; empty cells are kept so columns stay aligned.
 */

import { collapseWhitespace } from '../utils/textNormalization.js';

export function serializeTableRows(rows: readonly string[][]): string {
  return rows
    .filter((row) => row.some((cell) => cell.trim().length > 0))
    .map((row) => row.map((cell) => collapseWhitespace(cell)).join(' | '))
    .join('\n');
}

/**
 * Recover rows from serialized table text (used when a chunk lost its raw rows)
 */
export function parseSerializedTable(text: string): string[][] {
  return text
    .split('\n')
    .map((line) => (line.includes('|') ? line.split('|').map((cell) => cell.trim()) : [line.trim()]))
    .filter((row) => row.some((cell) => cell.length > 0));
}
