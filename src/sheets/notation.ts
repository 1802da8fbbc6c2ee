/**
 * A1 notation codec
 *
 * Turns zero-indexed coordinates into the range strings the Sheets API takes in
 * paths and `range` fields. Columns use bijective base-26 (no zero letter), rows
 * are printed one-based.
 *
 * @see https://developers.google.com/sheets/api/guides/concepts#cell
 */
import { InvalidRangeShapeError, OutOfRangeError } from '../errors.js';
import type { CellValue, GridOrigin, RangeRequest } from './types.js';

const LETTERS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';

/** Last column addressable with three letters ("ZZZ") */
export const MAX_COLUMN_INDEX = 18277;

// First index of the two- and three-letter blocks
const TWO_LETTER_START = 26;
const THREE_LETTER_START = 702;

function letter(digit: number): string {
  return LETTERS.charAt(digit);
}

function assertColumn(column: number): void {
  if (!Number.isInteger(column) || column < 0 || column > MAX_COLUMN_INDEX) {
    throw new OutOfRangeError(
      'column',
      column,
      `Column ${column} is not supported. Columns run from 0 ("A") to ${MAX_COLUMN_INDEX} ("ZZZ").`
    );
  }
}

function assertRow(row: number): void {
  if (!Number.isSafeInteger(row + 1) || row < 0) {
    throw new OutOfRangeError('row', row, `Row ${row} is not a zero-indexed row number.`);
  }
}

/**
 * Column letters for a zero-indexed column: 0 -> "A", 27 -> "AB", 1567 -> "BHH"
 */
export function columnToLetters(column: number): string {
  assertColumn(column);

  // A - Z
  if (column < TWO_LETTER_START) {
    return letter(column);
  }

  // AA - ZZ
  if (column < THREE_LETTER_START) {
    return letter(Math.floor(column / 26) - 1) + letter(column % 26);
  }

  // AAA - ZZZ; 702 is a multiple of 26 so the last letter needs no offset
  const offset = column - THREE_LETTER_START;
  return letter(Math.floor(offset / 676)) +
    letter(Math.floor(offset / 26) % 26) +
    letter(column % 26);
}

function cell(column: number, row: number): string {
  return `${columnToLetters(column)}${rowNumber(row)}`;
}

function rowNumber(row: number): number {
  assertRow(row);
  return row + 1;
}

/**
 * Build A1 notation from zero-indexed coordinates.
 *
 * Shapes, first match wins:
 *   - start column, one row, end column  -> "A5:A"  (down the column from a row)
 *   - all four                           -> "A1:B2"
 *   - both columns                       -> "A:B"
 *   - both rows and an end column        -> "10:B18"
 *   - both rows                          -> "10:18"
 *
 * "A:A5" is not valid A1 notation, so a row given only as endRow alongside both
 * columns is read as the start row ("A5:A").
 */
export function buildA1Range(request: RangeRequest): string {
  const { startColumn, startRow, endColumn, endRow } = request;

  if (startColumn !== undefined && endColumn !== undefined) {
    // "A5:A" refers to the first column from row 5 onward
    if (startRow !== undefined && endRow === undefined) {
      return `${cell(startColumn, startRow)}:${columnToLetters(endColumn)}`;
    }
    if (startRow === undefined && endRow !== undefined) {
      return `${cell(startColumn, endRow)}:${columnToLetters(endColumn)}`;
    }

    if (startRow !== undefined && endRow !== undefined) {
      return `${cell(startColumn, startRow)}:${cell(endColumn, endRow)}`;
    }

    return `${columnToLetters(startColumn)}:${columnToLetters(endColumn)}`;
  }

  if (startColumn === undefined && startRow !== undefined && endRow !== undefined) {
    if (endColumn !== undefined) {
      return `${rowNumber(startRow)}:${cell(endColumn, endRow)}`;
    }
    return `${rowNumber(startRow)}:${rowNumber(endRow)}`;
  }

  throw new InvalidRangeShapeError(request);
}

/**
 * Bounded range covering a block of values placed at `origin`.
 * Width is taken from the longest row so ragged input is fully covered.
 */
export function gridRange(values: readonly (readonly CellValue[])[], origin: GridOrigin = {}): string {
  const column = origin.column ?? 0;
  const row = origin.row ?? 0;
  const width = values.reduce((max, current) => Math.max(max, current.length), 0);

  if (values.length === 0 || width === 0) {
    throw new InvalidRangeShapeError(
      { startColumn: column, startRow: row },
      'Cannot build a range for an empty block of values'
    );
  }

  return buildA1Range({
    startColumn: column,
    startRow: row,
    endColumn: column + width - 1,
    endRow: row + values.length - 1
  });
}

/**
 * Prefix notation with a sheet title, quoting titles that need it:
 *   ("Sheet1", "A1:B2")      -> "Sheet1!A1:B2"
 *   ("Q3 Budget", "A:G")     -> "'Q3 Budget'!A:G"
 *   ("Bob's", "A1")          -> "'Bob''s'!A1"
 */
export function qualifyRange(sheetTitle: string, notation: string): string {
  const needsQuoting = /[^A-Za-z0-9_]/.test(sheetTitle) || /^\d/.test(sheetTitle);
  if (!needsQuoting) {
    return `${sheetTitle}!${notation}`;
  }
  return `'${sheetTitle.replace(/'/g, "''")}'!${notation}`;
}
