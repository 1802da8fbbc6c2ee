/**
 * Sheets type definitions
 * Range coordinates, value payloads and parsed API results
 */

/**
 * Zero-indexed coordinates of a range; any of them may be left open
 */
export interface RangeRequest {
  startColumn?: number;    // First column (0 = "A")
  startRow?: number;       // First row (0 = row 1)
  endColumn?: number;      // Last column, inclusive
  endRow?: number;         // Last row, inclusive
}

/**
 * Top-left corner of a block of values
 */
export interface GridOrigin {
  column?: number;
  row?: number;
}

export type CellValue = string | number | boolean;

export type Dimension = 'ROWS' | 'COLUMNS';

/**
 * One range of values to write
 */
export interface ValueRangeInput {
  range: string;           // A1 notation, optionally sheet-qualified
  values: CellValue[][];
  majorDimension?: Dimension;
}

/**
 * Sheets cell data with normalized rows
 */
export interface SheetsData {
  range: string;                  // Actual range returned (e.g., "Sheet1!A1:D5")
  rows: (CellValue | null)[][];   // Sparse rows padded with null
  rowCount: number;
  columnCount: number;            // Widest row
  isEmpty: boolean;
}

/**
 * Individual sheet information within a spreadsheet
 */
export interface SheetInfo {
  sheetId: number;
  title: string;
  index: number;           // Sheet position (0-based)
  rowCount: number;
  columnCount: number;
}

/**
 * Spreadsheet metadata
 */
export interface SheetsMetadata {
  spreadsheetId: string;
  title: string;
  spreadsheetUrl: string;
  sheets: SheetInfo[];
}

/**
 * Result of a single-range write (update, append)
 */
export interface UpdateValuesResult {
  spreadsheetId: string;
  updatedRange: string;
  updatedRows: number;
  updatedColumns: number;
  updatedCells: number;
  updatedData?: SheetsData;
}

/**
 * Result of a multi-range write
 */
export interface BatchUpdateValuesResult {
  spreadsheetId: string;
  totalUpdatedRows: number;
  totalUpdatedColumns: number;
  totalUpdatedCells: number;
  totalUpdatedSheets: number;
  responses: UpdateValuesResult[];   // Same order as the requested ranges
}

export interface ClearValuesResult {
  spreadsheetId: string;
  clearedRange: string;
}
