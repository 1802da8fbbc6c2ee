/**
 * Sheets API parsers
 * Parse Google Sheets API responses into normalized structures
 */
import type { sheets_v4 } from 'googleapis';
import type {
  BatchUpdateValuesResult,
  CellValue,
  ClearValuesResult,
  SheetInfo,
  SheetsData,
  SheetsMetadata,
  UpdateValuesResult
} from './types.js';

function toCellValue(value: unknown): CellValue | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return String(value);
}

/**
 * Parse value range from Sheets API and normalize sparse data.
 * The API drops trailing empty cells, so rows are padded to the widest row.
 */
export function parseValueRange(result: sheets_v4.Schema$ValueRange): SheetsData {
  const range = result.range || 'Unknown';
  const values: unknown[][] = result.values || [];

  if (values.length === 0) {
    return {
      range,
      rows: [],
      rowCount: 0,
      columnCount: 0,
      isEmpty: true
    };
  }

  const maxCols = values.reduce((widest, row) => Math.max(widest, row.length), 0);

  const normalizedRows = values.map(row => {
    const normalized = row.map(toCellValue);
    while (normalized.length < maxCols) {
      normalized.push(null);
    }
    return normalized;
  });

  return {
    range,
    rows: normalizedRows,
    rowCount: normalizedRows.length,
    columnCount: maxCols,
    isEmpty: false
  };
}

/**
 * Parse sheet properties into SheetInfo
 */
export function parseSheetProperties(sheet: sheets_v4.Schema$Sheet): SheetInfo {
  const properties = sheet.properties || {};
  const gridProperties = properties.gridProperties || {};

  return {
    sheetId: properties.sheetId ?? 0,
    title: properties.title || 'Untitled Sheet',
    index: properties.index ?? 0,
    rowCount: gridProperties.rowCount ?? 0,
    columnCount: gridProperties.columnCount ?? 0
  };
}

export function parseSpreadsheetMetadata(spreadsheet: sheets_v4.Schema$Spreadsheet): SheetsMetadata {
  const properties = spreadsheet.properties || {};
  const sheets = spreadsheet.sheets || [];

  return {
    spreadsheetId: spreadsheet.spreadsheetId || '',
    title: properties.title || 'Untitled Spreadsheet',
    spreadsheetUrl: spreadsheet.spreadsheetUrl || '',
    sheets: sheets.map(parseSheetProperties)
  };
}

export function parseUpdateValuesResponse(
  response: sheets_v4.Schema$UpdateValuesResponse,
  fallback: { spreadsheetId: string; range: string }
): UpdateValuesResult {
  const result: UpdateValuesResult = {
    spreadsheetId: response.spreadsheetId || fallback.spreadsheetId,
    updatedRange: response.updatedRange || fallback.range,
    updatedRows: response.updatedRows ?? 0,
    updatedColumns: response.updatedColumns ?? 0,
    updatedCells: response.updatedCells ?? 0
  };

  if (response.updatedData) {
    result.updatedData = parseValueRange(response.updatedData);
  }

  return result;
}

/**
 * Append answers with an `updates` envelope around the usual update response
 */
export function parseAppendValuesResponse(
  response: sheets_v4.Schema$AppendValuesResponse,
  fallback: { spreadsheetId: string; range: string }
): UpdateValuesResult {
  return parseUpdateValuesResponse(response.updates || {}, {
    spreadsheetId: response.spreadsheetId || fallback.spreadsheetId,
    range: response.tableRange || fallback.range
  });
}

export function parseBatchUpdateValuesResponse(
  response: sheets_v4.Schema$BatchUpdateValuesResponse,
  spreadsheetId: string
): BatchUpdateValuesResult {
  const id = response.spreadsheetId || spreadsheetId;

  return {
    spreadsheetId: id,
    totalUpdatedRows: response.totalUpdatedRows ?? 0,
    totalUpdatedColumns: response.totalUpdatedColumns ?? 0,
    totalUpdatedCells: response.totalUpdatedCells ?? 0,
    totalUpdatedSheets: response.totalUpdatedSheets ?? 0,
    responses: (response.responses || []).map(entry =>
      parseUpdateValuesResponse(entry, { spreadsheetId: id, range: '' })
    )
  };
}

export function parseClearValuesResponse(
  response: sheets_v4.Schema$ClearValuesResponse,
  fallback: { spreadsheetId: string; range: string }
): ClearValuesResult {
  return {
    spreadsheetId: response.spreadsheetId || fallback.spreadsheetId,
    clearedRange: response.clearedRange || fallback.range
  };
}

/**
 * One-line summary of a write, e.g. "3 columns; 2 rows; and 6 total cells updated"
 */
export function describeUpdate(result: Pick<UpdateValuesResult, 'updatedColumns' | 'updatedRows' | 'updatedCells'>): string {
  return `${result.updatedColumns} columns; ${result.updatedRows} rows; and ${result.updatedCells} total cells updated`;
}
