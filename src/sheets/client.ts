/**
 * Sheets API client bound to a single spreadsheet.
 *
 * Wraps the googleapis v4 `spreadsheets` resource behind a narrow port so that
 * requests can be checked without a network.
 */
import { google, type sheets_v4 } from 'googleapis';
import type { OAuth2Client } from 'google-auth-library';
import { authenticate, type AuthenticateOptions } from '../auth/authenticate.js';
import { toSheetsApiError } from '../errors.js';
import { componentLogger } from '../logger.js';
import { buildA1Range, gridRange, qualifyRange } from './notation.js';
import {
  describeUpdate,
  parseAppendValuesResponse,
  parseBatchUpdateValuesResponse,
  parseClearValuesResponse,
  parseSpreadsheetMetadata,
  parseUpdateValuesResponse,
  parseValueRange
} from './parsers.js';
import type {
  BatchUpdateValuesResult,
  CellValue,
  ClearValuesResult,
  GridOrigin,
  SheetsData,
  SheetsMetadata,
  UpdateValuesResult,
  ValueRangeInput
} from './types.js';

const log = componentLogger('Sheets');

interface ApiResponse<T> {
  data: T;
}

/**
 * The part of `sheets_v4.Resource$Spreadsheets` this client calls.
 */
export interface SpreadsheetsApi {
  get(params: sheets_v4.Params$Resource$Spreadsheets$Get): Promise<ApiResponse<sheets_v4.Schema$Spreadsheet>>;
  values: {
    get(params: sheets_v4.Params$Resource$Spreadsheets$Values$Get): Promise<ApiResponse<sheets_v4.Schema$ValueRange>>;
    update(params: sheets_v4.Params$Resource$Spreadsheets$Values$Update): Promise<ApiResponse<sheets_v4.Schema$UpdateValuesResponse>>;
    append(params: sheets_v4.Params$Resource$Spreadsheets$Values$Append): Promise<ApiResponse<sheets_v4.Schema$AppendValuesResponse>>;
    clear(params: sheets_v4.Params$Resource$Spreadsheets$Values$Clear): Promise<ApiResponse<sheets_v4.Schema$ClearValuesResponse>>;
    batchUpdate(params: sheets_v4.Params$Resource$Spreadsheets$Values$Batchupdate): Promise<ApiResponse<sheets_v4.Schema$BatchUpdateValuesResponse>>;
  };
}

export const DEFAULT_SHEET_TITLE = 'Sheet1';

export class SheetsClient {
  constructor(
    private readonly spreadsheets: SpreadsheetsApi,
    readonly spreadsheetId: string
  ) {}

  /**
   * Authenticate (cached token or installed flow) and bind to a spreadsheet.
   */
  static async initialize(spreadsheetId: string, options?: AuthenticateOptions): Promise<SheetsClient> {
    const auth = await authenticate(options);
    return createSheetsClient(auth, spreadsheetId);
  }

  getLinkToSheet(): string {
    return `https://docs.google.com/spreadsheets/d/${this.spreadsheetId}/`;
  }

  /**
   * Append one row under the existing data of the first sheet.
   * The search range spans column A through the row's width.
   */
  async append(row: CellValue[]): Promise<UpdateValuesResult> {
    const range = buildA1Range({ startColumn: 0, endColumn: row.length });

    const response = await this.call('append', () => this.spreadsheets.values.append({
      spreadsheetId: this.spreadsheetId,
      range,
      valueInputOption: 'USER_ENTERED',
      insertDataOption: 'INSERT_ROWS',
      requestBody: {
        values: [row]
      }
    }));

    const result = parseAppendValuesResponse(response.data, { spreadsheetId: this.spreadsheetId, range });
    log.info({ range: result.updatedRange }, describeUpdate(result));
    return result;
  }

  async batchUpdate(data: ValueRangeInput[]): Promise<BatchUpdateValuesResult> {
    const response = await this.call('batchUpdate', () => this.spreadsheets.values.batchUpdate({
      spreadsheetId: this.spreadsheetId,
      requestBody: {
        valueInputOption: 'USER_ENTERED',
        data: data.map(entry => ({
          range: entry.range,
          majorDimension: entry.majorDimension ?? 'ROWS',
          values: entry.values
        }))
      }
    }));

    return parseBatchUpdateValuesResponse(response.data, this.spreadsheetId);
  }

  async clearSheet(sheetTitle: string = DEFAULT_SHEET_TITLE): Promise<ClearValuesResult> {
    const response = await this.call('clear', () => this.spreadsheets.values.clear({
      spreadsheetId: this.spreadsheetId,
      range: sheetTitle,
      requestBody: {}
    }));

    return parseClearValuesResponse(response.data, { spreadsheetId: this.spreadsheetId, range: sheetTitle });
  }

  /**
   * Overwrite `range` with `values`, one inner array per row.
   */
  async updateValues(range: string, values: CellValue[][]): Promise<UpdateValuesResult> {
    const response = await this.call('update', () => this.spreadsheets.values.update({
      spreadsheetId: this.spreadsheetId,
      range,
      valueInputOption: 'USER_ENTERED',
      includeValuesInResponse: true,
      responseValueRenderOption: 'FORMATTED_VALUE',
      responseDateTimeRenderOption: 'FORMATTED_STRING',
      requestBody: {
        range,
        majorDimension: 'ROWS',
        values
      }
    }));

    const result = parseUpdateValuesResponse(response.data, { spreadsheetId: this.spreadsheetId, range });
    log.info({ range: result.updatedRange }, describeUpdate(result));
    return result;
  }

  /**
   * Write a block of values with its top-left corner at `origin`.
   */
  async writeGrid(values: CellValue[][], origin?: GridOrigin, sheetTitle?: string): Promise<UpdateValuesResult> {
    const notation = gridRange(values, origin);
    return this.updateValues(sheetTitle ? qualifyRange(sheetTitle, notation) : notation, values);
  }

  /**
   * Clear the first sheet, then write `values` from A1.
   */
  async refreshEntireSheet(values: CellValue[][]): Promise<UpdateValuesResult> {
    await this.clearSheet();
    return this.updateValues('A1', values);
  }

  async getValues(range: string): Promise<SheetsData> {
    const response = await this.call('get', () => this.spreadsheets.values.get({
      spreadsheetId: this.spreadsheetId,
      range
    }));

    return parseValueRange(response.data);
  }

  async getMetadata(): Promise<SheetsMetadata> {
    const response = await this.call('getMetadata', () => this.spreadsheets.get({
      spreadsheetId: this.spreadsheetId,
      includeGridData: false
    }));

    return parseSpreadsheetMetadata(response.data);
  }

  private async call<T>(operation: string, request: () => Promise<T>): Promise<T> {
    try {
      return await request();
    } catch (error) {
      const apiError = toSheetsApiError(error);
      log.error({ operation, status: apiError.status, spreadsheetId: this.spreadsheetId }, apiError.message);
      throw apiError;
    }
  }
}

/**
 * Create a Sheets client for `spreadsheetId` authorized by `auth`.
 */
export function createSheetsClient(auth: OAuth2Client, spreadsheetId: string): SheetsClient {
  const sheets = google.sheets({ version: 'v4', auth });
  return new SheetsClient(sheets.spreadsheets, spreadsheetId);
}
