import { describe, it, expect, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { sheets_v4 } from 'googleapis';
import { SheetsApiError } from '../errors.js';
import { SheetsClient, type SpreadsheetsApi } from './client.js';

type Params = sheets_v4.Params$Resource$Spreadsheets$Values$Update;

function createFakeApi() {
  const api = {
    get: vi.fn(async (_params: sheets_v4.Params$Resource$Spreadsheets$Get): Promise<{ data: sheets_v4.Schema$Spreadsheet }> => ({
      data: {
        spreadsheetId: 'sheet-123',
        properties: { title: 'Budget' },
        spreadsheetUrl: 'https://docs.google.com/spreadsheets/d/sheet-123/edit',
        sheets: [{ properties: { sheetId: 0, title: 'Sheet1', index: 0, gridProperties: { rowCount: 100, columnCount: 10 } } }]
      }
    })),
    values: {
      get: vi.fn(async (params: sheets_v4.Params$Resource$Spreadsheets$Values$Get): Promise<{ data: sheets_v4.Schema$ValueRange }> => ({
        data: { range: `Sheet1!${params.range}`, values: [['name', 'qty'], ['apples']] }
      })),
      update: vi.fn(async (params: Params): Promise<{ data: sheets_v4.Schema$UpdateValuesResponse }> => ({
        data: {
          spreadsheetId: params.spreadsheetId,
          updatedRange: `Sheet1!${params.range}`,
          updatedRows: 2,
          updatedColumns: 2,
          updatedCells: 4
        }
      })),
      append: vi.fn(async (_params: sheets_v4.Params$Resource$Spreadsheets$Values$Append): Promise<{ data: sheets_v4.Schema$AppendValuesResponse }> => ({
        data: {
          spreadsheetId: 'sheet-123',
          tableRange: 'Sheet1!A1:C4',
          updates: { updatedRange: 'Sheet1!A5:C5', updatedRows: 1, updatedColumns: 3, updatedCells: 3 }
        }
      })),
      clear: vi.fn(async (params: sheets_v4.Params$Resource$Spreadsheets$Values$Clear): Promise<{ data: sheets_v4.Schema$ClearValuesResponse }> => ({
        data: { spreadsheetId: 'sheet-123', clearedRange: `${params.range}!A1:Z1000` }
      })),
      batchUpdate: vi.fn(async (_params: sheets_v4.Params$Resource$Spreadsheets$Values$Batchupdate): Promise<{ data: sheets_v4.Schema$BatchUpdateValuesResponse }> => ({
        data: {
          spreadsheetId: 'sheet-123',
          totalUpdatedRows: 1,
          totalUpdatedColumns: 1,
          totalUpdatedCells: 1,
          totalUpdatedSheets: 1,
          responses: [{ updatedRange: 'Sheet1!A1', updatedRows: 1, updatedColumns: 1, updatedCells: 1 }]
        }
      }))
    }
  } satisfies SpreadsheetsApi;

  return api;
}

describe('SheetsClient', () => {
  it('should authenticate and bind to a spreadsheet on initialize', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'sheets-client-'));
    try {
      const clientSecretPath = join(dir, 'client_secret.json');
      await writeFile(clientSecretPath, JSON.stringify({ installed: { client_id: 'test-client-id', client_secret: 'test-secret' } }), 'utf-8');
      const flow = vi.fn(async () => ({ scopes: ['https://www.googleapis.com/auth/spreadsheets'], accessToken: 'test-access' }));

      const client = await SheetsClient.initialize('sheet-456', {
        clientSecretPath,
        tokenCachePath: join(dir, 'tokencache.json'),
        flow
      });

      expect(flow).toHaveBeenCalledTimes(1);
      expect(client.spreadsheetId).toBe('sheet-456');
      expect(client.getLinkToSheet()).toBe('https://docs.google.com/spreadsheets/d/sheet-456/');
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('should link to the spreadsheet', () => {
    const client = new SheetsClient(createFakeApi(), 'sheet-123');
    expect(client.getLinkToSheet()).toBe('https://docs.google.com/spreadsheets/d/sheet-123/');
  });

  describe('append', () => {
    it('should search from column A through the row width', async () => {
      const api = createFakeApi();
      const client = new SheetsClient(api, 'sheet-123');

      const result = await client.append(['apples', 4, true]);

      expect(api.values.append).toHaveBeenCalledWith({
        spreadsheetId: 'sheet-123',
        range: 'A:D',
        valueInputOption: 'USER_ENTERED',
        insertDataOption: 'INSERT_ROWS',
        requestBody: { values: [['apples', 4, true]] }
      });
      expect(result).toEqual({
        spreadsheetId: 'sheet-123',
        updatedRange: 'Sheet1!A5:C5',
        updatedRows: 1,
        updatedColumns: 3,
        updatedCells: 3
      });
    });

    it('should surface API failures as SheetsApiError', async () => {
      const api = createFakeApi();
      api.values.append.mockRejectedValueOnce(Object.assign(new Error('Requested entity was not found.'), {
        response: { status: 404, data: { error: { code: 404, message: 'Requested entity was not found.' } } }
      }));
      const client = new SheetsClient(api, 'missing-sheet');

      const failure = client.append(['x']);

      await expect(failure).rejects.toBeInstanceOf(SheetsApiError);
      await expect(failure).rejects.toMatchObject({
        status: 404,
        body: '{"error":{"code":404,"message":"Requested entity was not found."}}',
        message: 'Spreadsheet not found or you do not have permission to access it.'
      });
    });
  });

  describe('updateValues', () => {
    it('should write rows and ask for formatted values back', async () => {
      const api = createFakeApi();
      const client = new SheetsClient(api, 'sheet-123');

      const result = await client.updateValues('A1:B2', [['a', 'b'], ['c', 'd']]);

      expect(api.values.update).toHaveBeenCalledWith({
        spreadsheetId: 'sheet-123',
        range: 'A1:B2',
        valueInputOption: 'USER_ENTERED',
        includeValuesInResponse: true,
        responseValueRenderOption: 'FORMATTED_VALUE',
        responseDateTimeRenderOption: 'FORMATTED_STRING',
        requestBody: { range: 'A1:B2', majorDimension: 'ROWS', values: [['a', 'b'], ['c', 'd']] }
      });
      expect(result.updatedRange).toBe('Sheet1!A1:B2');
      expect(result.updatedCells).toBe(4);
    });
  });

  describe('writeGrid', () => {
    it('should derive the range from the block and origin', async () => {
      const api = createFakeApi();
      const client = new SheetsClient(api, 'sheet-123');

      await client.writeGrid([[1, 2], [3, 4]], { column: 1, row: 1 }, 'Q3 Budget');

      expect(api.values.update).toHaveBeenCalledTimes(1);
      expect(api.values.update.mock.calls[0]?.[0].range).toBe("'Q3 Budget'!B2:C3");
    });

    it('should default to the top-left of the first sheet', async () => {
      const api = createFakeApi();
      const client = new SheetsClient(api, 'sheet-123');

      await client.writeGrid([['a', 'b', 'c']]);

      expect(api.values.update.mock.calls[0]?.[0].range).toBe('A1:C1');
    });
  });

  describe('refreshEntireSheet', () => {
    it('should clear Sheet1 before writing from A1', async () => {
      const api = createFakeApi();
      const client = new SheetsClient(api, 'sheet-123');

      await client.refreshEntireSheet([['fresh']]);

      expect(api.values.clear).toHaveBeenCalledWith({ spreadsheetId: 'sheet-123', range: 'Sheet1', requestBody: {} });
      expect(api.values.update.mock.calls[0]?.[0].range).toBe('A1');

      const clearOrder = api.values.clear.mock.invocationCallOrder[0] ?? Infinity;
      const updateOrder = api.values.update.mock.invocationCallOrder[0] ?? -Infinity;
      expect(clearOrder).toBeLessThan(updateOrder);
    });

    it('should not write when clearing fails', async () => {
      const api = createFakeApi();
      api.values.clear.mockRejectedValueOnce(Object.assign(new Error('The caller does not have permission'), {
        response: { status: 403, data: 'forbidden' }
      }));
      const client = new SheetsClient(api, 'sheet-123');

      await expect(client.refreshEntireSheet([['fresh']])).rejects.toMatchObject({ status: 403, body: 'forbidden' });
      expect(api.values.update).not.toHaveBeenCalled();
    });
  });

  describe('clearSheet', () => {
    it('should clear a named sheet', async () => {
      const api = createFakeApi();
      const client = new SheetsClient(api, 'sheet-123');

      const result = await client.clearSheet('Archive');

      expect(result).toEqual({ spreadsheetId: 'sheet-123', clearedRange: 'Archive!A1:Z1000' });
    });
  });

  describe('batchUpdate', () => {
    it('should send every range with ROWS as the default dimension', async () => {
      const api = createFakeApi();
      const client = new SheetsClient(api, 'sheet-123');

      const result = await client.batchUpdate([
        { range: 'A1', values: [['x']] },
        { range: 'C1:C2', values: [['y', 'z']], majorDimension: 'COLUMNS' }
      ]);

      expect(api.values.batchUpdate).toHaveBeenCalledWith({
        spreadsheetId: 'sheet-123',
        requestBody: {
          valueInputOption: 'USER_ENTERED',
          data: [
            { range: 'A1', majorDimension: 'ROWS', values: [['x']] },
            { range: 'C1:C2', majorDimension: 'COLUMNS', values: [['y', 'z']] }
          ]
        }
      });
      expect(result.totalUpdatedCells).toBe(1);
      expect(result.responses).toHaveLength(1);
    });
  });

  describe('getValues', () => {
    it('should return normalized rows', async () => {
      const client = new SheetsClient(createFakeApi(), 'sheet-123');

      const data = await client.getValues('A1:B2');

      expect(data).toEqual({
        range: 'Sheet1!A1:B2',
        rows: [['name', 'qty'], ['apples', null]],
        rowCount: 2,
        columnCount: 2,
        isEmpty: false
      });
    });
  });

  describe('getMetadata', () => {
    it('should request metadata without grid data', async () => {
      const api = createFakeApi();
      const client = new SheetsClient(api, 'sheet-123');

      const metadata = await client.getMetadata();

      expect(api.get).toHaveBeenCalledWith({ spreadsheetId: 'sheet-123', includeGridData: false });
      expect(metadata.title).toBe('Budget');
      expect(metadata.sheets).toEqual([{ sheetId: 0, title: 'Sheet1', index: 0, rowCount: 100, columnCount: 10 }]);
    });
  });
});
