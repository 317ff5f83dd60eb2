import { google, type sheets_v4 } from 'googleapis';
import type { Grid } from '../types';
import type { SheetInfo, SpreadsheetDocument } from './document';

const SCOPES = ['https://www.googleapis.com/auth/spreadsheets'];

export interface ConnectOptions {
  /** Service account key file; application default credentials when unset */
  credentialsPath?: string;
}

/** Create an authenticated Sheets API client */
export function connectSheets(options: ConnectOptions = {}): sheets_v4.Sheets {
  const auth = new google.auth.GoogleAuth({
    keyFile: options.credentialsPath,
    scopes: SCOPES,
  });
  return google.sheets({ version: 'v4', auth });
}

/** Quote a sheet title for use in an A1 range */
export function quoteTitle(title: string): string {
  return `'${title.replace(/'/g, "''")}'`;
}

function toCellString(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  return String(value);
}

function toSheetInfo(properties: sheets_v4.Schema$SheetProperties | undefined): SheetInfo {
  if (typeof properties?.sheetId !== 'number' || typeof properties.title !== 'string') {
    throw new Error('Sheets API returned a sheet without an id or title');
  }
  return { sheetId: properties.sheetId, title: properties.title };
}

/**
 * A Google Sheets spreadsheet
 */
export class GoogleSpreadsheet implements SpreadsheetDocument {
  constructor(
    private readonly api: sheets_v4.Sheets,
    readonly spreadsheetId: string
  ) {}

  /** Create a new spreadsheet and open it */
  static async create(api: sheets_v4.Sheets, title: string): Promise<GoogleSpreadsheet> {
    const res = await api.spreadsheets.create({
      requestBody: { properties: { title } },
      fields: 'spreadsheetId',
    });
    const id = res.data.spreadsheetId;
    if (!id) {
      throw new Error(`Sheets API did not return an id for spreadsheet "${title}"`);
    }
    return new GoogleSpreadsheet(api, id);
  }

  async listSheets(): Promise<SheetInfo[]> {
    const res = await this.api.spreadsheets.get({
      spreadsheetId: this.spreadsheetId,
      fields: 'sheets.properties',
    });
    return (res.data.sheets ?? []).map(sheet => toSheetInfo(sheet.properties));
  }

  async addSheet(title: string): Promise<SheetInfo> {
    const res = await this.api.spreadsheets.batchUpdate({
      spreadsheetId: this.spreadsheetId,
      requestBody: {
        requests: [
          {
            addSheet: {
              properties: { title, gridProperties: { rowCount: 1, columnCount: 1 } },
            },
          },
        ],
      },
    });
    return toSheetInfo(res.data.replies?.[0]?.addSheet?.properties);
  }

  async writeValues(title: string, values: Grid): Promise<void> {
    await this.api.spreadsheets.values.update({
      spreadsheetId: this.spreadsheetId,
      range: `${quoteTitle(title)}!A1`,
      valueInputOption: 'USER_ENTERED',
      requestBody: { values },
    });
  }

  async readFormulas(title: string): Promise<Grid> {
    const res = await this.api.spreadsheets.values.get({
      spreadsheetId: this.spreadsheetId,
      range: quoteTitle(title),
      valueRenderOption: 'FORMULA',
    });
    const rows: unknown[][] = res.data.values ?? [];
    return rows.map(row => row.map(toCellString));
  }

  async batchUpdate(requests: sheets_v4.Schema$Request[]): Promise<void> {
    if (requests.length === 0) {
      return;
    }
    await this.api.spreadsheets.batchUpdate({
      spreadsheetId: this.spreadsheetId,
      requestBody: { requests },
    });
  }
}
