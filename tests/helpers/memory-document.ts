import type { sheets_v4 } from 'googleapis';
import type { SheetInfo, SpreadsheetDocument } from '../../src/sheets';
import type { Grid } from '../../src/types';

/**
 * In-process stand-in for a remote spreadsheet
 */
export class MemorySpreadsheet implements SpreadsheetDocument {
  readonly sheets = new Map<string, { sheetId: number; values: Grid }>();
  readonly requests: sheets_v4.Schema$Request[][] = [];
  private nextId = 1;

  async listSheets(): Promise<SheetInfo[]> {
    return [...this.sheets.entries()].map(([title, { sheetId }]) => ({ sheetId, title }));
  }

  async addSheet(title: string): Promise<SheetInfo> {
    if (this.sheets.has(title)) {
      throw new Error(`A sheet with the name "${title}" already exists`);
    }
    const sheetId = this.nextId++;
    this.sheets.set(title, { sheetId, values: [] });
    return { sheetId, title };
  }

  async writeValues(title: string, values: Grid): Promise<void> {
    const sheet = this.sheets.get(title);
    if (!sheet) {
      throw new Error(`Unable to parse range: '${title}'!A1`);
    }
    sheet.values = values.map(row => [...row]);
  }

  async readFormulas(title: string): Promise<Grid> {
    const sheet = this.sheets.get(title);
    if (!sheet) {
      throw new Error(`Unable to parse range: '${title}'`);
    }
    return sheet.values.map(row => [...row]);
  }

  async batchUpdate(requests: sheets_v4.Schema$Request[]): Promise<void> {
    this.requests.push(requests);
  }
}
