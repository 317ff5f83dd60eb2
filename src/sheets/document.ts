import type { sheets_v4 } from 'googleapis';
import type { Grid } from '../types';

export interface SheetInfo {
  sheetId: number;
  title: string;
}

/**
 * The remote spreadsheet a sheet is created in or exported from.
 * Calls either resolve or reject; nothing is retried.
 */
export interface SpreadsheetDocument {
  listSheets(): Promise<SheetInfo[]>;
  addSheet(title: string): Promise<SheetInfo>;
  /** Write values starting at A1, interpreting formulas */
  writeValues(title: string, values: Grid): Promise<void>;
  /** Read all values with formulas intact */
  readFormulas(title: string): Promise<Grid>;
  batchUpdate(requests: sheets_v4.Schema$Request[]): Promise<void>;
}
