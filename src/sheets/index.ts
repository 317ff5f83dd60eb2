import { exportMaster, exportSingle, type ExportOptions } from '../exporters';
import { planSheetFormatting } from '../formatting';
import { buildMasterLayout, buildSheetLayout } from '../layout';
import { logger } from '../logger';
import type { Piece } from '../piece';
import type {
  ContributionData,
  ExportError,
  ExportResult,
  Grid,
  MasterSheetExport,
  SheetExport,
  Template,
} from '../types';
import type { SheetInfo, SpreadsheetDocument } from './document';

export type { SheetInfo, SpreadsheetDocument } from './document';
export { GoogleSpreadsheet, connectSheets, quoteTitle } from './google';
export type { ConnectOptions } from './google';

/**
 * Create and format the sheet for a piece, titled with the piece name
 */
export async function createPieceSheet(doc: SpreadsheetDocument, piece: Piece): Promise<SheetInfo> {
  logger.debug('Creating sheet "%s"', piece.name);
  const sheet = await doc.addSheet(piece.name);
  const layout = buildSheetLayout(piece);
  await doc.writeValues(sheet.title, layout.values);
  await doc.batchUpdate(planSheetFormatting(sheet.sheetId, piece.template, layout.offsets));
  return sheet;
}

/**
 * Create and format the master sheet for a piece
 */
export async function createMasterSheet(
  doc: SpreadsheetDocument,
  piece: Piece,
  contributions: ContributionData
): Promise<SheetInfo> {
  logger.debug('Creating master sheet "%s"', piece.name);
  const layout = buildMasterLayout(piece, contributions);
  const sheet = await doc.addSheet(piece.name);
  await doc.writeValues(sheet.title, layout.values);
  await doc.batchUpdate(
    planSheetFormatting(sheet.sheetId, piece.template, layout.offsets, { master: true })
  );
  return sheet;
}

// ============================================================
// Export
// ============================================================

export interface SpreadsheetExportOptions {
  /** Titles of sheets that are not piece sheets */
  skipSheets?: string[];
}

export interface SpreadsheetExport<T> {
  sheets: { title: string; data: T }[];
  failures: ExportError[];
}

type SheetExporter<T> = (grid: Grid, template: Template, options: ExportOptions) => ExportResult<T>;

async function exportSheets<T>(
  doc: SpreadsheetDocument,
  template: Template,
  exporter: SheetExporter<T>,
  options: SpreadsheetExportOptions
): Promise<SpreadsheetExport<T>> {
  const skip = new Set(options.skipSheets ?? []);
  const result: SpreadsheetExport<T> = { sheets: [], failures: [] };

  for (const { title } of await doc.listSheets()) {
    if (skip.has(title)) {
      continue;
    }
    const grid = await doc.readFormulas(title);
    const exported = exporter(grid, template, { sheetTitle: title });
    if (exported.ok) {
      result.sheets.push({ title, data: exported.data });
    } else {
      logger.warn(exported.error.message);
      result.failures.push(exported.error);
    }
  }

  return result;
}

/**
 * Export every piece sheet of a spreadsheet.
 * A malformed sheet is reported in `failures` and the rest are still exported.
 */
export function exportSpreadsheet(
  doc: SpreadsheetDocument,
  template: Template,
  options: SpreadsheetExportOptions = {}
): Promise<SpreadsheetExport<SheetExport>> {
  return exportSheets(doc, template, exportSingle, options);
}

/** Export every sheet of a master spreadsheet */
export function exportMasterSpreadsheet(
  doc: SpreadsheetDocument,
  template: Template,
  options: SpreadsheetExportOptions = {}
): Promise<SpreadsheetExport<MasterSheetExport>> {
  return exportSheets(doc, template, exportMaster, options);
}
