import { decodeHyperlink } from '../hyperlink';
import type { ColumnData, ExportResult, Grid, Template } from '../types';
import { cellAt, columnLetter } from '../utils';

export interface ExportOptions {
  /** Sheet title used in error reports (default: the piece title from A1) */
  sheetTitle?: string;
}

/** 0-indexed row positions of each section, derived from the grid height */
export interface RowMap {
  headers: { row: number; key: string }[];
  bars: number[];
  commentsRow: number;
}

/**
 * Locate the header, bar and comments rows.
 * @param headersStart - 0-indexed row of the first header (1 for single sheets, 2 for master)
 */
export function mapRows(grid: Grid, template: Template, headersStart: number): RowMap {
  const keys = Object.keys(template.metaDataFields);
  const headers = keys.map((key, i) => ({ row: headersStart + i, key }));

  // bars sit between the two blank rows; the comments row is last
  const bars: number[] = [];
  for (let row = headersStart + keys.length + 1; row < grid.length - 2; row++) {
    bars.push(row);
  }

  return { headers, bars, commentsRow: grid.length - 1 };
}

export function readColumn(grid: Grid, rows: RowMap, col: number): ColumnData {
  const fields: Record<string, string> = {};
  for (const { row, key } of rows.headers) {
    fields[key] = cellAt(grid, row, col);
  }
  const bars: Record<string, string> = {};
  for (const row of rows.bars) {
    bars[cellAt(grid, row, 0)] = cellAt(grid, row, col);
  }
  return { fields, bars, comments: cellAt(grid, rows.commentsRow, col) };
}

/** Piece title and link from A1; a plain string is the title with no link */
export function readTitle(grid: Grid): { title: string; link?: string } {
  const a1 = cellAt(grid, 0, 0);
  const parts = decodeHyperlink(a1);
  if (!parts) {
    return { title: a1 };
  }
  return { title: parts.text, link: parts.link };
}

/** Number of columns in row 1, which spans the whole sheet */
export function columnCount(grid: Grid): number {
  return grid[0]?.length ?? 0;
}

export function malformedHyperlink<T>(sheet: string, col: number): ExportResult<T> {
  const column = columnLetter(col + 1);
  return {
    ok: false,
    error: {
      code: 'MALFORMED_HYPERLINK',
      message: `sheet "${sheet}": column ${column} doesn't have a valid hyperlink`,
      sheet,
      column,
    },
  };
}
