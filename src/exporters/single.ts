import { decodeHyperlink } from '../hyperlink';
import type { ExportResult, Grid, SheetExport, SourceExport, Template } from '../types';
import { cellAt } from '../utils';
import {
  columnCount,
  type ExportOptions,
  malformedHyperlink,
  mapRows,
  readColumn,
  readTitle,
} from './shared';

/**
 * Read a sheet laid out by `buildSheetLayout` back into piece data
 * @param grid - Formula-preserved cell values
 * @param template - The template the sheet was built with
 * @returns The exported data, or an error naming the first source column
 *   whose header is not a hyperlink
 */
export function exportSingle(
  grid: Grid,
  template: Template,
  options: ExportOptions = {}
): ExportResult<SheetExport> {
  const { title, link } = readTitle(grid);
  const sheet = options.sheetTitle ?? title;
  const rows = mapRows(grid, template, 1);
  const lastCol = columnCount(grid) - 1;

  const sources: SourceExport[] = [];
  for (let col = 1; col < lastCol; col++) {
    const parts = decodeHyperlink(cellAt(grid, 0, col));
    if (!parts) {
      return malformedHyperlink(sheet, col);
    }
    sources.push({
      name: parts.text,
      link: parts.link,
      ...readColumn(grid, rows, col),
    });
  }

  const { fields, bars } = readColumn(grid, rows, lastCol);

  return {
    ok: true,
    data: {
      title,
      link,
      barCount: rows.bars.length,
      sources,
      notes: { fields, bars },
    },
  };
}
