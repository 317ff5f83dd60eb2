import type { sheets_v4 } from 'googleapis';
import type { FieldValidation, SheetOffsets, Template } from '../types';
import { a1RangeToGridRange, columnLetter, toA1 } from '../utils';

type Request = sheets_v4.Schema$Request;
type CellFormat = Pick<sheets_v4.Schema$RepeatCellRequest, 'cell' | 'fields'>;
type Borders = Omit<sheets_v4.Schema$UpdateBordersRequest, 'range'>;

export interface FormattingOptions {
  /** Master sheets have a second header row and grouped source columns */
  master?: boolean;
}

/** Rows between dotted bar separators */
const BAR_INTERVAL = 5;

const COLUMN_WIDTHS = {
  first: 200,
  sources: 150,
  notes: 300,
};

/** Hex color code (no pound) to an API color with fractional channels */
export function hexToRgb(hex: string): sheets_v4.Schema$Color {
  return {
    red: parseInt(hex.slice(0, 2), 16) / 255,
    green: parseInt(hex.slice(2, 4), 16) / 255,
    blue: parseInt(hex.slice(4, 6), 16) / 255,
  };
}

const BLACK = hexToRgb('000000');

// ============================================================
// Cell formats
// ============================================================

const BOLD: CellFormat = {
  cell: { userEnteredFormat: { textFormat: { bold: true } } },
  fields: 'userEnteredFormat.textFormat.bold',
};

const CENTERED_BOLD: CellFormat = {
  cell: {
    userEnteredFormat: {
      horizontalAlignment: 'CENTER',
      textFormat: { bold: true },
    },
  },
  fields: 'userEnteredFormat.horizontalAlignment,userEnteredFormat.textFormat.bold',
};

const WRAPPED_TOP: CellFormat = {
  cell: {
    userEnteredFormat: {
      wrapStrategy: 'WRAP',
      verticalAlignment: 'TOP',
    },
  },
  fields: 'userEnteredFormat.wrapStrategy,userEnteredFormat.verticalAlignment',
};

const LEFT_ALIGNED: CellFormat = {
  cell: { userEnteredFormat: { horizontalAlignment: 'LEFT' } },
  fields: 'userEnteredFormat.horizontalAlignment',
};

// ============================================================
// Planner
// ============================================================

/**
 * Build the formatting requests for a laid out sheet.
 * Everything is derived from the offsets; no cell contents are inspected.
 */
export function planSheetFormatting(
  sheetId: number,
  template: Template,
  offsets: SheetOffsets,
  options: FormattingOptions = {}
): Request[] {
  const { notesCol, blankRow1, blankRow2, commentsRow } = offsets;
  const master = options.master ?? false;
  const headerEnd = master ? 2 : 1;
  const sourceCols = offsets.sourceCols ?? [];

  const requests: Request[] = [];

  // everything middle aligned
  requests.push({
    repeatCell: {
      range: { sheetId },
      cell: { userEnteredFormat: { verticalAlignment: 'MIDDLE' } },
      fields: 'userEnteredFormat.verticalAlignment',
    },
  });

  const notesLetter = columnLetter(notesCol);
  const rangeFormats: [string, CellFormat][] = [
    ['A1', BOLD],
    [`A2:A${blankRow1 - 1}`, BOLD],
    [`B1:${toA1(headerEnd, notesCol - 1)}`, CENTERED_BOLD],
    [`${notesLetter}1`, BOLD],
    [`A${commentsRow}`, BOLD],
    [`B${commentsRow}:${commentsRow}`, WRAPPED_TOP],
  ];
  if (master) {
    for (const col of sourceCols) {
      rangeFormats.push([`${columnLetter(col)}2`, LEFT_ALIGNED]);
    }
  }
  for (const [range, format] of rangeFormats) {
    requests.push({
      repeatCell: { range: a1RangeToGridRange(range, sheetId), ...format },
    });
  }

  requests.push(...planBorders(sheetId, offsets, master));
  requests.push(...planColumnWidths(sheetId, notesCol));

  requests.push({
    updateDimensionProperties: {
      properties: { pixelSize: template.values.commentsRowHeight },
      fields: 'pixelSize',
      range: {
        sheetId,
        dimension: 'ROWS',
        startIndex: commentsRow - 1,
        endIndex: commentsRow,
      },
    },
  });

  // freeze header rows and column A
  requests.push({
    updateSheetProperties: {
      properties: {
        sheetId,
        gridProperties: { frozenRowCount: headerEnd, frozenColumnCount: 1 },
      },
      fields: 'gridProperties.frozenRowCount,gridProperties.frozenColumnCount',
    },
  });

  // banding leaves out the notes column and the comments row
  requests.push({
    addBanding: {
      bandedRange: {
        range: {
          sheetId,
          startRowIndex: 0,
          endRowIndex: commentsRow - 1,
          startColumnIndex: 1,
          endColumnIndex: notesCol - 1,
        },
        rowProperties: {
          headerColor: hexToRgb('bdbdbd'),
          firstBandColor: hexToRgb('ffffff'),
          secondBandColor: hexToRgb('f3f3f3'),
        },
      },
    },
  });

  requests.push(...planValidation(sheetId, template, notesCol, headerEnd));

  return requests;
}

function planBorders(sheetId: number, offsets: SheetOffsets, master: boolean): Request[] {
  const { notesCol, blankRow1, blankRow2 } = offsets;
  const requests: Request[] = [];
  const rangeBorders: [string, Borders][] = [];

  if (master) {
    const double = { style: 'DOUBLE', color: BLACK };
    const groupCols = [...(offsets.sourceCols ?? []), notesCol];

    rangeBorders.push(['2:2', { bottom: double }]);
    for (const col of groupCols) {
      const letter = columnLetter(col);
      rangeBorders.push([`${letter}:${letter}`, { left: double }]);
    }

    // merge row 1 across each source group
    for (let i = 0; i < groupCols.length - 1; i++) {
      requests.push({
        mergeCells: {
          range: {
            sheetId,
            startRowIndex: 0,
            endRowIndex: 1,
            startColumnIndex: groupCols[i] - 1,
            endColumnIndex: groupCols[i + 1] - 1,
          },
          mergeType: 'MERGE_ALL',
        },
      });
    }
  }

  const solid = { style: 'SOLID', color: BLACK };
  rangeBorders.push([`A${blankRow1}:${blankRow1}`, { top: solid, bottom: solid }]);
  rangeBorders.push([`A${blankRow2}:${blankRow2}`, { top: solid, bottom: solid }]);

  // dotted line under every fifth bar
  const dotted = { bottom: { style: 'DOTTED', color: BLACK } };
  for (let row = blankRow1 + BAR_INTERVAL; row < blankRow2 - 1; row += BAR_INTERVAL) {
    rangeBorders.push([`A${row}:${row}`, dotted]);
  }

  for (const [range, borders] of rangeBorders) {
    requests.push({
      updateBorders: { range: a1RangeToGridRange(range, sheetId), ...borders },
    });
  }
  return requests;
}

function planColumnWidths(sheetId: number, notesCol: number): Request[] {
  const widths: [number, number, number][] = [
    [0, 1, COLUMN_WIDTHS.first],
    [1, notesCol - 1, COLUMN_WIDTHS.sources],
    [notesCol - 1, notesCol, COLUMN_WIDTHS.notes],
  ];
  return widths.map(([startIndex, endIndex, pixelSize]) => ({
    updateDimensionProperties: {
      properties: { pixelSize },
      fields: 'pixelSize',
      range: { sheetId, dimension: 'COLUMNS', startIndex, endIndex },
    },
  }));
}

function validationCondition(rule: FieldValidation): sheets_v4.Schema$BooleanCondition {
  switch (rule.type) {
    case 'checkbox':
      return { type: 'BOOLEAN' };
    case 'dropdown':
      return {
        type: 'ONE_OF_LIST',
        values: rule.values.map(value => ({ userEnteredValue: value })),
      };
  }
}

function planValidation(
  sheetId: number,
  template: Template,
  notesCol: number,
  headerEnd: number
): Request[] {
  const headerRows = new Map(
    Object.keys(template.metaDataFields).map((key, i) => [key, headerEnd + i])
  );

  const requests: Request[] = [];
  for (const [key, rule] of Object.entries(template.validation)) {
    const row = headerRows.get(key);
    if (row === undefined) {
      continue;
    }
    requests.push({
      setDataValidation: {
        range: {
          sheetId,
          startRowIndex: row,
          endRowIndex: row + 1,
          startColumnIndex: 1,
          endColumnIndex: notesCol - 1,
        },
        rule: {
          condition: validationCondition(rule),
          showCustomUi: true,
        },
      },
    });
  }
  return requests;
}
