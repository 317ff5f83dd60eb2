import type { Piece } from '../piece';
import type {
  ColumnData,
  ContributionData,
  Grid,
  NoteEntries,
  SheetLayout,
  Template,
} from '../types';

/** Row 2 label of master sheets */
export const VOLUNTEER_LABEL = 'Volunteer';

// ============================================================
// Shared sections
// ============================================================

/** Header rows, then the first blank row */
function beforeBars(template: Template): Grid {
  return [...Object.values(template.metaDataFields).map(header => [header]), []];
}

/** Second blank row, then the comments row */
function afterBars(template: Template): Grid {
  return [[], [template.commentFields.comments]];
}

function barRows(barCount: number): Grid {
  return Array.from({ length: barCount }, (_, i) => [String(i + 1)]);
}

function lookup<T>(map: Record<string, T>, key: string, what: string): T {
  if (!Object.prototype.hasOwnProperty.call(map, key)) {
    throw new Error(`Missing ${what} "${key}" in contribution data`);
  }
  return map[key];
}

// ============================================================
// Single sheet
// ============================================================

/**
 * Lay out the sheet for one piece.
 * Only the labels, source headers and bar numbers are filled in;
 * every other cell is left for volunteers.
 */
export function buildSheetLayout(piece: Piece): SheetLayout {
  const template = piece.template;
  const barCount = piece.finalBarCount;

  const row1 = [
    piece.hyperlink(),
    ...piece.sources.map(source => source.hyperlink()),
    template.commentFields.notes,
  ];
  const headers = beforeBars(template);

  const values = [row1, ...headers, ...barRows(barCount), ...afterBars(template)];

  const notesCol = row1.length;
  const blankRow1 = 1 + headers.length;
  const blankRow2 = blankRow1 + barCount + 1;
  const commentsRow = blankRow2 + 1;

  return {
    values,
    offsets: { notesCol, blankRow1, blankRow2, commentsRow },
  };
}

// ============================================================
// Master sheet
// ============================================================

function noteText(notes: NoteEntries): string {
  return Object.entries(notes)
    .map(([email, note]) => `${email}: ${note}`)
    .join('\n');
}

/**
 * Lay out the master sheet for one piece: per source, one column per
 * volunteer followed by the summary column, then a notes column that
 * gathers every volunteer's notes.
 * @throws Error if the contribution data lacks a source, field or bar of the piece
 */
export function buildMasterLayout(piece: Piece, contributions: ContributionData): SheetLayout {
  const template = piece.template;
  const barCount = piece.finalBarCount;
  const headerKeys = Object.keys(template.metaDataFields);

  const values: Grid = [
    [piece.hyperlink()],
    [VOLUNTEER_LABEL],
    ...beforeBars(template),
    ...barRows(barCount),
    ...afterBars(template),
  ];

  // 0-indexed rows
  const headersStart = 2;
  const headerRows = headerKeys.map((key, i) => ({ row: headersStart + i, key }));

  const blankRow1 = 2 + headerKeys.length + 1;
  const blankRow2 = blankRow1 + barCount + 1;
  const commentsRow = blankRow2 + 1;

  const barsStart = blankRow1;
  const barRowsIter = Array.from({ length: barCount }, (_, i) => ({
    row: barsStart + i,
    bar: String(i + 1),
  }));

  const addColumn = (label: string, column: ColumnData): void => {
    values[0].push('');
    values[1].push(label);
    for (const { row, key } of headerRows) {
      values[row].push(lookup(column.fields, key, 'field'));
    }
    for (const { row, bar } of barRowsIter) {
      values[row].push(lookup(column.bars, bar, 'bar'));
    }
    values[commentsRow - 1].push(column.comments);
  };

  const sourceCols: number[] = [];
  let col = 2;
  for (const source of piece.sources) {
    const data = lookup(contributions.sources, source.name, 'source');
    sourceCols.push(col);
    const startCol = col - 1;

    for (const [email, column] of Object.entries(data.volunteers)) {
      addColumn(email, column);
      col++;
    }
    addColumn(template.commentFields.summary, data.summary);
    col++;

    values[0][startCol] = source.hyperlink();
  }

  const notesCol = col;
  const notes = contributions.notes;
  values[0].push(template.commentFields.notes);
  for (const { row, key } of headerRows) {
    values[row].push(noteText(lookup(notes.fields, key, 'notes field')));
  }
  for (const { row, bar } of barRowsIter) {
    values[row].push(noteText(lookup(notes.bars, bar, 'notes bar')));
  }

  return {
    values,
    offsets: { notesCol, blankRow1, blankRow2, commentsRow, sourceCols },
  };
}
