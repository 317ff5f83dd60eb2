import { decodeHyperlink } from '../hyperlink';
import type {
  ColumnData,
  ContributionNotes,
  ExportResult,
  Grid,
  MasterSheetExport,
  MasterSourceExport,
  NoteEntries,
  Template,
} from '../types';
import { cellAt } from '../utils';
import {
  columnCount,
  type ExportOptions,
  malformedHyperlink,
  mapRows,
  readColumn,
  readTitle,
  type RowMap,
} from './shared';

// ============================================================
// Column grouping
// ============================================================

/**
 * Master sheets group columns by source: a non-blank row-1 cell opens a
 * group, blank cells continue it. The last column of a group is its summary.
 */
export type GroupState =
  | { kind: 'awaiting-summary' }
  | {
      kind: 'have-summary';
      name: string;
      link: string;
      volunteers: Map<string, ColumnData>;
      /** Tentative summary; demoted to a volunteer when another column follows */
      pending: { email: string; column: ColumnData };
    };

export type GroupEvent =
  | { kind: 'source'; name: string; link: string; email: string; column: ColumnData }
  | { kind: 'continue'; email: string; column: ColumnData };

/**
 * Advance the grouping state by one column.
 * Finished groups are appended to `done`; a `continue` event while
 * awaiting the first group is rejected by returning undefined.
 */
export function stepGroup(
  state: GroupState,
  event: GroupEvent,
  done: MasterSourceExport[]
): GroupState | undefined {
  if (event.kind === 'source') {
    if (state.kind === 'have-summary') {
      done.push(finishGroup(state));
    }
    return {
      kind: 'have-summary',
      name: event.name,
      link: event.link,
      volunteers: new Map(),
      pending: { email: event.email, column: event.column },
    };
  }

  if (state.kind === 'awaiting-summary') {
    return undefined;
  }
  state.volunteers.set(state.pending.email, state.pending.column);
  return { ...state, pending: { email: event.email, column: event.column } };
}

/** Finalise a group: the pending column becomes the summary and its email is dropped */
export function finishGroup(state: Extract<GroupState, { kind: 'have-summary' }>): MasterSourceExport {
  return {
    name: state.name,
    link: state.link,
    volunteers: Object.fromEntries(state.volunteers),
    summary: state.pending.column,
  };
}

// ============================================================
// Notes
// ============================================================

/**
 * Parse "email: text" lines. A line without the separator continues the
 * previous note; before any note it is kept under the empty email.
 */
export function parseNote(text: string): NoteEntries {
  const entries = new Map<string, string>();
  let last: string | undefined;
  for (const line of text.split('\n')) {
    const sep = line.indexOf(': ');
    if (sep !== -1) {
      last = line.slice(0, sep);
      entries.set(last, line.slice(sep + 2));
    } else if (last !== undefined) {
      entries.set(last, `${entries.get(last) ?? ''}\n${line}`);
    } else if (line !== '') {
      last = '';
      entries.set(last, line);
    }
  }
  return Object.fromEntries(entries);
}

function readNotes(grid: Grid, rows: RowMap, col: number): ContributionNotes {
  const fields: Record<string, NoteEntries> = {};
  for (const { row, key } of rows.headers) {
    fields[key] = parseNote(cellAt(grid, row, col));
  }
  const bars: Record<string, NoteEntries> = {};
  for (const row of rows.bars) {
    bars[cellAt(grid, row, 0)] = parseNote(cellAt(grid, row, col));
  }
  return { fields, bars };
}

// ============================================================
// Export
// ============================================================

/**
 * Read a sheet laid out by `buildMasterLayout` back into piece data.
 * The summary contributor's email is not kept.
 * @param grid - Formula-preserved cell values
 * @param template - The template the sheet was built with
 */
export function exportMaster(
  grid: Grid,
  template: Template,
  options: ExportOptions = {}
): ExportResult<MasterSheetExport> {
  const { title, link } = readTitle(grid);
  const sheet = options.sheetTitle ?? title;
  const rows = mapRows(grid, template, 2);
  const lastCol = columnCount(grid) - 1;

  const sources: MasterSourceExport[] = [];
  let state: GroupState = { kind: 'awaiting-summary' };

  for (let col = 1; col < lastCol; col++) {
    const header = cellAt(grid, 0, col);
    const email = cellAt(grid, 1, col);
    const column = readColumn(grid, rows, col);

    let event: GroupEvent;
    if (header !== '') {
      const parts = decodeHyperlink(header);
      if (!parts) {
        return malformedHyperlink(sheet, col);
      }
      event = { kind: 'source', name: parts.text, link: parts.link, email, column };
    } else {
      event = { kind: 'continue', email, column };
    }

    const next = stepGroup(state, event, sources);
    if (!next) {
      return malformedHyperlink(sheet, col);
    }
    state = next;
  }

  if (state.kind === 'have-summary') {
    sources.push(finishGroup(state));
  }

  return {
    ok: true,
    data: {
      title,
      link,
      barCount: rows.bars.length,
      sources,
      notes: readNotes(grid, rows, lastCol),
    },
  };
}
