import type { Piece } from '../piece';
import type {
  ColumnData,
  ContributionData,
  ContributionNotes,
  NoteEntries,
  SheetExport,
  SourceContributions,
  Template,
} from '../types';

/** A volunteer's exported single sheet */
export interface Submission {
  email: string;
  sheet: SheetExport;
}

function barKeys(barCount: number): string[] {
  return Array.from({ length: barCount }, (_, i) => String(i + 1));
}

/** A column with every field and bar present and empty */
export function blankColumn(template: Template, barCount: number): ColumnData {
  return {
    fields: Object.fromEntries(Object.keys(template.metaDataFields).map(key => [key, ''])),
    bars: Object.fromEntries(barKeys(barCount).map(bar => [bar, ''])),
    comments: '',
  };
}

/** Copy a submitted column onto the piece's fields and bars; missing cells read as "" */
function fitColumn(column: ColumnData, template: Template, barCount: number): ColumnData {
  const fitted = blankColumn(template, barCount);
  for (const key of Object.keys(fitted.fields)) {
    fitted.fields[key] = column.fields[key] ?? '';
  }
  for (const bar of Object.keys(fitted.bars)) {
    fitted.bars[bar] = column.bars[bar] ?? '';
  }
  fitted.comments = column.comments;
  return fitted;
}

/**
 * Gather volunteers' single-sheet exports of a piece into master sheet data.
 * Volunteers appear in submission order; each source's summary starts blank.
 */
export function collectContributions(piece: Piece, submissions: Submission[]): ContributionData {
  const template = piece.template;
  const barCount = piece.finalBarCount;

  const sources: Record<string, SourceContributions> = {};
  for (const source of piece.sources) {
    const volunteers = new Map<string, ColumnData>();
    for (const { email, sheet } of submissions) {
      const submitted = sheet.sources.find(s => s.name === source.name);
      if (submitted) {
        volunteers.set(email, fitColumn(submitted, template, barCount));
      }
    }
    sources[source.name] = {
      volunteers: Object.fromEntries(volunteers),
      summary: blankColumn(template, barCount),
    };
  }

  const collect = (pick: (sheet: SheetExport) => string | undefined): NoteEntries => {
    const entries = new Map<string, string>();
    for (const { email, sheet } of submissions) {
      const text = pick(sheet);
      if (text) entries.set(email, text);
    }
    return Object.fromEntries(entries);
  };

  const notes: ContributionNotes = {
    fields: Object.fromEntries(
      Object.keys(template.metaDataFields).map(key => [key, collect(sheet => sheet.notes.fields[key])])
    ),
    bars: Object.fromEntries(
      barKeys(barCount).map(bar => [bar, collect(sheet => sheet.notes.bars[bar])])
    ),
  };

  return { sources, notes };
}
