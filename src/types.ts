// ============================================================
// Template (shared sheet configuration)
// ============================================================
export interface Template {
  /** Ordered field key -> header text; one header row per entry */
  metaDataFields: Record<string, string>;
  commentFields: CommentFields;
  values: TemplateValues;
  /** Field key -> validation rule applied to that header row */
  validation: Record<string, FieldValidation>;
}

export interface CommentFields {
  comments: string;
  summary: string;
  notes: string;
}

export interface TemplateValues {
  defaultBarCount: number;
  commentsRowHeight: number;
}

export type FieldValidation =
  | { type: 'checkbox' }
  | { type: 'dropdown'; values: string[] };

// ============================================================
// Input records
// ============================================================
export type SourceRecord = {
  name: string;
  link: string;
  barCount?: number;
};

export type PieceRecord = {
  title: string;
  link?: string;
  barCount?: number;
  sources: SourceRecord[];
};

/** A JSON object whose shape has not been checked yet */
export type RawRecord = Readonly<Record<string, unknown>>;

// ============================================================
// Grid / Layout
// ============================================================

/** Formula-preserved cell contents, row-major and 0-indexed */
export type Grid = string[][];

/** Section offsets of a laid out sheet, all 1-indexed */
export interface SheetOffsets {
  notesCol: number;
  blankRow1: number;
  blankRow2: number;
  commentsRow: number;
  /** Starting column of each source group (master sheets only) */
  sourceCols?: number[];
}

export interface SheetLayout {
  values: Grid;
  offsets: SheetOffsets;
}

// ============================================================
// Column data (shared by contributions and exports)
// ============================================================
export interface ColumnData {
  /** Field key -> cell value */
  fields: Record<string, string>;
  /** Bar number ("1", "2", ...) -> cell value */
  bars: Record<string, string>;
  comments: string;
}

/** Email -> note text */
export type NoteEntries = Record<string, string>;

export interface ContributionNotes {
  fields: Record<string, NoteEntries>;
  bars: Record<string, NoteEntries>;
}

export interface SourceContributions {
  /** Email -> column, in column order */
  volunteers: Record<string, ColumnData>;
  summary: ColumnData;
}

export interface ContributionData {
  sources: Record<string, SourceContributions>;
  notes: ContributionNotes;
}

// ============================================================
// Exports
// ============================================================
export interface SourceExport extends ColumnData {
  name: string;
  link: string;
}

export interface NotesExport {
  fields: Record<string, string>;
  bars: Record<string, string>;
}

export interface SheetExport {
  title: string;
  link?: string;
  barCount: number;
  sources: SourceExport[];
  notes: NotesExport;
}

export interface MasterSourceExport extends SourceContributions {
  name: string;
  link: string;
}

export interface MasterSheetExport {
  title: string;
  link?: string;
  barCount: number;
  sources: MasterSourceExport[];
  notes: ContributionNotes;
}

export type ExportErrorCode = 'MALFORMED_HYPERLINK';

export interface ExportError {
  code: ExportErrorCode;
  message: string;
  /** Title of the sheet being exported */
  sheet: string;
  /** Column letter of the offending cell, e.g. "B" */
  column: string;
}

export type ExportResult<T> =
  | { ok: true; data: T }
  | { ok: false; error: ExportError };
