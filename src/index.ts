// Core types
export type {
  Template,
  CommentFields,
  TemplateValues,
  FieldValidation,
  SourceRecord,
  PieceRecord,
  RawRecord,
  Grid,
  SheetOffsets,
  SheetLayout,
  ColumnData,
  NoteEntries,
  ContributionNotes,
  SourceContributions,
  ContributionData,
  SourceExport,
  NotesExport,
  SheetExport,
  MasterSourceExport,
  MasterSheetExport,
  ExportErrorCode,
  ExportError,
  ExportResult,
} from './types';

// Hyperlink cells
export { encodeHyperlink, decodeHyperlink } from './hyperlink';
export type { HyperlinkParts } from './hyperlink';

// Model
export { Piece, Source } from './piece';
export { loadPieces } from './dataset';

// Layout
export { buildSheetLayout, buildMasterLayout, VOLUNTEER_LABEL } from './layout';

// Exporters
export {
  exportSingle,
  exportMaster,
  parseNote,
  stepGroup,
  finishGroup,
  SheetExportSchema,
  MasterSheetExportSchema,
} from './exporters';
export type { ExportOptions, GroupState, GroupEvent } from './exporters';

// Formatting
export { planSheetFormatting, hexToRgb } from './formatting';
export type { FormattingOptions } from './formatting';

// Contributions
export { collectContributions, blankColumn } from './contributions';
export type { Submission } from './contributions';

// Remote spreadsheets
export {
  createPieceSheet,
  createMasterSheet,
  exportSpreadsheet,
  exportMasterSpreadsheet,
  GoogleSpreadsheet,
  connectSheets,
  quoteTitle,
} from './sheets';
export type {
  SheetInfo,
  SpreadsheetDocument,
  ConnectOptions,
  SpreadsheetExport,
  SpreadsheetExportOptions,
} from './sheets';

// Validation
export { ValidationError, formatLocation } from './validator';
export type { ValidationErrorCode, RecordLocation } from './validator';

// Configuration
export { parseTemplate, loadRuntimeConfig, TemplateSchema, TemplateError } from './config';
export type { RuntimeConfig } from './config';

// Files
export {
  readTemplateFile,
  readDataSetFile,
  readBundleFile,
  writeBundleFile,
  packBundle,
  unpackBundle,
  isArchive,
  bundleFileName,
} from './file';
export type { BundleEntry } from './file';

// Logging
export { logger, createLogger } from './logger';

// Utilities
export { maxOrAbsent, columnLetter, columnNumber, toA1, a1RangeToGridRange, cellAt } from './utils';
