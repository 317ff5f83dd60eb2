export { exportSingle } from './single';
export { exportMaster, parseNote, stepGroup, finishGroup } from './master';
export type { GroupState, GroupEvent } from './master';
export type { ExportOptions } from './shared';
export { SheetExportSchema, MasterSheetExportSchema } from './schema';
