import { z } from 'zod';
import type { MasterSheetExport, SheetExport } from '../types';

const cells = z.record(z.string());
const notes = z.record(z.record(z.string()));

const ColumnDataSchema = z.object({
  fields: cells,
  bars: cells,
  comments: z.string(),
});

/** Shape of `exportSingle` output read back from a bundle */
export const SheetExportSchema: z.ZodType<SheetExport> = z.object({
  title: z.string(),
  link: z.string().optional(),
  barCount: z.number().int().nonnegative(),
  sources: z.array(ColumnDataSchema.extend({ name: z.string(), link: z.string() })),
  notes: z.object({ fields: cells, bars: cells }),
});

/** Shape of `exportMaster` output read back from a bundle */
export const MasterSheetExportSchema: z.ZodType<MasterSheetExport> = z.object({
  title: z.string(),
  link: z.string().optional(),
  barCount: z.number().int().nonnegative(),
  sources: z.array(
    z.object({
      name: z.string(),
      link: z.string(),
      volunteers: z.record(ColumnDataSchema),
      summary: ColumnDataSchema,
    })
  ),
  notes: z.object({ fields: notes, bars: notes }),
});
