#!/usr/bin/env tsx
/**
 * Export every piece sheet of a spreadsheet
 *
 * Usage:
 *   npx tsx scripts/export-sheets.ts <spreadsheetId> <template.json> <output.json|output.zip> [--master] [--skip <title>]...
 *
 * --skip leaves out a sheet that holds no piece, such as an instructions tab.
 * Sheets that fail to export are listed and skipped.
 */

import { loadRuntimeConfig } from '../src/config';
import { readTemplateFile, writeBundleFile } from '../src/file';
import { logger } from '../src/logger';
import {
  connectSheets,
  exportMasterSpreadsheet,
  exportSpreadsheet,
  GoogleSpreadsheet,
  type SpreadsheetExport,
} from '../src/sheets';
import { parseExportArgs } from './args';

async function main() {
  const { positional, master, skipSheets } = parseExportArgs(process.argv.slice(2));

  if (positional.length < 3) {
    console.log('Usage:');
    console.log('  npx tsx scripts/export-sheets.ts <spreadsheetId> <template.json> <output.json|output.zip> [--master] [--skip <title>]...');
    process.exit(1);
  }

  const [spreadsheetId, templatePath, outputPath] = positional;
  const config = loadRuntimeConfig();
  logger.level = config.logLevel;

  const template = await readTemplateFile(templatePath);
  const doc = new GoogleSpreadsheet(connectSheets(config), spreadsheetId);

  const result: SpreadsheetExport<unknown> = master
    ? await exportMasterSpreadsheet(doc, template, { skipSheets })
    : await exportSpreadsheet(doc, template, { skipSheets });

  await writeBundleFile(outputPath, result.sheets);
  console.log(`Exported ${result.sheets.length} sheets to ${outputPath}`);

  if (result.failures.length > 0) {
    console.log(`Failed to export ${result.failures.length} sheets:`);
    for (const failure of result.failures) {
      console.log(`  ${failure.message}`);
    }
    process.exit(2);
  }
}

main().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
