#!/usr/bin/env tsx
/**
 * Create the master sheets of a data set from volunteers' exports
 *
 * Usage:
 *   npx tsx scripts/create-master.ts <spreadsheetId> <data.json> <template.json> <email>=<export.zip> [...]
 *
 * Each export is a bundle written by export-sheets.ts for one volunteer's spreadsheet.
 */

import { loadRuntimeConfig } from '../src/config';
import { collectContributions, type Submission } from '../src/contributions';
import { loadPieces } from '../src/dataset';
import { SheetExportSchema } from '../src/exporters';
import { readBundleFile, readDataSetFile, readTemplateFile } from '../src/file';
import { logger } from '../src/logger';
import { connectSheets, createMasterSheet, GoogleSpreadsheet } from '../src/sheets';

async function main() {
  const args = process.argv.slice(2);

  if (args.length < 4) {
    console.log('Usage:');
    console.log('  npx tsx scripts/create-master.ts <spreadsheetId> <data.json> <template.json> <email>=<export.zip> [...]');
    process.exit(1);
  }

  const [spreadsheetId, dataPath, templatePath, ...exportArgs] = args;
  const config = loadRuntimeConfig();
  logger.level = config.logLevel;

  const template = await readTemplateFile(templatePath);
  const pieces = loadPieces(await readDataSetFile(dataPath), template);

  // piece title -> submissions, in argument order
  const submissions = new Map<string, Submission[]>();
  for (const arg of exportArgs) {
    const sep = arg.indexOf('=');
    if (sep === -1) {
      throw new Error(`Expected <email>=<export file>, got "${arg}"`);
    }
    const email = arg.slice(0, sep);
    const entries = await readBundleFile(arg.slice(sep + 1), SheetExportSchema);
    for (const { data } of entries) {
      const list = submissions.get(data.title) ?? [];
      list.push({ email, sheet: data });
      submissions.set(data.title, list);
    }
  }

  const doc = new GoogleSpreadsheet(connectSheets(config), spreadsheetId);
  for (const piece of pieces) {
    const contributions = collectContributions(piece, submissions.get(piece.name) ?? []);
    const sheet = await createMasterSheet(doc, piece, contributions);
    console.log(`  Created master "${sheet.title}"`);
  }

  console.log('Done!');
}

main().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
