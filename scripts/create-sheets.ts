#!/usr/bin/env tsx
/**
 * Create one sheet per piece of a data set in an existing spreadsheet
 *
 * Usage:
 *   npx tsx scripts/create-sheets.ts <spreadsheetId> <data.json> <template.json>
 */

import { loadRuntimeConfig } from '../src/config';
import { loadPieces } from '../src/dataset';
import { readDataSetFile, readTemplateFile } from '../src/file';
import { logger } from '../src/logger';
import { connectSheets, createPieceSheet, GoogleSpreadsheet } from '../src/sheets';

async function main() {
  const args = process.argv.slice(2);

  if (args.length < 3) {
    console.log('Usage:');
    console.log('  npx tsx scripts/create-sheets.ts <spreadsheetId> <data.json> <template.json>');
    process.exit(1);
  }

  const [spreadsheetId, dataPath, templatePath] = args;
  const config = loadRuntimeConfig();
  logger.level = config.logLevel;

  const template = await readTemplateFile(templatePath);
  const pieces = loadPieces(await readDataSetFile(dataPath), template);
  console.log(`Loaded ${pieces.length} pieces from ${dataPath}`);

  const doc = new GoogleSpreadsheet(connectSheets(config), spreadsheetId);
  for (const piece of pieces) {
    const sheet = await createPieceSheet(doc, piece);
    console.log(`  Created "${sheet.title}" (${piece.sources.length} sources, ${piece.finalBarCount} bars)`);
  }

  console.log('Done!');
}

main().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
