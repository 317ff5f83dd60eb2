import { describe, it, expect } from 'vitest';
import { collectContributions } from '../src/contributions';
import { buildSheetLayout } from '../src/layout';
import { Piece } from '../src/piece';
import {
  createMasterSheet,
  createPieceSheet,
  exportMasterSpreadsheet,
  exportSpreadsheet,
  quoteTitle,
} from '../src/sheets';
import { loadTemplate } from './helpers/fixtures';
import { MemorySpreadsheet } from './helpers/memory-document';

const template = loadTemplate();

function createPiece(title: string): Piece {
  return new Piece(
    { title, link: `http://example.com/${title.length}`, sources: [{ name: 'S1', link: 'L1' }] },
    template
  );
}

describe('quoteTitle', () => {
  it('should quote titles and double single quotes', () => {
    expect(quoteTitle('Mass')).toBe("'Mass'");
    expect(quoteTitle("Bach's Mass")).toBe("'Bach''s Mass'");
  });
});

describe('createPieceSheet', () => {
  it('should write the layout and format the new sheet', async () => {
    const doc = new MemorySpreadsheet();
    const piece = createPiece('Mass');

    const sheet = await createPieceSheet(doc, piece);

    expect(sheet).toEqual({ sheetId: 1, title: 'Mass' });
    expect(doc.sheets.get('Mass')?.values).toEqual(buildSheetLayout(piece).values);
    expect(doc.requests).toHaveLength(1);
    expect(doc.requests[0].every(r => JSON.stringify(r).includes('"sheetId":1'))).toBe(true);
  });

  it('should propagate remote failures', async () => {
    const doc = new MemorySpreadsheet();
    await createPieceSheet(doc, createPiece('Mass'));

    await expect(createPieceSheet(doc, createPiece('Mass'))).rejects.toThrow(
      'A sheet with the name "Mass" already exists'
    );
  });
});

describe('createMasterSheet', () => {
  it('should not create a sheet when contribution data is incomplete', async () => {
    const doc = new MemorySpreadsheet();

    await expect(
      createMasterSheet(doc, createPiece('Mass'), {
        sources: {},
        notes: { fields: {}, bars: {} },
      })
    ).rejects.toThrow('Missing source "S1" in contribution data');
    expect(doc.sheets.size).toBe(0);
  });

  it('should create a master sheet that exports back', async () => {
    const doc = new MemorySpreadsheet();
    const piece = createPiece('Mass');

    await createMasterSheet(doc, piece, collectContributions(piece, []));
    const result = await exportMasterSpreadsheet(doc, template);

    expect(result.failures).toEqual([]);
    expect(result.sheets).toHaveLength(1);
    expect(result.sheets[0].data.sources.map(s => s.name)).toEqual(['S1']);
    expect(result.sheets[0].data.sources[0].volunteers).toEqual({});
  });
});

describe('exportSpreadsheet', () => {
  it('should continue past a malformed sheet', async () => {
    const doc = new MemorySpreadsheet();
    await createPieceSheet(doc, createPiece('Mass'));
    const bad = await doc.addSheet('Broken');
    await doc.writeValues(bad.title, [['Broken', 'S1', 'Notes'], ['Instrument'], ['Reviewed?'], [], ['1'], [], ['Comments']]);
    await createPieceSheet(doc, createPiece('Goldberg Variations'));

    const result = await exportSpreadsheet(doc, template);

    expect(result.sheets.map(s => s.title)).toEqual(['Mass', 'Goldberg Variations']);
    expect(result.failures).toEqual([
      {
        code: 'MALFORMED_HYPERLINK',
        message: 'sheet "Broken": column B doesn\'t have a valid hyperlink',
        sheet: 'Broken',
        column: 'B',
      },
    ]);
  });

  it('should skip the listed sheets', async () => {
    const doc = new MemorySpreadsheet();
    await doc.addSheet('Instructions');
    await createPieceSheet(doc, createPiece('Mass'));

    const result = await exportSpreadsheet(doc, template, { skipSheets: ['Instructions'] });

    expect(result.sheets.map(s => s.title)).toEqual(['Mass']);
    expect(result.failures).toEqual([]);
  });
});
