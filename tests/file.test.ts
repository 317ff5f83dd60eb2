import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { strToU8 } from 'fflate';
import { SheetExportSchema } from '../src/exporters';
import {
  bundleFileName,
  isArchive,
  packBundle,
  readBundleFile,
  readDataSetFile,
  readTemplateFile,
  unpackBundle,
  writeBundleFile,
  type BundleEntry,
} from '../src/file';
import type { SheetExport } from '../src/types';
import { fixturesPath } from './helpers/fixtures';

function exportOf(title: string): SheetExport {
  return {
    title,
    link: 'http://piece',
    barCount: 1,
    sources: [
      {
        name: 'S1',
        link: 'L1',
        fields: { instrument: 'Piano' },
        bars: { '1': 'p' },
        comments: '',
      },
    ],
    notes: { fields: { instrument: '' }, bars: { '1': '' } },
  };
}

const entries: BundleEntry<SheetExport>[] = [
  { title: 'Mass', data: exportOf('Mass') },
  { title: 'Goldberg Variations', data: exportOf('Goldberg Variations') },
];

describe('File Operations', () => {
  const cleanupDirs: string[] = [];

  afterEach(() => {
    for (const dir of cleanupDirs) {
      rmSync(dir, { recursive: true, force: true });
    }
    cleanupDirs.length = 0;
  });

  function tempDir(): string {
    const dir = mkdtempSync(join(tmpdir(), 'score-sheets-'));
    cleanupDirs.push(dir);
    return dir;
  }

  describe('readTemplateFile', () => {
    it('should read and validate a template', async () => {
      const template = await readTemplateFile(join(fixturesPath, 'template.json'));

      expect(template.values.defaultBarCount).toBe(4);
      expect(template.commentFields.notes).toBe('Notes');
    });
  });

  describe('readDataSetFile', () => {
    it('should read a list of records', async () => {
      const records = await readDataSetFile(join(fixturesPath, 'dataset.json'));

      expect(records).toHaveLength(3);
    });

    it('should reject a file that is not a list', async () => {
      await expect(readDataSetFile(join(fixturesPath, 'template.json'))).rejects.toThrow(
        'must be a JSON list of pieces'
      );
    });
  });

  describe('bundles', () => {
    it('should name bundle files after sheets', () => {
      expect(bundleFileName('Mass in B minor')).toBe('Mass in B minor.json');
      expect(bundleFileName('Act 1/Scene 2: "Duet"')).toBe('Act 1_Scene 2_ _Duet_.json');
    });

    it('should pack a zip archive', () => {
      const data = packBundle(entries);

      expect(isArchive(data)).toBe(true);
      expect(isArchive(strToU8('[]'))).toBe(false);
    });

    it('should unpack a zip archive in file name order', () => {
      const unpacked = unpackBundle(packBundle(entries), SheetExportSchema);

      expect(unpacked.map(e => e.title)).toEqual(['Goldberg Variations', 'Mass']);
      expect(unpacked[1]).toEqual(entries[0]);
    });

    it('should unpack a JSON list', () => {
      const unpacked = unpackBundle(strToU8(JSON.stringify(entries)), SheetExportSchema);

      expect(unpacked).toEqual(entries);
    });

    it('should reject entries that are not exports', () => {
      expect(() => unpackBundle(strToU8('[{"title": "Mass"}]'), SheetExportSchema)).toThrow(
        'entry 0 is not an exported sheet'
      );
      expect(() =>
        unpackBundle(strToU8('[{"title": "Mass", "data": {"title": 3}}]'), SheetExportSchema)
      ).toThrow(/^entry 0: /);
      expect(() => unpackBundle(strToU8('{}'), SheetExportSchema)).toThrow(
        'Export bundle must be a zip archive or a JSON list'
      );
    });

    it('should write and read a .zip bundle', async () => {
      const filePath = join(tempDir(), 'exports.zip');
      await writeBundleFile(filePath, entries);

      expect(isArchive(readFileSync(filePath))).toBe(true);
      const read = await readBundleFile(filePath, SheetExportSchema);
      expect(read.map(e => e.title)).toEqual(['Goldberg Variations', 'Mass']);
    });

    it('should write and read a .json bundle', async () => {
      const filePath = join(tempDir(), 'exports.json');
      await writeBundleFile(filePath, entries);

      expect(JSON.parse(readFileSync(filePath, 'utf-8'))).toEqual(entries);
      expect(await readBundleFile(filePath, SheetExportSchema)).toEqual(entries);
    });
  });
});
