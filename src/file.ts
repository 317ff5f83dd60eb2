import { readFile, writeFile } from 'fs/promises';
import { strFromU8, strToU8, unzipSync, zipSync } from 'fflate';
import type { z } from 'zod';
import { parseTemplate } from './config';
import type { Template } from './types';

/**
 * Read and validate a template JSON file
 * @throws TemplateError if the template is malformed
 */
export async function readTemplateFile(filePath: string): Promise<Template> {
  const text = await readFile(filePath, 'utf-8');
  return parseTemplate(JSON.parse(text));
}

/**
 * Read a data set file: a JSON list of piece records.
 * Records are checked when pieces are built from them.
 */
export async function readDataSetFile(filePath: string): Promise<unknown[]> {
  const text = await readFile(filePath, 'utf-8');
  const data: unknown = JSON.parse(text);
  if (!Array.isArray(data)) {
    throw new Error(`Data set ${filePath} must be a JSON list of pieces`);
  }
  return data;
}

// ============================================================
// Export bundles
// ============================================================

/** One exported sheet: its title and exported data */
export interface BundleEntry<T> {
  title: string;
  data: T;
}

/** File name of a sheet inside a zip bundle */
export function bundleFileName(title: string): string {
  return `${title.replace(/[\\/:*?"<>|]/g, '_')}.json`;
}

/**
 * Check if data is a zip archive
 * @returns true if the data starts with the PK signature
 */
export function isArchive(data: Uint8Array): boolean {
  return data.length >= 2 && data[0] === 0x50 && data[1] === 0x4b;
}

/**
 * Pack exported sheets into a zip with one JSON file per sheet
 */
export function packBundle<T>(entries: BundleEntry<T>[]): Uint8Array {
  const files: Record<string, Uint8Array> = {};
  for (const entry of entries) {
    files[bundleFileName(entry.title)] = strToU8(JSON.stringify(entry, null, 2));
  }
  return zipSync(files, { level: 6 });
}

function toEntry<T>(value: unknown, schema: z.ZodType<T>, origin: string): BundleEntry<T> {
  if (
    typeof value !== 'object' || value === null ||
    !('title' in value) || typeof value.title !== 'string' || !('data' in value)
  ) {
    throw new Error(`${origin} is not an exported sheet`);
  }
  const parsed = schema.safeParse(value.data);
  if (!parsed.success) {
    throw new Error(`${origin}: ${parsed.error.issues[0]?.message ?? 'invalid data'}`);
  }
  return { title: value.title, data: parsed.data };
}

/**
 * Unpack a bundle: a zip of per-sheet JSON files, or a JSON list of entries
 * @param schema - Shape of each entry's data
 */
export function unpackBundle<T>(data: Uint8Array, schema: z.ZodType<T>): BundleEntry<T>[] {
  if (isArchive(data)) {
    const files = unzipSync(data);
    return Object.keys(files)
      .sort()
      .map(name => toEntry(JSON.parse(strFromU8(files[name])), schema, name));
  }

  const parsed: unknown = JSON.parse(strFromU8(data));
  if (!Array.isArray(parsed)) {
    throw new Error('Export bundle must be a zip archive or a JSON list');
  }
  return parsed.map((value: unknown, i) => toEntry(value, schema, `entry ${i}`));
}

/**
 * Write exported sheets to disk.
 * Format is determined by file extension:
 * - .zip: one JSON file per sheet
 * - anything else: a single JSON list
 */
export async function writeBundleFile<T>(filePath: string, entries: BundleEntry<T>[]): Promise<void> {
  if (filePath.toLowerCase().endsWith('.zip')) {
    await writeFile(filePath, packBundle(entries));
  } else {
    await writeFile(filePath, JSON.stringify(entries, null, 2) + '\n', 'utf-8');
  }
}

export async function readBundleFile<T>(
  filePath: string,
  schema: z.ZodType<T>
): Promise<BundleEntry<T>[]> {
  const data = await readFile(filePath);
  return unpackBundle(data, schema);
}
