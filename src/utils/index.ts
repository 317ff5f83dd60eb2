import type { sheets_v4 } from 'googleapis';
import type { Grid } from '../types';

/**
 * Maximum of two optional values.
 * Absence is the identity: undefined only when both are undefined.
 */
export function maxOrAbsent(a: number | undefined, b: number | undefined): number | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;
  return Math.max(a, b);
}

// ============================================================
// A1 notation
// ============================================================

/** Convert a 1-indexed column number to its letter (1 -> "A", 27 -> "AA") */
export function columnLetter(col: number): string {
  if (!Number.isInteger(col) || col < 1) {
    throw new RangeError(`Invalid column number: ${col}`);
  }
  let letters = '';
  let n = col;
  while (n > 0) {
    const rem = (n - 1) % 26;
    letters = String.fromCharCode(65 + rem) + letters;
    n = Math.floor((n - 1) / 26);
  }
  return letters;
}

/** Convert a column letter to its 1-indexed number ("A" -> 1, "AA" -> 27) */
export function columnNumber(letters: string): number {
  let n = 0;
  for (const ch of letters.toUpperCase()) {
    const code = ch.charCodeAt(0);
    if (code < 65 || code > 90) {
      throw new RangeError(`Invalid column letters: ${letters}`);
    }
    n = n * 26 + (code - 64);
  }
  return n;
}

/** A1 reference for a 1-indexed cell */
export function toA1(row: number, col: number): string {
  return `${columnLetter(col)}${row}`;
}

const A1_PART_RE = /^([A-Za-z]*)(\d*)$/;

function parseA1Part(part: string): { col?: number; row?: number } {
  const match = A1_PART_RE.exec(part);
  if (!match || (match[1] === '' && match[2] === '')) {
    throw new RangeError(`Invalid A1 reference: ${part}`);
  }
  return {
    col: match[1] ? columnNumber(match[1]) : undefined,
    row: match[2] ? Number(match[2]) : undefined,
  };
}

/**
 * Convert an A1 range ("B2", "A3:A7", "B12:12", "4:4", "C:C") to a grid range.
 * Indices are 0-indexed and end-exclusive; open ends are left unset.
 */
export function a1RangeToGridRange(range: string, sheetId: number): sheets_v4.Schema$GridRange {
  const [startRef, endRef = startRef] = range.split(':');
  const start = parseA1Part(startRef);
  const end = parseA1Part(endRef);

  const gridRange: sheets_v4.Schema$GridRange = { sheetId };
  if (start.row !== undefined) gridRange.startRowIndex = start.row - 1;
  if (end.row !== undefined) gridRange.endRowIndex = end.row;
  if (start.col !== undefined) gridRange.startColumnIndex = start.col - 1;
  if (end.col !== undefined) gridRange.endColumnIndex = end.col;
  return gridRange;
}

// ============================================================
// Grid access
// ============================================================

/** Cell value at 0-indexed coordinates; cells past a ragged row end read as "" */
export function cellAt(grid: Grid, row: number, col: number): string {
  return grid[row]?.[col] ?? '';
}
