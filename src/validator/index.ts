import type { RawRecord } from '../types';

// ============================================================
// Validation Error Types
// ============================================================

export type ValidationErrorCode =
  | 'MISSING_KEY'
  | 'INVALID_VALUE'
  | 'INVALID_BAR_COUNT';

export interface RecordLocation {
  pieceIndex?: number;
  sourceIndex?: number;
}

/**
 * Raised while constructing a Source or Piece from an input record.
 * The message is prefixed with the record location, e.g.
 * `piece 3, source 0: key "link" not found`
 */
export class ValidationError extends Error {
  constructor(
    public readonly code: ValidationErrorCode,
    public readonly detail: string,
    public readonly location: RecordLocation = {}
  ) {
    super(formatMessage(detail, location));
    this.name = 'ValidationError';
  }

  /** Copy of this error tagged with an outer location */
  at(location: RecordLocation): ValidationError {
    return new ValidationError(this.code, this.detail, { ...location, ...this.location });
  }
}

export function formatLocation(location: RecordLocation): string {
  const parts: string[] = [];

  if (location.pieceIndex !== undefined) {
    parts.push(`piece ${location.pieceIndex}`);
  }

  if (location.sourceIndex !== undefined) {
    parts.push(`source ${location.sourceIndex}`);
  }

  return parts.join(', ');
}

function formatMessage(detail: string, location: RecordLocation): string {
  const prefix = formatLocation(location);
  return prefix ? `${prefix}: ${detail}` : detail;
}

// ============================================================
// Record checks
// ============================================================

export function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function requireKeys(record: RawRecord, keys: readonly string[]): void {
  for (const key of keys) {
    if (!(key in record) || record[key] === undefined) {
      throw new ValidationError('MISSING_KEY', `key "${key}" not found`);
    }
  }
}

export function requireString(record: RawRecord, key: string): string {
  requireKeys(record, [key]);
  const value = record[key];
  if (typeof value !== 'string') {
    throw new ValidationError('INVALID_VALUE', `key "${key}" must be a string`);
  }
  return value;
}

export function optionalString(record: RawRecord, key: string): string | undefined {
  const value = record[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ValidationError('INVALID_VALUE', `key "${key}" must be a string`);
  }
  return value;
}

/** Read `barCount`, which must be a positive integer when present */
export function optionalBarCount(record: RawRecord): number | undefined {
  const value = record.barCount;
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ValidationError('INVALID_BAR_COUNT', 'bar count must be positive');
  }
  return value;
}
