import { Piece } from './piece';
import type { Template } from './types';
import { ValidationError } from './validator';

/**
 * Build pieces from a data set, merging records that share a title.
 * A merged piece keeps the position of its first record.
 * @throws ValidationError tagged with the offending record's index
 */
export function loadPieces(records: readonly unknown[], template: Template): Piece[] {
  const pieces = new Map<string, Piece>();

  records.forEach((record, i) => {
    let piece: Piece;
    try {
      piece = new Piece(record, template);
    } catch (error) {
      if (error instanceof ValidationError) {
        throw error.at({ pieceIndex: i });
      }
      throw error;
    }

    const existing = pieces.get(piece.name);
    if (existing) {
      existing.combine(piece);
    } else {
      pieces.set(piece.name, piece);
    }
  });

  return [...pieces.values()];
}
