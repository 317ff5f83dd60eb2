import { encodeHyperlink } from '../hyperlink';
import { logger } from '../logger';
import type { Template } from '../types';
import { maxOrAbsent } from '../utils';
import {
  isRecord,
  optionalBarCount,
  optionalString,
  requireKeys,
  requireString,
  ValidationError,
} from '../validator';
import { Source } from './source';

/**
 * A musical work tracked by one sheet, with its contribution sources.
 * Sources are unique by name and keep their first-insertion order,
 * which is the column order of every sheet built from the piece.
 */
export class Piece {
  readonly name: string;
  readonly template: Template;
  private _link: string | undefined;
  private _barCount: number | undefined;
  private readonly _sources = new Map<string, Source>();

  /**
   * @param record - Piece record (`title`, `sources`, optional `link` and `barCount`)
   * @param template - Sheet template
   * @throws ValidationError if the record or any of its sources is invalid;
   *   source errors are tagged with the source's index
   */
  constructor(record: unknown, template: Template) {
    if (!isRecord(record)) {
      throw new ValidationError('INVALID_VALUE', 'piece must be an object');
    }
    requireKeys(record, ['title', 'sources']);

    this.name = requireString(record, 'title');
    this._link = optionalString(record, 'link');
    this._barCount = optionalBarCount(record);
    this.template = template;

    const sources = record.sources;
    if (!Array.isArray(sources)) {
      throw new ValidationError('INVALID_VALUE', 'key "sources" must be a list');
    }
    sources.forEach((args: unknown, i) => {
      let source: Source;
      try {
        source = new Source(args);
      } catch (error) {
        if (error instanceof ValidationError) {
          throw error.at({ sourceIndex: i });
        }
        throw error;
      }
      this.addSource(source);
    });
  }

  get link(): string | undefined {
    return this._link;
  }

  get barCount(): number | undefined {
    return this._barCount;
  }

  get sources(): Source[] {
    return [...this._sources.values()];
  }

  /** Own bar count, or the template default when unset */
  get finalBarCount(): number {
    return this._barCount ?? this.template.values.defaultBarCount;
  }

  hasSource(name: string): boolean {
    return this._sources.has(name);
  }

  getSource(name: string): Source | undefined {
    return this._sources.get(name);
  }

  hyperlink(): string {
    return encodeHyperlink(this.name, this._link);
  }

  /** Add a source, merging it into an existing one of the same name */
  addSource(source: Source): void {
    const existing = this._sources.get(source.name);
    if (existing) {
      logger.debug('Combining source "%s" in piece "%s"', source.name, this.name);
      existing.combine(source);
    } else {
      this._sources.set(source.name, source);
    }

    this._barCount = maxOrAbsent(this._barCount, source.barCount);
  }

  /** Merge another piece's link (if unset here) and all of its sources */
  combine(other: Piece): void {
    if (this._link === undefined) {
      this._link = other.link;
    }
    for (const source of other.sources) {
      this.addSource(source);
    }
  }
}
