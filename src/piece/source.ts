import { encodeHyperlink } from '../hyperlink';
import { maxOrAbsent } from '../utils';
import { isRecord, optionalBarCount, requireString, ValidationError } from '../validator';

/**
 * A single recording or reference contributing bar-by-bar data to a piece
 */
export class Source {
  readonly name: string;
  readonly link: string;
  private _barCount: number | undefined;

  /**
   * @param record - Source record (`name`, `link`, optional `barCount`)
   * @throws ValidationError if a required key is missing or the bar count is not positive
   */
  constructor(record: unknown) {
    if (!isRecord(record)) {
      throw new ValidationError('INVALID_VALUE', 'source must be an object');
    }
    this.name = requireString(record, 'name');
    this.link = requireString(record, 'link');
    this._barCount = optionalBarCount(record);
  }

  get barCount(): number | undefined {
    return this._barCount;
  }

  /** Combine with another same-named source by taking the max bar count */
  combine(other: Source): void {
    this._barCount = maxOrAbsent(this._barCount, other.barCount);
  }

  hyperlink(): string {
    return encodeHyperlink(this.name, this.link);
  }
}
