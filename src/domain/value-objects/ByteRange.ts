import { ValidationError } from '../errors';

/**
 * Immutable inclusive byte window of a file
 */
export class ByteRange {
  constructor(
    public readonly start: number,
    public readonly end: number
  ) {
    if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end)) {
      throw new ValidationError(`Range bounds must be integers, got start=${start}, end=${end}`);
    }
    if (start < 0) {
      throw new ValidationError(`Range start must be non-negative, got ${start}`);
    }
    if (start > end) {
      throw new ValidationError(`Range start must be <= end, got start=${start}, end=${end}`);
    }
  }

  /**
   * Number of bytes covered (inclusive)
   */
  get size(): number {
    return this.end - this.start + 1;
  }

  /**
   * Throws unless the range lies inside a file of `fileSize` bytes
   */
  assertWithin(fileSize: number): this {
    if (this.end >= fileSize) {
      throw new ValidationError(
        `Range ${this.start}-${this.end} is outside of file with ${fileSize} bytes`
      );
    }
    return this;
  }

  toContentRange(fileSize: number): string {
    return `bytes ${this.start}-${this.end}/${fileSize}`;
  }

  /**
   * Whole file, used when no Range header is sent
   */
  static full(fileSize: number): ByteRange {
    if (fileSize <= 0) {
      throw new ValidationError('Cannot build a range over an empty file');
    }
    return new ByteRange(0, fileSize - 1);
  }

  /**
   * bytes=START- : from START to the last byte
   */
  static fromStartOnly(start: number, fileSize: number): ByteRange {
    if (start >= fileSize) {
      throw new ValidationError(`Range start ${start} is outside of file with ${fileSize} bytes`);
    }
    return new ByteRange(start, fileSize - 1);
  }

  /**
   * bytes=-SUFFIX : the last SUFFIX bytes
   */
  static fromSuffix(suffix: number, fileSize: number): ByteRange {
    if (suffix <= 0) {
      throw new ValidationError(`Suffix length must be positive, got ${suffix}`);
    }
    return new ByteRange(Math.max(fileSize - suffix, 0), fileSize - 1);
  }

  /**
   * bytes=START-END : no clamping, out-of-bounds ends are rejected
   */
  static fromStartEnd(start: number, end: number, fileSize: number): ByteRange {
    return new ByteRange(start, end).assertWithin(fileSize);
  }
}
