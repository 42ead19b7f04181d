import { ValidationError } from '../../../domain/errors';
import { ByteRange } from '../../../domain/value-objects/ByteRange';
import { RangeParser } from './RangeParser';

/**
 * Turns an optional Range header into the byte window to serve
 */
export class RangeResolver {
  /**
   * @returns The requested window, or the whole file when `header` is absent,
   * and whether the response is partial
   * @throws ValidationError for malformed, multiple or out-of-bounds ranges
   */
  static resolve(header: string | undefined, fileSize: number): { range: ByteRange; partial: boolean } {
    if (header === undefined || header.trim() === '') {
      return { range: ByteRange.full(fileSize), partial: false };
    }

    const parsed = RangeParser.parse(header);
    if (!parsed.success) {
      throw new ValidationError(parsed.message);
    }

    const value = parsed.value;
    switch (value.type) {
      case 'suffix':
        return { range: ByteRange.fromSuffix(value.suffix, fileSize), partial: true };
      case 'start-only':
        return { range: ByteRange.fromStartOnly(value.start, fileSize), partial: true };
      case 'start-end':
        return { range: ByteRange.fromStartEnd(value.start, value.end, fileSize), partial: true };
    }
  }
}
