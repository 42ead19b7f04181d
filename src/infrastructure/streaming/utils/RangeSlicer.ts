import { Part } from '../../../domain/entities';
import { ValidationError } from '../../../domain/errors';
import { ByteRange } from '../../../domain/value-objects/ByteRange';

/**
 * Maps a file-level byte range onto the parts that store it.
 *
 * Every part except possibly the last has the size of the first one, so
 * the covering parts are found by division. The returned parts are copies
 * with `localStart`/`localEnd` narrowed to the bytes needed from each; the
 * input list is not mutated and can be shared between requests.
 */
export class RangeSlicer {
  static slice(parts: readonly Part[], range: ByteRange): Part[] {
    if (parts.length === 0) {
      throw new ValidationError('File has no parts');
    }

    const chunkSize = parts[0].size;
    if (chunkSize <= 0) {
      throw new ValidationError('First part has no bytes');
    }

    const totalSize = parts.reduce((sum, part) => sum + part.size, 0);
    range.assertWithin(totalSize);

    const startIndex = Math.floor(range.start / chunkSize);
    const endIndex = Math.ceil((range.end + 1) / chunkSize);

    const selected = parts.slice(startIndex, endIndex).map((part) => ({
      ...part,
      localStart: 0,
      localEnd: part.size - 1
    }));

    selected[0].localStart = range.start % chunkSize;
    selected[selected.length - 1].localEnd = range.end % chunkSize;

    return selected;
  }

  /**
   * Bytes the sliced parts will produce
   */
  static byteCount(parts: readonly Part[]): number {
    return parts.reduce((sum, part) => sum + part.localEnd - part.localStart + 1, 0);
  }
}
