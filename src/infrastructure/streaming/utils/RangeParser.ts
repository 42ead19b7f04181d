import { RangeParseResult, RangeParseError } from '../../../domain/value-objects/ParsedRange';

/**
 * Parses HTTP Range header strings.
 * Only a single `bytes` range is supported.
 */
export class RangeParser {
  private static readonly BYTES_PREFIX = 'bytes=';
  private static readonly DIGITS = /^\d+$/;

  static parse(header: string): RangeParseResult {
    const trimmed = header.trim();
    if (!trimmed.startsWith(this.BYTES_PREFIX)) {
      return {
        success: false,
        error: RangeParseError.INVALID_UNIT,
        message: `Only byte ranges are supported, got '${trimmed}'`
      };
    }

    const rangeValue = trimmed.slice(this.BYTES_PREFIX.length).trim();
    if (!rangeValue) {
      return {
        success: false,
        error: RangeParseError.INVALID_FORMAT,
        message: 'Empty range value after bytes= prefix'
      };
    }

    if (rangeValue.includes(',')) {
      return {
        success: false,
        error: RangeParseError.MULTIPLE_RANGES,
        message: 'Multiple ranges are not supported'
      };
    }

    const separator = rangeValue.indexOf('-');
    if (separator === -1 || rangeValue.indexOf('-', separator + 1) !== -1) {
      return {
        success: false,
        error: RangeParseError.INVALID_FORMAT,
        message: `Invalid range format, expected 'start-end', got '${rangeValue}'`
      };
    }

    const startStr = rangeValue.slice(0, separator).trim();
    const endStr = rangeValue.slice(separator + 1).trim();

    if (!startStr && !endStr) {
      return {
        success: false,
        error: RangeParseError.INVALID_FORMAT,
        message: 'Range must have at least start or end value'
      };
    }

    for (const value of [startStr, endStr]) {
      if (value && !this.DIGITS.test(value)) {
        return {
          success: false,
          error: RangeParseError.INVALID_NUMBER,
          message: `Invalid range value: '${value}'`
        };
      }
    }

    // bytes=-SUFFIX
    if (!startStr) {
      return { success: true, value: { type: 'suffix', suffix: Number(endStr) } };
    }

    // bytes=START-
    if (!endStr) {
      return { success: true, value: { type: 'start-only', start: Number(startStr) } };
    }

    return { success: true, value: { type: 'start-end', start: Number(startStr), end: Number(endStr) } };
  }
}
