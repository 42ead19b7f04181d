export { ByteRange } from './ByteRange';
export type { ParsedRange, RangeParseResult } from './ParsedRange';
export { RangeParseError } from './ParsedRange';
