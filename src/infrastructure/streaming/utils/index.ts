export { StreamErrorHandler } from './StreamErrorHandler';
export { RangeResponseBuilder } from './RangeResponseBuilder';
export type { StreamHead } from './RangeResponseBuilder';
export { StreamEventHandler } from './StreamEventHandler';
export { RangeParser } from './RangeParser';
export { RangeResolver } from './RangeResolver';
export { RangeSlicer } from './RangeSlicer';
