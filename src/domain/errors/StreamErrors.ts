/**
 * Error taxonomy for file streaming.
 * Each error carries the HTTP status it maps to while headers are unsent.
 */

export abstract class StreamError extends Error {
  abstract readonly statusCode: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Malformed or out-of-bounds range, or unusable part list
 */
export class ValidationError extends StreamError {
  readonly statusCode = 400;
}

export class NotFoundError extends StreamError {
  readonly statusCode = 404;
}

/**
 * Chunk fetch or metadata resolution failed upstream
 */
export class UpstreamError extends StreamError {
  readonly statusCode: number = 502;
}

/**
 * Upstream answered with a response variant this service cannot use
 */
export class UnexpectedVariantError extends UpstreamError {
  constructor(
    public readonly context: string,
    public readonly variant: string
  ) {
    super(`Unexpected ${context} response: ${variant}`);
  }
}

/**
 * Fewer bytes were produced than promised
 */
export class PartialTransferError extends StreamError {
  readonly statusCode = 502;

  constructor(
    public readonly expected: number,
    public readonly received: number,
    context: string
  ) {
    super(`Incomplete transfer (${context}): expected ${expected} bytes, got ${received}`);
  }
}

export function isStreamError(error: unknown): error is StreamError {
  return error instanceof StreamError;
}
