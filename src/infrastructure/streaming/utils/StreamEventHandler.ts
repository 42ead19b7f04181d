import { Response } from 'express';
import { PartialTransferError } from '../../../domain/errors';
import { ILogger } from '../../../domain/interfaces/ILogger';
import { ByteRange } from '../../../domain/value-objects/ByteRange';

/**
 * Tracks one response body: bytes produced, client disconnects and the
 * cancellation signal handed to the producer.
 */
export class StreamEventHandler {
  private bytesSent = 0;
  private readonly controller = new AbortController();

  constructor(
    private readonly logger: ILogger,
    private readonly fileName: string,
    private readonly range: ByteRange
  ) {}

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get aborted(): boolean {
    return this.controller.signal.aborted;
  }

  get sent(): number {
    return this.bytesSent;
  }

  /**
   * Aborts the producer when the client goes away before the body finished
   */
  bind(res: Response): void {
    res.on('close', () => {
      if (res.writableFinished || res.errored || this.aborted) {
        return;
      }
      this.logger.warn(
        `[${this.fileName}] Client disconnected after ${this.bytesSent}/${this.range.size} bytes`
      );
      this.controller.abort();
    });
  }

  onChunk(length: number): void {
    this.bytesSent += length;
    this.logger.debug(`[${this.fileName}] Produced ${this.bytesSent}/${this.range.size} bytes`);
  }

  /**
   * Throws when the producer ran out before the promised length
   */
  assertComplete(): void {
    if (this.bytesSent !== this.range.size) {
      throw new PartialTransferError(this.range.size, this.bytesSent, this.fileName);
    }
  }

  onFinish(): void {
    this.logger.info(
      `[${this.fileName}] Sent bytes ${this.range.start}-${this.range.end} (${this.bytesSent} bytes)`
    );
  }
}
