import { Part } from '../../domain/entities';
import { PartialTransferError } from '../../domain/errors';
import { ILogger, IRemoteChunkClient } from '../../domain/interfaces';

/**
 * Aligned fetch plan for one part
 */
export interface FetchPlan {
  firstOffset: number;
  blockCount: number;
}

/**
 * Streams the bytes `[localStart, localEnd]` of one part.
 *
 * Blocks of `transferUnit` bytes are fetched one after another at offsets
 * aligned to the unit. The first block drops the bytes before `localStart`,
 * the last one drops the bytes after `localEnd`. Only the current block is
 * held in memory.
 */
export class PartStreamer {
  constructor(
    private readonly client: IRemoteChunkClient,
    private readonly transferUnit: number,
    private readonly logger: ILogger
  ) {
    if (!Number.isInteger(transferUnit) || transferUnit <= 0) {
      throw new Error(`PartStreamer: transfer unit must be a positive integer, got ${transferUnit}`);
    }
  }

  static plan(part: Part, transferUnit: number): FetchPlan {
    const firstBlock = Math.floor(part.localStart / transferUnit);
    const lastBlock = Math.ceil((part.localEnd + 1) / transferUnit);
    return {
      firstOffset: firstBlock * transferUnit,
      blockCount: lastBlock - firstBlock
    };
  }

  /**
   * Yields the trimmed blocks of `part`. Stops before the next fetch once
   * `signal` is aborted.
   */
  async *stream(part: Part, signal?: AbortSignal): AsyncGenerator<Buffer, void, undefined> {
    const { firstOffset, blockCount } = PartStreamer.plan(part, this.transferUnit);
    const unit = this.transferUnit;

    for (let index = 0; index < blockCount; index++) {
      if (signal?.aborted) {
        this.logger.debug(`[part ${part.location.documentId}] Aborted before block ${index + 1}/${blockCount}`);
        return;
      }

      const offset = firstOffset + index * unit;
      const from = index === 0 ? part.localStart - offset : 0;
      const to = index === blockCount - 1 ? part.localEnd - offset + 1 : unit;

      const block = await this.client.fetchChunk(part.location, offset, unit);

      if (block.length < to) {
        throw new PartialTransferError(
          to,
          block.length,
          `part ${part.location.documentId} at offset ${offset}`
        );
      }

      yield from === 0 && to === block.length ? block : block.subarray(from, to);
    }
  }
}
