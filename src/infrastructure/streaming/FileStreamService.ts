import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { Request, Response } from 'express';
import { FileRecord, Part } from '../../domain/entities';
import {
  ClientIdentity,
  IClientPool,
  ILogger,
  IRemoteChunkClient,
  IStreamService
} from '../../domain/interfaces';
import { ByteRange } from '../../domain/value-objects';
import { PartResolver } from '../parts/PartResolver';
import { PartStreamer } from './PartStreamer';
import {
  RangeResolver,
  RangeResponseBuilder,
  RangeSlicer,
  StreamErrorHandler,
  StreamEventHandler,
  StreamHead
} from './utils';

export interface FileStreamServiceOptions {
  // Bytes per remote fetch, also the capacity of the buffer between producer and response
  transferUnit: number;
}

/**
 * Serves byte windows of stored files over HTTP.
 *
 * Range validation, client checkout, part resolution and the first fetch
 * all happen before the status line is written, so their failures still get
 * a proper error status. A failure after that tears the connection down.
 */
export class FileStreamService implements IStreamService {
  private readonly transferUnit: number;

  constructor(
    private readonly pool: IClientPool,
    private readonly partResolver: PartResolver,
    private readonly logger: ILogger,
    options: FileStreamServiceOptions
  ) {
    this.transferUnit = options.transferUnit;
  }

  async streamFile(req: Request, res: Response, file: FileRecord, identity?: ClientIdentity): Promise<void> {
    const fileName = file.name || file.id;

    try {
      if (file.size === 0 && req.headers.range === undefined) {
        this.logger.info(`[${fileName}] ${req.method} empty file -> 200`);
        RangeResponseBuilder.send(res, RangeResponseBuilder.empty(file));
        res.end();
        return;
      }

      const { range, partial } = RangeResolver.resolve(req.headers.range, file.size);
      const head = RangeResponseBuilder.build(file, range, partial);

      this.logger.info(
        `[${fileName}] ${req.method} range=${req.headers.range ?? 'none'} -> ${head.status} ` +
        `bytes ${range.start}-${range.end}/${file.size}`
      );

      if (req.method === 'HEAD') {
        RangeResponseBuilder.send(res, head);
        res.end();
        return;
      }

      const lease = await this.pool.acquire(identity);
      try {
        const parts = await this.partResolver.resolve(file, lease.client);
        const selected = RangeSlicer.slice(parts, range);
        await this.sendBody(res, head, selected, range, lease.client, fileName);
      } finally {
        lease.release();
      }
    } catch (error) {
      StreamErrorHandler.handle(error, res, this.logger, fileName);
    }
  }

  private async sendBody(
    res: Response,
    head: StreamHead,
    parts: Part[],
    range: ByteRange,
    client: IRemoteChunkClient,
    fileName: string
  ): Promise<void> {
    if (res.writableEnded || res.destroyed) {
      this.logger.warn(`[${fileName}] Response closed before streaming started`);
      return;
    }

    const events = new StreamEventHandler(this.logger, fileName, range);
    events.bind(res);

    const chunks = this.produce(parts, client, events, fileName);
    const first = await chunks.next();
    if (events.aborted) {
      await chunks.return();
      return;
    }

    const source = Readable.from(this.resume(first, chunks), {
      objectMode: false,
      highWaterMark: this.transferUnit
    });

    RangeResponseBuilder.send(res, head);

    try {
      await pipeline(source, res);
      events.onFinish();
    } catch (error) {
      if (events.aborted) {
        this.logger.debug(`[${fileName}] Stream stopped after client disconnect`);
        return;
      }
      throw error;
    }
  }

  /**
   * Replays an already pulled first chunk ahead of the rest
   */
  private async *resume(
    first: IteratorResult<Buffer, void>,
    rest: AsyncGenerator<Buffer, void, undefined>
  ): AsyncGenerator<Buffer, void, undefined> {
    if (first.done) {
      return;
    }
    yield first.value;
    yield* rest;
  }

  /**
   * Producer side: streams the selected parts strictly in order
   */
  private async *produce(
    parts: Part[],
    client: IRemoteChunkClient,
    events: StreamEventHandler,
    fileName: string
  ): AsyncGenerator<Buffer, void, undefined> {
    const streamer = new PartStreamer(client, this.transferUnit, this.logger);

    for (const [index, part] of parts.entries()) {
      this.logger.debug(
        `[${fileName}] Part ${index + 1}/${parts.length}: bytes ${part.localStart}-${part.localEnd} of ${part.size}`
      );
      for await (const chunk of streamer.stream(part, events.signal)) {
        events.onChunk(chunk.length);
        yield chunk;
      }
      if (events.aborted) {
        return;
      }
    }

    events.assertComplete();
  }
}
