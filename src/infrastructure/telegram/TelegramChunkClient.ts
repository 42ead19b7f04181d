import bigInt from 'big-integer';
import { Api, TelegramClient } from 'telegram';
import { ChannelHandle, DocumentLocation } from '../../domain/entities';
import { UpstreamError, isStreamError } from '../../domain/errors';
import { ILogger, IRemoteChunkClient, RemoteDocument } from '../../domain/interfaces';
import { TelegramResponseDecoder } from './TelegramResponseDecoder';

/**
 * Remote chunk client backed by one MTProto session.
 * Flood waits and reconnects are handled inside the telegram library.
 */
export class TelegramChunkClient implements IRemoteChunkClient {
  constructor(
    readonly id: string,
    private readonly client: TelegramClient,
    private readonly logger: ILogger
  ) { }

  async fetchChunk(location: DocumentLocation, offset: number, limit: number): Promise<Buffer> {
    const request = new Api.upload.GetFile({
      location: new Api.InputDocumentFileLocation({
        id: bigInt(location.documentId),
        accessHash: bigInt(location.accessHash),
        fileReference: location.fileReference,
        thumbSize: ''
      }),
      offset: bigInt(offset),
      limit
    });
    const result = await this.call(`getFile ${location.documentId}@${offset}`, () => this.client.invoke(request));
    return TelegramResponseDecoder.fileBytes(result);
  }

  async resolveChannel(channelId: string): Promise<ChannelHandle> {
    const request = new Api.channels.GetChannels({
      id: [new Api.InputChannel({ channelId: bigInt(channelId), accessHash: bigInt.zero })]
    });
    const result = await this.call(`getChannels ${channelId}`, () => this.client.invoke(request));
    return TelegramResponseDecoder.channel(result, channelId);
  }

  async resolveDocuments(channel: ChannelHandle, messageIds: number[]): Promise<RemoteDocument[]> {
    const request = new Api.channels.GetMessages({
      channel: new Api.InputChannel({
        channelId: bigInt(channel.channelId),
        accessHash: bigInt(channel.accessHash)
      }),
      id: messageIds.map((id) => new Api.InputMessageID({ id }))
    });
    const result = await this.call(`getMessages ${channel.channelId}`, () => this.client.invoke(request));
    return TelegramResponseDecoder.documents(result);
  }

  async disconnect(): Promise<void> {
    await this.client.disconnect();
    this.logger.info(`[${this.id}] Disconnected`);
  }

  private async call<T>(description: string, invoke: () => Promise<T>): Promise<T> {
    try {
      return await invoke();
    } catch (error) {
      if (isStreamError(error)) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`[${this.id}] ${description} failed: ${message}`);
      throw new UpstreamError(`${description} failed: ${message}`, { cause: error });
    }
  }
}
