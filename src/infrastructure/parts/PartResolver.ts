import { ChannelHandle, FileRecord, Part } from '../../domain/entities';
import { UpstreamError, ValidationError } from '../../domain/errors';
import { ILogger, IRemoteChunkClient, RemoteDocument } from '../../domain/interfaces';
import { SingleFlightCache, SingleFlightCacheOptions } from '../cache/SingleFlightCache';

/**
 * Turns a file record into its ordered list of backing parts.
 *
 * Channel handles and message lookups are memoized per client account,
 * since access hashes are only valid for the account that obtained them.
 * Documents never change once written, so cached entries stay correct
 * until they expire.
 */
export class PartResolver {
  private readonly channels: SingleFlightCache<ChannelHandle>;
  private readonly documents: SingleFlightCache<RemoteDocument[]>;

  constructor(
    private readonly logger: ILogger,
    cacheOptions: SingleFlightCacheOptions,
    private readonly defaultChannelId: string
  ) {
    this.channels = new SingleFlightCache(cacheOptions);
    this.documents = new SingleFlightCache(cacheOptions);
  }

  get cacheSize(): number {
    return this.channels.size + this.documents.size;
  }

  async resolve(file: FileRecord, client: IRemoteChunkClient): Promise<Part[]> {
    if (file.parts.length === 0) {
      throw new ValidationError(`File ${file.id} has no parts`);
    }

    const channelId = file.channelId ?? this.defaultChannelId;
    if (!channelId) {
      throw new ValidationError(`File ${file.id} has no channel`);
    }

    const channel = await this.channels.get(`channels:${client.id}:${channelId}`, () =>
      client.resolveChannel(channelId)
    );

    const messageIds = file.parts.map((ref) => ref.id);
    const documents = await this.documents.get(`messages:${client.id}:${file.id}`, () =>
      client.resolveDocuments(channel, messageIds)
    );

    const byMessage = new Map(documents.map((doc) => [doc.messageId, doc]));
    const parts = messageIds.map((messageId, index): Part => {
      const doc = byMessage.get(messageId);
      if (!doc) {
        throw new UpstreamError(`Part ${index + 1} of file ${file.id} (message ${messageId}) is missing`);
      }
      return { location: doc.location, size: doc.size, localStart: 0, localEnd: doc.size - 1 };
    });

    const total = parts.reduce((sum, part) => sum + part.size, 0);
    if (total !== file.size) {
      throw new UpstreamError(`Parts of file ${file.id} hold ${total} bytes, record says ${file.size}`);
    }

    this.logger.debug(`[${file.name}] Resolved ${parts.length} parts from channel ${channelId}`);
    return parts;
  }
}
