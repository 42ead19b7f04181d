import { Api } from 'telegram';
import { ChannelHandle } from '../../domain/entities';
import { UnexpectedVariantError, UpstreamError } from '../../domain/errors';
import { RemoteDocument } from '../../domain/interfaces';

/**
 * Decodes MTProto response unions into domain values.
 * Every variant is matched explicitly; anything else is an UnexpectedVariantError.
 */
export class TelegramResponseDecoder {
  static fileBytes(result: Api.upload.TypeFile): Buffer {
    if (result instanceof Api.upload.File) {
      return result.bytes;
    }
    // CDN redirects are only sent when cdnSupported is requested
    throw new UnexpectedVariantError('upload.getFile', result.className);
  }

  static channel(result: Api.messages.TypeChats, channelId: string): ChannelHandle {
    const channel = result.chats.find(
      (chat): chat is Api.Channel => chat instanceof Api.Channel && chat.id.toString() === channelId
    );
    if (!channel) {
      throw new UpstreamError(`Channel ${channelId} is not accessible`);
    }
    if (!channel.accessHash) {
      throw new UnexpectedVariantError('channels.getChannels', 'channel without access hash');
    }
    return { channelId, accessHash: channel.accessHash.toString() };
  }

  /**
   * Empty messages (deleted parts) are left out; the caller detects the gap.
   */
  static documents(result: Api.messages.TypeMessages): RemoteDocument[] {
    if (result instanceof Api.messages.MessagesNotModified) {
      throw new UnexpectedVariantError('channels.getMessages', result.className);
    }

    const documents: RemoteDocument[] = [];
    for (const message of result.messages) {
      if (message instanceof Api.MessageEmpty) {
        continue;
      }
      if (!(message instanceof Api.Message)) {
        throw new UnexpectedVariantError('message', message.className);
      }
      documents.push(TelegramResponseDecoder.document(message));
    }
    return documents;
  }

  private static document(message: Api.Message): RemoteDocument {
    const media = message.media;
    if (!(media instanceof Api.MessageMediaDocument)) {
      throw new UnexpectedVariantError(`media of message ${message.id}`, media ? media.className : 'none');
    }
    const document = media.document;
    if (!(document instanceof Api.Document)) {
      throw new UnexpectedVariantError(`document of message ${message.id}`, document ? document.className : 'none');
    }
    return {
      messageId: message.id,
      size: document.size.toJSNumber(),
      location: {
        documentId: document.id.toString(),
        accessHash: document.accessHash.toString(),
        fileReference: document.fileReference
      }
    };
  }
}
