/**
 * Ports to the remote chunk backend
 */

import { ChannelHandle, DocumentLocation } from '../entities';

/**
 * Document metadata of one stored part
 */
export interface RemoteDocument {
  messageId: number;
  location: DocumentLocation;
  size: number;
}

export interface IRemoteChunkClient {
  /**
   * Stable identifier of the account behind this client, used in cache keys
   */
  readonly id: string;

  /**
   * Fetches up to `limit` bytes of a document starting at `offset`.
   * A short or empty result means the document ends before `offset + limit`.
   */
  fetchChunk(location: DocumentLocation, offset: number, limit: number): Promise<Buffer>;

  resolveChannel(channelId: string): Promise<ChannelHandle>;

  /**
   * Resolves message ids to the documents they carry.
   * Order of the result is not guaranteed; missing messages are left out.
   */
  resolveDocuments(channel: ChannelHandle, messageIds: number[]): Promise<RemoteDocument[]>;

  disconnect(): Promise<void>;
}

/**
 * Credentials a client is created from
 */
export type ClientCredentials =
  | { kind: 'bot'; token: string }
  | { kind: 'user'; userId: string; session: string };

export interface IRemoteClientFactory {
  create(credentials: ClientCredentials): Promise<IRemoteChunkClient>;
}
