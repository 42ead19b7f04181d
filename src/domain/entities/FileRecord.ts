/**
 * Domain entities for files stored as ordered remote parts
 */

/**
 * Reference to one stored part, as kept in the metadata store.
 * `id` is the remote message id that carries the part's document.
 */
export interface PartRef {
  id: number;
}

/**
 * File metadata as returned by the metadata store
 */
export interface FileRecord {
  id: string;
  name: string;
  mimeType: string;
  size: number;
  channelId: string | null;
  parts: PartRef[];
}

/**
 * Location of a remote document. Values are kept as decimal strings
 * since upstream ids are 64-bit.
 */
export interface DocumentLocation {
  documentId: string;
  accessHash: string;
  fileReference: Buffer;
}

/**
 * A resolved backing part. `localStart`/`localEnd` are inclusive offsets
 * inside the part and are only narrowed on request-scoped copies.
 */
export interface Part {
  location: DocumentLocation;
  size: number;
  localStart: number;
  localEnd: number;
}

/**
 * Resolved handle of the channel that hosts the parts
 */
export interface ChannelHandle {
  channelId: string;
  accessHash: string;
}
