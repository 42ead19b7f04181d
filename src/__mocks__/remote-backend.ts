/**
 * In-process stand-ins for the remote chunk backend and the metadata store
 */

import { setTimeout as sleep } from 'timers/promises';
import { ChannelHandle, DocumentLocation, FileRecord } from '../domain/entities';
import { UpstreamError } from '../domain/errors';
import {
    ClientCredentials,
    IFileRepository,
    IRemoteChunkClient,
    IRemoteClientFactory,
    ILogger,
    RemoteDocument
} from '../domain/interfaces';

export interface FetchCall {
    documentId: string;
    offset: number;
    limit: number;
}

/**
 * Documents hosted by the fake backend, keyed by message id
 */
export class MockRemoteStorage {
    readonly documents = new Map<number, Buffer>();
    private nextMessageId = 100;

    /**
     * Stores `content` as consecutive documents of `partSize` bytes
     * and returns the record describing them.
     */
    addFile(id: string, content: Buffer, partSize: number, name = `${id}.bin`, mimeType = 'application/octet-stream'): FileRecord {
        const parts: Array<{ id: number }> = [];
        for (let offset = 0; offset < content.length; offset += partSize) {
            const messageId = this.nextMessageId++;
            this.documents.set(messageId, Buffer.from(content.subarray(offset, offset + partSize)));
            parts.push({ id: messageId });
        }
        return { id, name, mimeType, size: content.length, channelId: '777', parts };
    }
}

/**
 * Chunk client over MockRemoteStorage that records every call
 */
export class MockChunkClient implements IRemoteChunkClient {
    readonly fetchCalls: FetchCall[] = [];
    resolveChannelCalls = 0;
    resolveDocumentsCalls = 0;
    failFetchAt: number | null = null;
    disconnected = false;
    // Milliseconds every fetch waits before answering
    fetchDelay = 0;

    constructor(
        readonly id: string,
        private readonly storage: MockRemoteStorage
    ) { }

    async fetchChunk(location: DocumentLocation, offset: number, limit: number): Promise<Buffer> {
        this.fetchCalls.push({ documentId: location.documentId, offset, limit });
        if (this.fetchDelay > 0) {
            await sleep(this.fetchDelay);
        }
        if (this.failFetchAt !== null && this.fetchCalls.length >= this.failFetchAt) {
            throw new UpstreamError('chunk fetch failed');
        }
        const content = this.storage.documents.get(Number(location.documentId));
        if (!content) {
            throw new UpstreamError(`unknown document ${location.documentId}`);
        }
        return Buffer.from(content.subarray(offset, offset + limit));
    }

    async resolveChannel(channelId: string): Promise<ChannelHandle> {
        this.resolveChannelCalls++;
        return { channelId, accessHash: '42' };
    }

    async resolveDocuments(_channel: ChannelHandle, messageIds: number[]): Promise<RemoteDocument[]> {
        this.resolveDocumentsCalls++;
        const documents: RemoteDocument[] = [];
        for (const messageId of messageIds) {
            const content = this.storage.documents.get(messageId);
            if (content) {
                documents.push({
                    messageId,
                    size: content.length,
                    location: { documentId: String(messageId), accessHash: '1', fileReference: Buffer.from([1]) }
                });
            }
        }
        return documents.reverse();
    }

    async disconnect(): Promise<void> {
        this.disconnected = true;
    }
}

export class MockClientFactory implements IRemoteClientFactory {
    readonly created: MockChunkClient[] = [];

    constructor(private readonly storage: MockRemoteStorage) { }

    async create(credentials: ClientCredentials): Promise<MockChunkClient> {
        const id = credentials.kind === 'bot' ? `bot:${credentials.token}` : `user:${credentials.userId}`;
        const client = new MockChunkClient(id, this.storage);
        this.created.push(client);
        return client;
    }
}

export class MockFileRepository implements IFileRepository {
    readonly records = new Map<string, FileRecord>();
    lookups = 0;

    add(record: FileRecord): void {
        this.records.set(record.id, record);
    }

    async findById(id: string): Promise<FileRecord | null> {
        this.lookups++;
        return this.records.get(id) ?? null;
    }
}

/**
 * Deterministic file content where byte i differs from its neighbours
 */
export function makeContent(length: number): Buffer {
    const content = Buffer.alloc(length);
    for (let i = 0; i < length; i++) {
        content[i] = (i * 7 + 3) % 251;
    }
    return content;
}

/**
 * Lowercase ASCII content following the same pattern, for text bodies
 */
export function makeTextContent(length: number): Buffer {
    const content = Buffer.alloc(length);
    for (let i = 0; i < length; i++) {
        content[i] = 97 + ((i * 7 + 3) % 26);
    }
    return content;
}

export function createSilentLogger(): ILogger {
    const noop = (): void => { };
    return { log: noop, error: noop, warn: noop, info: noop, debug: noop };
}
