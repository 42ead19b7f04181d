/**
 * Unit tests for PartResolver
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { PartResolver } from './PartResolver';
import { FileRecord } from '../../domain/entities';
import { UpstreamError, ValidationError } from '../../domain/errors';
import { MockChunkClient, MockRemoteStorage, createSilentLogger, makeContent } from '../../__mocks__/remote-backend';

describe('PartResolver', () => {
    let storage: MockRemoteStorage;
    let client: MockChunkClient;
    let resolver: PartResolver;
    let file: FileRecord;

    beforeEach(() => {
        storage = new MockRemoteStorage();
        client = new MockChunkClient('bot:a', storage);
        resolver = new PartResolver(createSilentLogger(), { ttl: 60_000, maxEntries: 100 }, '555');
        file = storage.addFile('file-1', makeContent(2500), 1000);
    });

    it('should return parts in record order even when upstream reorders them', async () => {
        const parts = await resolver.resolve(file, client);

        expect(parts.map((part) => [part.location.documentId, part.size, part.localStart, part.localEnd])).toEqual([
            ['100', 1000, 0, 999],
            ['101', 1000, 0, 999],
            ['102', 500, 0, 499]
        ]);
    });

    it('should make one upstream lookup for concurrent resolutions', async () => {
        await Promise.all([resolver.resolve(file, client), resolver.resolve(file, client)]);
        await resolver.resolve(file, client);

        expect(client.resolveChannelCalls).toBe(1);
        expect(client.resolveDocumentsCalls).toBe(1);
    });

    it('should keep lookups of different accounts apart', async () => {
        const other = new MockChunkClient('bot:b', storage);

        await resolver.resolve(file, client);
        await resolver.resolve(file, other);

        expect(client.resolveDocumentsCalls).toBe(1);
        expect(other.resolveDocumentsCalls).toBe(1);
        expect(resolver.cacheSize).toBe(4);
    });

    it('should use the default channel when the record has none', async () => {
        const channelIds: string[] = [];
        const original = client.resolveChannel.bind(client);
        client.resolveChannel = async (channelId: string) => {
            channelIds.push(channelId);
            return original(channelId);
        };

        await resolver.resolve({ ...file, channelId: null }, client);

        expect(channelIds).toEqual(['555']);
    });

    it('should fail when a part message is gone', async () => {
        storage.documents.delete(101);

        await expect(resolver.resolve(file, client)).rejects.toThrow('Part 2 of file file-1 (message 101) is missing');
    });

    it('should fail when part sizes disagree with the record', async () => {
        await expect(resolver.resolve({ ...file, size: 2400 }, client)).rejects.toBeInstanceOf(UpstreamError);
    });

    it('should reject a record without parts', async () => {
        await expect(resolver.resolve({ ...file, parts: [] }, client)).rejects.toBeInstanceOf(ValidationError);
    });
});
