/**
 * Unit tests for the files row mapping
 */

import { describe, it, expect } from 'vitest';
import { mapFileRow, FileRow } from './PostgresFileRepository';
import { UpstreamError } from '../../domain/errors';

describe('mapFileRow', () => {
    const row: FileRow = {
        id: 'f-1',
        name: 'movie.mkv',
        mime_type: 'video/x-matroska',
        size: '2500',
        channel_id: '1234567890123',
        parts: [{ id: 10 }, { id: 11 }, { id: 12 }]
    };

    it('should map a row with bigint columns returned as strings', () => {
        expect(mapFileRow(row)).toEqual({
            id: 'f-1',
            name: 'movie.mkv',
            mimeType: 'video/x-matroska',
            size: 2500,
            channelId: '1234567890123',
            parts: [{ id: 10 }, { id: 11 }, { id: 12 }]
        });
    });

    it('should default a missing mime type and channel', () => {
        const record = mapFileRow({ ...row, mime_type: null, channel_id: null });

        expect(record.mimeType).toBe('application/octet-stream');
        expect(record.channelId).toBeNull();
    });

    it('should treat a missing parts column as no parts', () => {
        expect(mapFileRow({ ...row, parts: null }).parts).toEqual([]);
    });

    it('should reject malformed parts', () => {
        expect(() => mapFileRow({ ...row, parts: [{ id: 'x' }] })).toThrow(UpstreamError);
    });

    it('should reject a negative size', () => {
        expect(() => mapFileRow({ ...row, size: -1 })).toThrow('invalid size');
    });
});
