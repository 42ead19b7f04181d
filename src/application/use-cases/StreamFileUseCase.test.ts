/**
 * Unit tests for StreamFileUseCase
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { StreamFileUseCase } from './StreamFileUseCase';
import { IFileRepository, ILogger } from '../../domain/interfaces';
import { FileRecord } from '../../domain/entities';
import { NotFoundError, UpstreamError, ValidationError } from '../../domain/errors';

describe('StreamFileUseCase', () => {
    let useCase: StreamFileUseCase;
    let mockFileRepository: IFileRepository;
    let mockLogger: ILogger;

    const record: FileRecord = {
        id: 'f-1',
        name: 'movie.mp4',
        mimeType: 'video/mp4',
        size: 2500,
        channelId: '777',
        parts: [{ id: 1 }, { id: 2 }, { id: 3 }]
    };

    beforeEach(() => {
        mockFileRepository = {
            findById: vi.fn()
        };

        mockLogger = {
            log: vi.fn(),
            error: vi.fn(),
            warn: vi.fn(),
            info: vi.fn(),
            debug: vi.fn()
        };

        useCase = new StreamFileUseCase(mockFileRepository, mockLogger);
    });

    it('should return a validation error for a blank id', async () => {
        const result = await useCase.execute({ fileId: '  ' });

        expect(result.success).toBe(false);
        if (!result.success) {
            expect(result.error).toBeInstanceOf(ValidationError);
        }
        expect(mockFileRepository.findById).not.toHaveBeenCalled();
    });

    it('should return not found for an unknown id', async () => {
        vi.mocked(mockFileRepository.findById).mockResolvedValue(null);

        const result = await useCase.execute({ fileId: 'nope' });

        expect(result.success).toBe(false);
        if (!result.success) {
            expect(result.error).toBeInstanceOf(NotFoundError);
            expect(result.error.statusCode).toBe(404);
        }
    });

    it('should return the file when it exists', async () => {
        vi.mocked(mockFileRepository.findById).mockResolvedValue(record);

        const result = await useCase.execute({ fileId: 'f-1' });

        expect(result).toEqual({ success: true, file: record });
        expect(mockFileRepository.findById).toHaveBeenCalledWith('f-1');
    });

    it('should wrap unexpected repository errors as upstream errors', async () => {
        vi.mocked(mockFileRepository.findById).mockRejectedValue(new Error('connection refused'));

        const result = await useCase.execute({ fileId: 'f-1' });

        expect(result.success).toBe(false);
        if (!result.success) {
            expect(result.error).toBeInstanceOf(UpstreamError);
            expect(result.error.message).toBe('connection refused');
        }
        expect(mockLogger.error).toHaveBeenCalled();
    });
});
