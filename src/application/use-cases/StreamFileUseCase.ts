/**
 * Use case for looking up the file behind a stream request
 */

import { IFileRepository, ILogger } from '../../domain/interfaces';
import { FileRecord } from '../../domain/entities';
import { NotFoundError, StreamError, UpstreamError, ValidationError, isStreamError } from '../../domain/errors';

export interface StreamFileRequest {
  fileId: string;
}

export type StreamFileResponse =
  | { success: true; file: FileRecord }
  | { success: false; error: StreamError };

export class StreamFileUseCase {
  constructor(
    private fileRepository: IFileRepository,
    private logger: ILogger
  ) {}

  async execute(request: StreamFileRequest): Promise<StreamFileResponse> {
    const fileId = request.fileId.trim();
    if (!fileId) {
      return { success: false, error: new ValidationError('File id required') };
    }

    try {
      const file = await this.fileRepository.findById(fileId);
      if (!file) {
        return { success: false, error: new NotFoundError(`File ${fileId} not found`) };
      }

      this.logger.debug(`Streaming file: ${file.name} (${file.size} bytes, ${file.parts.length} parts)`);
      return { success: true, file };
    } catch (error) {
      this.logger.error('Error in StreamFileUseCase:', error);
      return {
        success: false,
        error: isStreamError(error)
          ? error
          : new UpstreamError(error instanceof Error ? error.message : 'Unknown error', { cause: error })
      };
    }
  }
}
