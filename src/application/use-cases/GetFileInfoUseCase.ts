/**
 * Use case for reading a file's public descriptor
 */

import { IFileRepository } from '../../domain/interfaces';
import { NotFoundError, StreamError, ValidationError } from '../../domain/errors';

export interface GetFileInfoRequest {
  fileId: string;
}

export interface FileInfo {
  id: string;
  name: string;
  mimeType: string;
  size: number;
  partCount: number;
}

export type GetFileInfoResponse =
  | { success: true; info: FileInfo }
  | { success: false; error: StreamError };

export class GetFileInfoUseCase {
  constructor(
    private fileRepository: IFileRepository
  ) {}

  async execute(request: GetFileInfoRequest): Promise<GetFileInfoResponse> {
    if (!request.fileId) {
      return { success: false, error: new ValidationError('File id required') };
    }

    const file = await this.fileRepository.findById(request.fileId);
    if (!file) {
      return { success: false, error: new NotFoundError(`File ${request.fileId} not found`) };
    }

    return {
      success: true,
      info: {
        id: file.id,
        name: file.name,
        mimeType: file.mimeType,
        size: file.size,
        partCount: file.parts.length
      }
    };
  }
}
