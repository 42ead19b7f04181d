import { Request, Response } from 'express';
import { StreamFileUseCase } from '../../../application/use-cases/StreamFileUseCase';
import { GetFileInfoUseCase } from '../../../application/use-cases/GetFileInfoUseCase';
import { ClientIdentity, ILogger, IStreamService } from '../../../domain/interfaces';
import { StreamErrorHandler } from '../../../infrastructure/streaming/utils';

/**
 * Reads the identity an upstream auth layer left in `res.locals.identity`
 */
export function identityFrom(res: Response): ClientIdentity | undefined {
  const value: unknown = res.locals.identity;
  if (
    typeof value === 'object' && value !== null &&
    'userId' in value && typeof value.userId === 'string' &&
    'session' in value && typeof value.session === 'string'
  ) {
    return { userId: value.userId, session: value.session };
  }
  return undefined;
}

/**
 * Controller for file streaming and descriptor requests
 */
export class FileController {
  constructor(
    private streamFileUseCase: StreamFileUseCase,
    private getFileInfoUseCase: GetFileInfoUseCase,
    private streamService: IStreamService,
    private logger: ILogger
  ) { }

  /**
   * Handles GET|HEAD /files/:fileId/stream[/:fileName]
   */
  async stream(req: Request, res: Response): Promise<void> {
    const result = await this.streamFileUseCase.execute({ fileId: req.params.fileId ?? '' });

    if (!result.success) {
      StreamErrorHandler.handle(result.error, res, this.logger, `file ${req.params.fileId}`);
      return;
    }

    await this.streamService.streamFile(req, res, result.file, identityFrom(res));
  }

  /**
   * Handles GET /files/:fileId
   */
  async getInfo(req: Request, res: Response): Promise<void> {
    try {
      const result = await this.getFileInfoUseCase.execute({ fileId: req.params.fileId ?? '' });

      if (!result.success) {
        StreamErrorHandler.handle(result.error, res, this.logger, `file ${req.params.fileId}`);
        return;
      }

      res.json(result.info);
    } catch (error) {
      StreamErrorHandler.handle(error, res, this.logger, `file ${req.params.fileId}`);
    }
  }
}
