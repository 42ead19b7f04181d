import { Response } from 'express';
import { ILogger } from '../../../domain/interfaces/ILogger';
import { isStreamError } from '../../../domain/errors';
import { HTTP_STATUS } from '../constants/HttpConstants';

/**
 * Handles streaming errors consistently
 */
export class StreamErrorHandler {
  static statusOf(error: unknown): number {
    return isStreamError(error) ? error.statusCode : HTTP_STATUS.INTERNAL_SERVER_ERROR;
  }

  /**
   * Sends a JSON error while headers are unsent; afterwards the response is
   * destroyed so the client sees the body end early.
   */
  static handle(error: unknown, res: Response, logger: ILogger, context: string): void {
    const status = this.statusOf(error);
    const message = error instanceof Error ? error.message : String(error);

    if (status >= HTTP_STATUS.INTERNAL_SERVER_ERROR) {
      logger.error(`[${context}] ${message}`, error);
    } else {
      logger.warn(`[${context}] ${message}`);
    }

    if (!res.headersSent) {
      res.status(status).json({ error: message || 'Internal server error' });
      return;
    }
    if (!res.destroyed) {
      res.destroy(error instanceof Error ? error : new Error(message));
    }
  }
}
