/**
 * Stream service interface
 * Serves byte windows of a stored file over HTTP
 */

import { Request, Response } from 'express';
import { FileRecord } from '../entities';
import { ClientIdentity } from './IClientPool';

export interface IStreamService {
  /**
   * Streams the file, honouring an optional single Range header.
   * Resolves once the response has finished or been torn down.
   */
  streamFile(req: Request, res: Response, file: FileRecord, identity?: ClientIdentity): Promise<void>;
}
