/**
 * Read-only port to the metadata store
 */

import { FileRecord } from '../entities';

export interface IFileRepository {
  /**
   * Gets a file record by id
   * @returns The record, or null when no file has this id
   */
  findById(id: string): Promise<FileRecord | null>;
}
