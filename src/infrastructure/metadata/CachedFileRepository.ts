import { FileRecord } from '../../domain/entities';
import { NotFoundError } from '../../domain/errors';
import { IFileRepository } from '../../domain/interfaces';
import { SingleFlightCache, SingleFlightCacheOptions } from '../cache/SingleFlightCache';

/**
 * Single-flight cache in front of the metadata store.
 * Unknown ids are not remembered, so a file created later is found.
 */
export class CachedFileRepository implements IFileRepository {
  private readonly cache: SingleFlightCache<FileRecord>;

  constructor(
    private readonly inner: IFileRepository,
    cacheOptions: SingleFlightCacheOptions
  ) {
    this.cache = new SingleFlightCache(cacheOptions);
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  async findById(id: string): Promise<FileRecord | null> {
    try {
      return await this.cache.get(`files:${id}`, async () => {
        const record = await this.inner.findById(id);
        if (!record) {
          throw new NotFoundError(`File ${id} not found`);
        }
        return record;
      });
    } catch (error) {
      if (error instanceof NotFoundError) {
        return null;
      }
      throw error;
    }
  }
}
