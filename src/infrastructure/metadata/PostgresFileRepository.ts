import { Pool } from 'pg';
import { FileRecord, PartRef } from '../../domain/entities';
import { UpstreamError } from '../../domain/errors';
import { IFileRepository, ILogger } from '../../domain/interfaces';

/**
 * Row shape of the `files` table columns read here
 */
export type FileRow = {
  id: string;
  name: string;
  mime_type: string | null;
  size: string | number | null;
  channel_id: string | number | null;
  parts: unknown;
};

const SELECT_FILE = `
  SELECT id, name, mime_type, size, channel_id, parts
  FROM files
  WHERE id = $1 AND type = 'file' AND status = 'active'
`;

function isPartRef(value: unknown): value is PartRef {
  return typeof value === 'object' && value !== null && 'id' in value && Number.isInteger(value.id);
}

/**
 * Maps a `files` row to a record. `parts` is a jsonb array of `{ id }`.
 */
export function mapFileRow(row: FileRow): FileRecord {
  const parts = Array.isArray(row.parts) ? row.parts : [];
  if (!parts.every(isPartRef)) {
    throw new UpstreamError(`File ${row.id} has malformed parts`);
  }

  const size = Number(row.size ?? 0);
  if (!Number.isSafeInteger(size) || size < 0) {
    throw new UpstreamError(`File ${row.id} has invalid size ${row.size}`);
  }

  return {
    id: row.id,
    name: row.name,
    mimeType: row.mime_type || 'application/octet-stream',
    size,
    channelId: row.channel_id === null ? null : String(row.channel_id),
    parts: parts.map((part) => ({ id: part.id }))
  };
}

export class PostgresFileRepository implements IFileRepository {
  constructor(
    private readonly pool: Pool,
    private readonly logger: ILogger
  ) { }

  async findById(id: string): Promise<FileRecord | null> {
    let rows: FileRow[];
    try {
      ({ rows } = await this.pool.query<FileRow>(SELECT_FILE, [id]));
    } catch (error) {
      this.logger.error(`[files] Lookup of ${id} failed:`, error);
      throw new UpstreamError(`File lookup failed for ${id}`, { cause: error });
    }
    return rows.length > 0 ? mapFileRow(rows[0]) : null;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
