import { Response } from 'express';
import { FileRecord } from '../../../domain/entities';
import { ByteRange } from '../../../domain/value-objects/ByteRange';
import { HTTP_STATUS, HTTP_HEADERS } from '../constants/HttpConstants';

export interface StreamHead {
  status: number;
  headers: Record<string, string>;
}

/**
 * Builds the status line and headers of a file response
 */
export class RangeResponseBuilder {
  static build(file: FileRecord, range: ByteRange, partial: boolean): StreamHead {
    const headers: Record<string, string> = {
      'Accept-Ranges': HTTP_HEADERS.ACCEPT_RANGES,
      'Content-Type': file.mimeType || HTTP_HEADERS.DEFAULT_CONTENT_TYPE,
      'Content-Length': String(range.size),
      'Content-Disposition': this.contentDisposition(file.name)
    };
    if (partial) {
      headers['Content-Range'] = range.toContentRange(file.size);
    }
    return { status: partial ? HTTP_STATUS.PARTIAL_CONTENT : HTTP_STATUS.OK, headers };
  }

  /**
   * Head for a zero-byte file requested without a Range header
   */
  static empty(file: FileRecord): StreamHead {
    return {
      status: HTTP_STATUS.OK,
      headers: {
        'Accept-Ranges': HTTP_HEADERS.ACCEPT_RANGES,
        'Content-Type': file.mimeType || HTTP_HEADERS.DEFAULT_CONTENT_TYPE,
        'Content-Length': '0',
        'Content-Disposition': this.contentDisposition(file.name)
      }
    };
  }

  static send(res: Response, head: StreamHead): void {
    res.writeHead(head.status, head.headers);
  }

  /**
   * `inline` disposition with an ASCII fallback name and the RFC 5987
   * encoded original
   */
  static contentDisposition(fileName: string): string {
    const fallback = fileName.replace(/[^\x20-\x7e]/g, '_').replace(/["\\]/g, '_');
    const encoded = encodeURIComponent(fileName).replace(/['()*]/g, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`);
    if (fallback === fileName) {
      return `inline; filename="${fileName}"`;
    }
    return `inline; filename="${fallback}"; filename*=UTF-8''${encoded}`;
  }
}
