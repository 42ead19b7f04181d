/**
 * HTTP status codes used in streaming
 */
export const HTTP_STATUS = {
  OK: 200,
  PARTIAL_CONTENT: 206,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  INTERNAL_SERVER_ERROR: 500,
  BAD_GATEWAY: 502
} as const;

/**
 * HTTP headers used in streaming responses
 */
export const HTTP_HEADERS = {
  ACCEPT_RANGES: 'bytes',
  DEFAULT_CONTENT_TYPE: 'application/octet-stream'
} as const;
