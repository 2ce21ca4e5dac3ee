export type ErrorCode =
  | 'INVALID_PARAMS'
  | 'EMPTY_LAYOUT'
  | 'INTERNAL_ERROR';

export class McpError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public data?: unknown
  ) {
    super(message);
    this.name = 'McpError';
  }

  /** Wire shape of a tool error: `{ code, message, data? }`. */
  toJSON(): { code: ErrorCode; message: string; data?: unknown } {
    return {
      code: this.code,
      message: this.message,
      ...(this.data !== undefined ? { data: this.data } : {}),
    };
  }
}

export function invalidParams(message: string, data?: unknown): McpError {
  return new McpError('INVALID_PARAMS', message, data);
}

/** Raised only when a caller asks for at least one column and the copybook yields none. */
export function emptyLayout(message: string, data?: unknown): McpError {
  return new McpError('EMPTY_LAYOUT', message, data);
}
