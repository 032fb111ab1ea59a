export type ErrorCode =
  | 'AUTH'
  | 'NETWORK'
  | 'BAD_REQUEST'
  | 'NOT_FOUND'
  | 'HA_ERROR'
  | 'TIMEOUT';

export class HaMcpError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode?: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      cause?: unknown;
      statusCode?: number;
      details?: Record<string, unknown>;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'HaMcpError';
    this.code = code;
    this.statusCode = options?.statusCode;
    this.details = options?.details;
  }
}

export function ensureError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  if (typeof value === 'string') {
    return new Error(value);
  }
  try {
    return new Error(JSON.stringify(value));
  } catch {
    return new Error(String(value));
  }
}

export function errorMessage(value: unknown): string {
  return ensureError(value).message;
}
