export type ErrorCode =
  | 'MISSING_CREDENTIAL'
  | 'AUTHENTICATION_FAILED'
  | 'ENDPOINT_UNREACHABLE'
  | 'REGION_NOT_FOUND'
  | 'ENDPOINT_NOT_FOUND'
  | 'RESOURCE_NOT_SUPPORTED'
  | 'UNAUTHORIZED'
  | 'TRANSIENT_REQUEST_ERROR'
  | 'REQUEST_ERROR'
  | 'CONFIG_ERROR';

export class ComputeClientError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: unknown;

  constructor(code: ErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'ComputeClientError';
    this.code = code;
    this.details = details;
  }

  /** True for failures a caller may retry as-is. */
  get transient(): boolean {
    return this.code === 'TRANSIENT_REQUEST_ERROR';
  }
}

export function asErrorResponse(error: unknown): {
  code: ErrorCode;
  message: string;
  details?: unknown;
} {
  if (error instanceof ComputeClientError) {
    return {
      code: error.code,
      message: error.message,
      details: error.details,
    };
  }

  if (error instanceof Error) {
    return {
      code: 'REQUEST_ERROR',
      message: error.message,
    };
  }

  return {
    code: 'REQUEST_ERROR',
    message: 'Unknown error',
    details: error,
  };
}

export function describeCause(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
