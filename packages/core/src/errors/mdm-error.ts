/**
 * Error type raised by the MDM request pipeline.
 * The code maps onto the wire-level error envelope returned by tools.
 */

export type ErrorCodeKey =
  | 'VALIDATION_ERROR'
  | 'AUTHENTICATION_ERROR'
  | 'AUTHORIZATION_ERROR'
  | 'SECURITY_ERROR'
  | 'RESOURCE_NOT_FOUND'
  | 'INVALID_REQUEST'
  | 'TIMEOUT_ERROR'
  | 'CONFLICT_ERROR'
  | 'RATE_LIMIT_ERROR'
  | 'SERVER_ERROR'
  | 'API_REQUEST_ERROR'
  | 'INTERNAL_SERVER_ERROR'
  | 'SERVICE_UNAVAILABLE';

export interface MdmErrorDetails {
  /** Error code for programmatic handling */
  code: ErrorCodeKey;
  /** Human-readable message */
  message: string;
  /** HTTP status returned by the remote API, when there was a response */
  status?: number;
  /** Raw response body text */
  body?: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context, logged but never returned to callers */
  context?: Record<string, unknown>;
}

export class MdmError extends Error {
  readonly code: ErrorCodeKey;
  readonly status?: number;
  readonly body?: string;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: MdmErrorDetails) {
    super(details.message);
    this.name = 'MdmError';
    this.code = details.code;
    this.status = details.status;
    this.body = details.body;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }

    Error.captureStackTrace(this, MdmError);
  }
}

/**
 * Helper to wrap unknown errors as MdmError
 */
export function wrapError(error: unknown, defaultCode: ErrorCodeKey = 'SERVER_ERROR'): MdmError {
  if (error instanceof MdmError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new MdmError({
    code: defaultCode,
    message,
    cause,
  });
}
