// src/utils/errors.ts

export class SyncError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

// Reconciliation errors
export class RemoteUnavailableError extends SyncError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 'REMOTE_UNAVAILABLE', details);
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class UnsupportedItemKindError extends SyncError {
  constructor(
    public kind: string,
    details?: Record<string, unknown>
  ) {
    super(`Unsupported saved item kind: ${kind}`, 'UNSUPPORTED_ITEM_KIND', { ...details, kind });
  }
}

export class InvalidBulkRequestError extends SyncError {
  constructor(message: string = 'Bulk request requires at least one item', details?: Record<string, unknown>) {
    super(message, 'INVALID_BULK_REQUEST', details);
  }
}

// Auth errors
export class AuthError extends SyncError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'AUTH_ERROR', details);
  }
}

export class CredentialsNotFoundError extends AuthError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'CREDENTIALS_NOT_FOUND';
  }
}

// API errors
export class ApiError extends SyncError {
  constructor(
    message: string,
    public status: number,
    details?: Record<string, unknown>
  ) {
    super(message, 'API_ERROR', { ...details, status });
  }
}

export class ApiClientError extends ApiError {
  constructor(message: string, status: number = 400, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_CLIENT_ERROR';
  }
}

export class ApiServerError extends ApiError {
  constructor(message: string, status: number = 500, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_SERVER_ERROR';
  }
}

export class RateLimitError extends ApiError {
  constructor(
    message: string = 'Rate limit exceeded',
    public retryAfter?: number,
    details?: Record<string, unknown>
  ) {
    super(message, 429, { ...details, retryAfter });
    this.code = 'RATE_LIMIT_EXCEEDED';
  }
}

// Network errors
export class NetworkError extends SyncError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', details);
  }
}

export class NetworkTimeoutError extends NetworkError {
  constructor(message: string = 'Request timeout', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'NETWORK_TIMEOUT';
  }
}

export class CircuitBreakerOpenError extends NetworkError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'CIRCUIT_BREAKER_OPEN';
  }
}

/**
 * Wrap anything a session raised so callers only see RemoteUnavailableError.
 * Errors that already are RemoteUnavailableError pass through untouched.
 */
export function toRemoteUnavailable(
  error: unknown,
  details?: Record<string, unknown>
): RemoteUnavailableError {
  if (error instanceof RemoteUnavailableError) return error;

  const message = error instanceof Error ? error.message : String(error);
  const upstreamCode = error instanceof SyncError ? error.code : undefined;
  return new RemoteUnavailableError(
    message,
    { ...details, ...(upstreamCode ? { upstreamCode } : {}) },
    { cause: error }
  );
}
