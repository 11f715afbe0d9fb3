export class AuthError extends Error {
  public code: string;

  constructor(message: string, code = 'AUTH_REJECTED') {
    super(message);
    this.name = 'AuthError';
    this.code = code;
    Error.captureStackTrace(this, AuthError);
  }
}

export class TransientError extends Error {
  public code: string;
  public attempts?: number;
  public originalError?: Error;

  constructor(message: string, code = 'TRANSIENT_FAILURE', originalError?: Error, attempts?: number) {
    super(message);
    this.name = 'TransientError';
    this.code = code;
    this.originalError = originalError;
    this.attempts = attempts;
    Error.captureStackTrace(this, TransientError);
  }
}

export class RateLimitError extends TransientError {
  public retryAfterMs?: number;

  constructor(message: string, retryAfterMs?: number) {
    super(message, 'RATE_LIMITED');
    this.name = 'RateLimitError';
    this.retryAfterMs = retryAfterMs;
    Error.captureStackTrace(this, RateLimitError);
  }
}

export class FatalError extends Error {
  details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = 'FatalError';
    this.details = details;
    Error.captureStackTrace(this, FatalError);
  }
}

export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputError';
  }
}

export class ApiRequestError extends Error {
  constructor(
    message: string,
    public status: number,
    public graphCode?: number
  ) {
    super(message);
    this.name = 'ApiRequestError';
    Error.captureStackTrace(this, ApiRequestError);
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
