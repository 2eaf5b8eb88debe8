export class AppError extends Error {
  constructor(
    public statusCode: number,
    public code: string,
    message: string
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(400, 'VALIDATION_ERROR', message);
  }
}

/** The refresh exchange failed, or a session stayed invalid after one refresh. */
export class AuthError extends AppError {
  constructor(message: string) {
    super(401, 'AUTH_ERROR', message);
  }
}

/**
 * Raised by the response classifier when a record call reports
 * INVALID_SESSION_ID. RecordClient consumes it; callers never see it.
 */
export class SessionInvalidError extends AppError {
  constructor(message: string) {
    super(401, 'SESSION_INVALID', message);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(404, 'NOT_FOUND', message);
  }
}

export class TransportError extends AppError {
  constructor(message: string) {
    super(502, 'TRANSPORT_ERROR', message);
  }
}

export class RateLimitedError extends AppError {
  constructor(
    message: string,
    public readonly retryAfterSeconds?: number
  ) {
    super(429, 'RATE_LIMITED', message);
  }
}
