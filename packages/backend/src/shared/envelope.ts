export interface ApiErrorBody {
  code: string;
  message: string;
  /** Seconds Salesforce asked callers to wait; only on RATE_LIMITED. */
  retryAfterSeconds?: number;
}

export interface ApiSuccess<T> {
  success: true;
  data: T;
  error: null;
}

export interface ApiFailure {
  success: false;
  data: null;
  error: ApiErrorBody;
}

export function successResponse<T>(data: T): ApiSuccess<T> {
  return {
    success: true,
    data,
    error: null,
  };
}

export function errorResponse(code: string, message: string, retryAfterSeconds?: number): ApiFailure {
  const error: ApiErrorBody = { code, message };
  if (retryAfterSeconds !== undefined) error.retryAfterSeconds = retryAfterSeconds;
  return {
    success: false,
    data: null,
    error,
  };
}
