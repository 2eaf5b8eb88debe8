import {
  AppError,
  NotFoundError,
  RateLimitedError,
  SessionInvalidError,
  TransportError,
  ValidationError,
} from '../../shared/errors';
import type { HttpResponse } from './http-transport';
import { apiErrorListSchema, type ApiError } from './salesforce.schemas';

export const INVALID_SESSION_CODE = 'INVALID_SESSION_ID';

const NOT_FOUND_CODES = new Set(['NOT_FOUND', 'ENTITY_IS_DELETED']);
const RATE_LIMIT_CODES = new Set(['REQUEST_LIMIT_EXCEEDED']);

/**
 * Reads a Salesforce error body, `[{ message, errorCode, fields? }, ...]`.
 * Anything else yields an empty list.
 */
export function parseApiErrors(body: string): ApiError[] {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return [];
  }
  const result = apiErrorListSchema.safeParse(json);
  return result.success ? result.data : [];
}

/** True when the body carries INVALID_SESSION_ID, whatever the status. */
export function isInvalidSession(response: HttpResponse): boolean {
  return parseApiErrors(response.body).some((e) => e.errorCode === INVALID_SESSION_CODE);
}

/** Seconds from a numeric Retry-After header; HTTP-date values are ignored. */
export function parseRetryAfter(headers: Record<string, string>): number | undefined {
  const raw = headers['retry-after'];
  if (raw === undefined || !/^\d+$/.test(raw.trim())) return undefined;
  return parseInt(raw.trim(), 10);
}

function describe(errors: ApiError[]): string {
  return errors
    .map((e) => (e.message ? `${e.errorCode}: ${e.message}` : e.errorCode))
    .join('; ');
}

/**
 * Maps a non-success record response onto the error taxonomy.
 * Error codes take precedence over the HTTP status, so an INVALID_SESSION_ID
 * body is a session signal and a NOT_FOUND body is a miss at any status.
 *
 * @param target - what was being operated on, e.g. `Contact 003...`; used
 *   in messages when the remote sent none
 */
export function classifyFailure(response: HttpResponse, target: string): AppError {
  const { status } = response;
  const errors = parseApiErrors(response.body);
  const codes = errors.map((e) => e.errorCode);

  if (codes.includes(INVALID_SESSION_CODE)) {
    return new SessionInvalidError(`${target}: ${describe(errors)}`);
  }

  if (status === 429 || codes.some((c) => RATE_LIMIT_CODES.has(c))) {
    const detail = errors.length > 0 ? describe(errors) : `rate limited with status ${status}`;
    return new RateLimitedError(`${target}: ${detail}`, parseRetryAfter(response.headers));
  }

  if (codes.some((c) => NOT_FOUND_CODES.has(c))) {
    return new NotFoundError(`${target}: ${describe(errors)}`);
  }

  if (status >= 500) {
    return new TransportError(`${target} failed with status ${status}`);
  }

  // Refused access to the object or field, not a malformed payload.
  if (status === 401 || status === 403) {
    const detail = errors.length > 0 ? `: ${describe(errors)}` : '';
    return new ValidationError(`${target}: access denied by Salesforce (status ${status})${detail}`);
  }

  if (status >= 400 && errors.length > 0) {
    return new ValidationError(`${target}: ${describe(errors)}`);
  }

  if (status === 404) {
    return new NotFoundError(`${target} not found`);
  }

  if (status >= 400) {
    return new ValidationError(`${target} rejected with status ${status}`);
  }

  return new TransportError(`${target}: unexpected status ${status}`);
}
