import { Request, Response, NextFunction } from 'express';
import { AppError, RateLimitedError } from '../shared/errors';
import { errorResponse } from '../shared/envelope';
import { logger } from '../shared/logger';

const isProduction = (): boolean => process.env.NODE_ENV === 'production';

/**
 * Matches messages that carry source locations, stack frames, socket
 * errors or bearer credentials.
 */
function containsInternalDetails(message: string): boolean {
  const internalPatterns = [
    /\/app\/src\//i,
    /\/home\//i,
    /\/usr\//i,
    /\.(ts|js):\d+/,
    /at\s+\S+\s+\(/,
    /node_modules\//,
    /ECONNREFUSED/i,
    /ECONNRESET/i,
    /ENOTFOUND/i,
    /ETIMEDOUT/i,
    /Bearer\s+\S+/i,
  ];
  return internalPatterns.some((pattern) => pattern.test(message));
}

/** express.json() rejects unparseable bodies with a SyntaxError tagged by body-parser. */
function isMalformedBody(err: Error): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof AppError) {
    logger.error('AppError', {
      code: err.code,
      statusCode: err.statusCode,
      message: err.message,
      stack: err.stack,
    });

    const retryAfter = err instanceof RateLimitedError ? err.retryAfterSeconds : undefined;
    if (retryAfter !== undefined) {
      res.setHeader('Retry-After', String(retryAfter));
    }

    const message =
      isProduction() && containsInternalDetails(err.message) ? 'An error occurred' : err.message;
    res.status(err.statusCode).json(errorResponse(err.code, message, retryAfter));
    return;
  }

  if (isMalformedBody(err)) {
    res.status(400).json(errorResponse('VALIDATION_ERROR', 'Request body is not valid JSON'));
    return;
  }

  logger.error('Unhandled error', {
    error: err.message,
    stack: err.stack,
  });

  res.status(500).json(errorResponse('INTERNAL_ERROR', 'An unexpected error occurred'));
}
