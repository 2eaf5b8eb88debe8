import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import '../shared/types';

const REQUEST_ID_HEADER = 'X-Request-Id';
const ACCEPTED_ID = /^[A-Za-z0-9._-]{1,128}$/;

/**
 * Tags each request with an id: the caller's X-Request-Id when it is a short
 * token, otherwise a fresh UUID v4. The id is echoed on the response.
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const supplied = req.get(REQUEST_ID_HEADER);
  const id = supplied !== undefined && ACCEPTED_ID.test(supplied) ? supplied : uuidv4();
  req.id = id;
  res.setHeader(REQUEST_ID_HEADER, id);
  next();
}
