import { Request, Response, NextFunction } from 'express';
import { log } from '../shared/logger';

export function requestLoggerMiddleware(req: Request, res: Response, next: NextFunction): void {
  const start = process.hrtime.bigint();

  res.on('finish', () => {
    log({
      requestId: req.id,
      method: req.method,
      path: req.originalUrl,
      statusCode: res.statusCode,
      responseTime: Number((process.hrtime.bigint() - start) / 1_000_000n),
    });
  });

  next();
}
