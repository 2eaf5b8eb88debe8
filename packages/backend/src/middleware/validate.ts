import { Request, Response, NextFunction } from 'express';
import type { ZodError, ZodTypeAny } from 'zod';
import { ValidationError } from '../shared/errors';

export interface ValidationSchemas {
  body?: ZodTypeAny;
  params?: ZodTypeAny;
}

function formatZodErrors(error: ZodError, source: keyof ValidationSchemas): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${source}.${issue.path.join('.')}` : source;
    return `${path}: ${issue.message}`;
  });
}

/**
 * Parses the request body and route params against zod schemas, replacing
 * each with its parsed value. All issues are reported in one ValidationError.
 */
export function validate(schemas: ValidationSchemas) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const errors: string[] = [];

    if (schemas.body) {
      const result = schemas.body.safeParse(req.body);
      if (result.success) {
        req.body = result.data;
      } else {
        errors.push(...formatZodErrors(result.error, 'body'));
      }
    }

    if (schemas.params) {
      const result = schemas.params.safeParse(req.params);
      if (result.success) {
        req.params = result.data;
      } else {
        errors.push(...formatZodErrors(result.error, 'params'));
      }
    }

    if (errors.length > 0) {
      next(new ValidationError(errors.join('; ')));
      return;
    }

    next();
  };
}
