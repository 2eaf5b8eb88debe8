import { Request, Response, NextFunction } from 'express';
import { successResponse } from '../../shared/envelope';
import type { IToolRegistry } from './tool-registry';

export function createToolController(registry: IToolRegistry) {
  return {
    list(_req: Request, res: Response): void {
      res.status(200).json(successResponse(registry.listTools()));
    },

    async invoke(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const result = await registry.invoke(req.params.name, req.body ?? {});
        res.status(200).json(successResponse(result));
      } catch (err) {
        next(err);
      }
    },
  };
}
