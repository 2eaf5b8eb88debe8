import { Router } from 'express';
import { createToolController } from './tools.controller';
import { validate } from '../../middleware/validate';
import { toolParamsSchema } from './tools.schemas';
import type { IToolRegistry } from './tool-registry';

export function createToolRoutes(registry: IToolRegistry): Router {
  const router = Router();
  const controller = createToolController(registry);

  // GET /api/v1/tools
  router.get('/', controller.list);

  // POST /api/v1/tools/:name  (body is the tool input)
  router.post('/:name', validate({ params: toolParamsSchema }), controller.invoke);

  return router;
}
