import express from 'express';
import helmet from 'helmet';
import cors from 'cors';
import { requestIdMiddleware } from './middleware/requestId';
import { requestLoggerMiddleware } from './middleware/requestLogger';
import { errorHandler } from './middleware/errorHandler';
import { successResponse, errorResponse } from './shared/envelope';
import type { RecordClient } from './modules/salesforce/record-client';
import { ToolRegistry } from './modules/tools/tool-registry';
import { salesforceTools } from './modules/tools/salesforce.tools';
import { createToolRoutes } from './modules/tools/tools.routes';

export interface AppConfig {
  corsOrigins: string[];
  client: RecordClient;
}

export function createApp(config: AppConfig): express.Express {
  const app = express();
  const registry = new ToolRegistry(config.client, salesforceTools);

  app.disable('x-powered-by');

  // Middleware pipeline (order matters)
  app.use(requestIdMiddleware);
  app.use(requestLoggerMiddleware);
  app.use(helmet());
  // cors: explicit allowlist; requests without an Origin header pass
  app.use(cors({
    origin: (origin, callback) => {
      if (!origin) {
        return callback(null, true);
      }
      if (config.corsOrigins.includes(origin)) {
        return callback(null, origin);
      }
      return callback(null, false);
    },
  }));
  app.use(express.json({ limit: '1mb' }));

  app.get('/api/v1/health', (_req, res) => {
    res.json(successResponse({ status: 'ok' }));
  });

  app.use('/api/v1/tools', createToolRoutes(registry));

  app.use((_req, res) => {
    res.status(404).json(errorResponse('NOT_FOUND', 'The requested resource was not found'));
  });

  // must be last
  app.use(errorHandler);

  return app;
}
