import cors from 'cors';
import express, { type Express } from 'express';

import type { AgentEngine } from './core/engine';
import { createApiRoutes } from './core/routes';
import { errorHandler } from './core/shared/middlewares/error-handler';
import { notFoundHandler } from './core/shared/middlewares/not-found-handler';
import { requestIdMiddleware } from './core/shared/middlewares/request-id';
import { requestLoggerMiddleware } from './core/shared/middlewares/request-logger';

export interface CreateAppOptions {
  corsOrigin: string;
  apiKey?: string;
}

export const createApp = (engine: AgentEngine, options: CreateAppOptions): Express => {
  const app = express();

  app.disable('x-powered-by');
  app.use(requestIdMiddleware);
  app.use(requestLoggerMiddleware);
  app.use(cors({ origin: options.corsOrigin === '*' ? true : options.corsOrigin }));
  app.use(express.json({ limit: '1mb' }));

  app.use('/api', createApiRoutes(engine, { apiKey: options.apiKey }));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
