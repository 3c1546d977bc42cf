import { Router } from 'express';

import { AnalyticsService } from '../../modules/analytics/analytics.service';
import { createAnalyticsRoutes } from '../../modules/analytics/analytics.routes';
import { ChatService } from '../../modules/chat/chat.service';
import { createChatRoutes } from '../../modules/chat/chat.routes';
import { createHealthRoutes } from '../../modules/health/health.routes';
import { SessionsService } from '../../modules/sessions/sessions.service';
import { createSessionsRoutes } from '../../modules/sessions/sessions.routes';
import { TracesService } from '../../modules/traces/traces.service';
import { createTracesRoutes } from '../../modules/traces/traces.routes';
import type { AgentEngine } from '../engine';
import { apiKeyMiddleware } from '../shared/middlewares/api-key';

export interface ApiRoutesOptions {
  apiKey?: string;
}

export const createApiRoutes = (engine: AgentEngine, options: ApiRoutesOptions = {}): Router => {
  const sessionsService = new SessionsService(engine);
  const router = Router();

  router.use('/health', createHealthRoutes(engine));

  router.use(apiKeyMiddleware(options.apiKey));
  router.use('/sessions', createSessionsRoutes(sessionsService));
  router.use('/chat', createChatRoutes(new ChatService(engine, sessionsService), engine.publisher));
  router.use('/traces', createTracesRoutes(new TracesService(engine)));
  router.use('/analytics', createAnalyticsRoutes(new AnalyticsService(engine)));

  return router;
};
