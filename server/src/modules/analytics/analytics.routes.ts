import { Router } from 'express';

import { createAnalyticsController } from './analytics.controller';
import type { AnalyticsService } from './analytics.service';

export const createAnalyticsRoutes = (analyticsService: AnalyticsService): Router => {
  const { getSessionUsage, getTraceBreakdown, getGlobalUsage } =
    createAnalyticsController(analyticsService);
  const router = Router();

  router.get('/tokens/session/:id', getSessionUsage);
  router.get('/tokens/trace/:id', getTraceBreakdown);
  router.get('/tokens/global', getGlobalUsage);

  return router;
};
