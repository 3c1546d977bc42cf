import type { RequestHandler } from 'express';

import { globalUsageQuerySchema, usageIdParamSchema } from './analytics.schema';
import type { AnalyticsService } from './analytics.service';

export const createAnalyticsController = (analyticsService: AnalyticsService) => {
  const getSessionUsage: RequestHandler<{ id: string }> = async (req, res, next) => {
    try {
      const { id } = usageIdParamSchema.parse(req.params);
      res.status(200).json(await analyticsService.getSessionUsage(id));
    } catch (error: unknown) {
      next(error);
    }
  };

  const getTraceBreakdown: RequestHandler<{ id: string }> = async (req, res, next) => {
    try {
      const { id } = usageIdParamSchema.parse(req.params);
      res.status(200).json(await analyticsService.getTraceBreakdown(id));
    } catch (error: unknown) {
      next(error);
    }
  };

  const getGlobalUsage: RequestHandler = async (req, res, next) => {
    try {
      const { days } = globalUsageQuerySchema.parse(req.query);
      res.status(200).json(await analyticsService.getGlobalUsage(days));
    } catch (error: unknown) {
      next(error);
    }
  };

  return { getSessionUsage, getTraceBreakdown, getGlobalUsage };
};
