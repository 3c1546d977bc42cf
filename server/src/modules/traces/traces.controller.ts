import type { RequestHandler } from 'express';

import { listTracesQuerySchema, traceIdParamSchema } from './traces.schema';
import type { TracesService } from './traces.service';

export const createTracesController = (tracesService: TracesService) => {
  const listTraces: RequestHandler = async (req, res, next) => {
    try {
      const query = listTracesQuerySchema.parse(req.query);
      const response = await tracesService.listTraces(query);
      res.status(200).json(response);
    } catch (error: unknown) {
      next(error);
    }
  };

  const getTrace: RequestHandler<{ id: string }> = async (req, res, next) => {
    try {
      const { id } = traceIdParamSchema.parse(req.params);
      const response = await tracesService.getTrace(id);
      res.status(200).json(response);
    } catch (error: unknown) {
      next(error);
    }
  };

  const replayTrace: RequestHandler<{ id: string }> = async (req, res, next) => {
    try {
      const { id } = traceIdParamSchema.parse(req.params);
      const response = await tracesService.replayTrace(id);
      res.status(201).json(response);
    } catch (error: unknown) {
      next(error);
    }
  };

  const cancelTrace: RequestHandler<{ id: string }> = async (req, res, next) => {
    try {
      const { id } = traceIdParamSchema.parse(req.params);
      const response = await tracesService.cancelTrace(id);
      res.status(response.cancelled ? 202 : 409).json(response);
    } catch (error: unknown) {
      next(error);
    }
  };

  return { listTraces, getTrace, replayTrace, cancelTrace };
};
