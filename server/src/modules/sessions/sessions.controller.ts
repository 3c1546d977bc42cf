import type { RequestHandler } from 'express';

import type { CreateSessionBody } from './sessions.schema';
import { createSessionSchema, sessionIdParamSchema } from './sessions.schema';
import type { SessionsService } from './sessions.service';

export const createSessionsController = (sessionsService: SessionsService) => {
  const createSession: RequestHandler<never, unknown, CreateSessionBody> = async (
    req,
    res,
    next,
  ) => {
    try {
      const payload = createSessionSchema.parse(req.body ?? {});
      const response = await sessionsService.createSession(payload);
      res.status(201).json(response);
    } catch (error: unknown) {
      next(error);
    }
  };

  const getSession: RequestHandler<{ id: string }> = async (req, res, next) => {
    try {
      const { id } = sessionIdParamSchema.parse(req.params);
      const response = await sessionsService.getSession(id);
      res.status(200).json(response);
    } catch (error: unknown) {
      next(error);
    }
  };

  const getSessionTraces: RequestHandler<{ id: string }> = async (req, res, next) => {
    try {
      const { id } = sessionIdParamSchema.parse(req.params);
      const response = await sessionsService.getSessionTraces(id);
      res.status(200).json(response);
    } catch (error: unknown) {
      next(error);
    }
  };

  return { createSession, getSession, getSessionTraces };
};
