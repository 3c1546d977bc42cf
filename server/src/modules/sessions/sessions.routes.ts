import { Router } from 'express';

import { createSessionsController } from './sessions.controller';
import type { SessionsService } from './sessions.service';

export const createSessionsRoutes = (sessionsService: SessionsService): Router => {
  const { createSession, getSession, getSessionTraces } = createSessionsController(sessionsService);
  const router = Router();

  router.post('/', createSession);
  router.get('/:id', getSession);
  router.get('/:id/traces', getSessionTraces);

  return router;
};
