import { Router } from 'express';

import type { AgentEngine } from '../../core/engine';
import { createHealthController } from './health.controller';

export const createHealthRoutes = (engine: AgentEngine): Router => {
  const { healthCheck } = createHealthController(engine);
  const router = Router();

  router.get('/', healthCheck);

  return router;
};
