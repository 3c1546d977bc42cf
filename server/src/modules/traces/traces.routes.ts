import { Router } from 'express';

import { createTracesController } from './traces.controller';
import type { TracesService } from './traces.service';

export const createTracesRoutes = (tracesService: TracesService): Router => {
  const { listTraces, getTrace, replayTrace, cancelTrace } = createTracesController(tracesService);
  const router = Router();

  router.get('/', listTraces);
  router.get('/:id', getTrace);
  router.post('/:id/replay', replayTrace);
  router.post('/:id/cancel', cancelTrace);

  return router;
};
