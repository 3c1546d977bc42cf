import type { RequestHandler } from 'express';

import type { HealthResponse } from '../../core/@types';
import type { AgentEngine } from '../../core/engine';

export const createHealthController = (engine: AgentEngine) => {
  const healthCheck: RequestHandler = (_req, res) => {
    const response: HealthResponse = {
      ok: true,
      uptime: process.uptime(),
      activeRuns: engine.runs.activeCount,
      tools: engine.tools.getToolNames(),
    };

    res.status(200).json(response);
  };

  return { healthCheck };
};
