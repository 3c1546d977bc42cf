import type { Server } from 'node:http';

import { createApp } from './app';
import { env } from './config/env';
import { createContainer } from './container';
import { attachTraceWebSocketGateway } from './core/realtime/websocketGateway';
import { errorMessageOf, logger, setLogLevel } from './core/shared/logger';

const bootstrap = async (): Promise<void> => {
  setLogLevel(env.LOG_LEVEL);

  const container = await createContainer();
  const { engine } = container;

  const swept = await engine.recorder.sweepInterruptedRuns();
  if (swept > 0) {
    logger.warn('interrupted_runs_swept', { count: swept });
  }

  const app = createApp(engine, { corsOrigin: env.CORS_ORIGIN, apiKey: env.API_KEY });

  const server: Server = app.listen(env.PORT, () => {
    logger.info('server_started', {
      port: env.PORT,
      nodeEnv: env.NODE_ENV,
      traceStore: env.TRACE_STORE,
      model: engine.settings.model,
      provider: engine.settings.provider,
    });
  });

  const webSocketGateway = attachTraceWebSocketGateway(server, {
    bus: engine.bus,
    corsOrigin: env.CORS_ORIGIN,
    cancelRun: (traceId) => engine.runs.cancel(traceId),
    apiKey: env.API_KEY,
  });

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info('shutdown_signal_received', { signal });

    // Closing the socket.io server also closes the HTTP server it is attached to.
    void webSocketGateway
      .close()
      .then(() => container.close())
      .then(() => {
        logger.info('shutdown_complete', { signal });
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error('shutdown_failed', {
          signal,
          error: errorMessageOf(error),
        });
        process.exit(1);
      });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
};

void bootstrap().catch((error: unknown) => {
  logger.error('bootstrap_failed', {
    error: errorMessageOf(error),
  });
  process.exit(1);
});
