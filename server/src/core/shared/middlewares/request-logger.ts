import type { RequestHandler } from 'express';

import { logger, type LogLevel } from '../logger';

const levelFor = (statusCode: number): LogLevel => {
  if (statusCode >= 500) {
    return 'error';
  }

  return statusCode >= 400 ? 'warn' : 'info';
};

export const requestLoggerMiddleware: RequestHandler = (req, res, next) => {
  const start = process.hrtime.bigint();
  const elapsedMs = (): number => Number((Number(process.hrtime.bigint() - start) / 1_000_000).toFixed(2));

  res.on('finish', () => {
    logger[levelFor(res.statusCode)]('http_request', {
      requestId: req.requestId,
      method: req.method,
      path: req.originalUrl,
      statusCode: res.statusCode,
      durationMs: elapsedMs(),
    });
  });

  // Streams end this way when the client leaves first.
  res.on('close', () => {
    if (!res.writableFinished) {
      logger.info('http_request_aborted', {
        requestId: req.requestId,
        method: req.method,
        path: req.originalUrl,
        durationMs: elapsedMs(),
      });
    }
  });

  next();
};
