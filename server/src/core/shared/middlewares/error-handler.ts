import type { ErrorRequestHandler, Response } from 'express';
import { ZodError } from 'zod';

import type { AgentErrorKind } from '../../@types';
import { AgentRunError } from '../errors/agent-errors';
import { AppError } from '../errors/app-error';
import { errorMessageOf, logger } from '../logger';

interface ErrorBody {
  message: string;
  code?: string;
  details?: unknown;
}

const AGENT_ERROR_STATUS: Partial<Record<AgentErrorKind, number>> = {
  ProviderError: 502,
  PersistenceError: 503,
  Cancelled: 409,
  Timeout: 504,
};

const isMalformedJson = (error: unknown): boolean => {
  return error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed';
};

const send = (res: Response, statusCode: number, requestId: string, error: ErrorBody): void => {
  res.status(statusCode).json({ requestId, error });
};

export const errorHandler: ErrorRequestHandler = (error, req, res, next) => {
  // Streaming responses have already committed a status; Express closes the socket.
  if (res.headersSent) {
    logger.warn('error_after_headers_sent', {
      requestId: req.requestId,
      error: errorMessageOf(error),
    });
    next(error);
    return;
  }

  if (error instanceof ZodError) {
    send(res, 400, req.requestId, {
      message: 'Validation failed.',
      code: 'VALIDATION_ERROR',
      details: error.flatten(),
    });
    return;
  }

  if (isMalformedJson(error)) {
    send(res, 400, req.requestId, { message: 'Request body is not valid JSON.', code: 'INVALID_JSON' });
    return;
  }

  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      logger.error('request_failed', { requestId: req.requestId, code: error.code, error: error.message });
    }

    send(res, error.statusCode, req.requestId, {
      message: error.message,
      code: error.code,
      details: error.details,
    });
    return;
  }

  if (error instanceof AgentRunError) {
    const statusCode = AGENT_ERROR_STATUS[error.kind] ?? 500;
    logger.error('agent_request_failed', {
      requestId: req.requestId,
      errorKind: error.kind,
      error: error.message,
    });

    send(res, statusCode, req.requestId, { message: error.message, code: error.kind });
    return;
  }

  logger.error('unhandled_error', {
    requestId: req.requestId,
    errorName: error instanceof Error ? error.name : 'UnknownError',
    errorMessage: errorMessageOf(error),
  });

  send(res, 500, req.requestId, { message: 'Internal server error.', code: 'INTERNAL_SERVER_ERROR' });
};
