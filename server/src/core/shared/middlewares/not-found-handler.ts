import type { RequestHandler } from 'express';

import { AppError } from '../errors/app-error';

/** Unknown routes go through `errorHandler` so every error body has the same shape. */
export const notFoundHandler: RequestHandler = (req, _res, next) => {
  next(new AppError(404, `Route ${req.method} ${req.path} not found.`, 'ROUTE_NOT_FOUND'));
};
