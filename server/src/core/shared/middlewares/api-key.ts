import { timingSafeEqual } from 'node:crypto';

import type { RequestHandler } from 'express';

import { AppError } from '../errors/app-error';

export const API_KEY_HEADER = 'x-api-key';

export const matchesApiKey = (provided: string, expected: string): boolean => {
  const left = Buffer.from(provided);
  const right = Buffer.from(expected);
  return left.length === right.length && timingSafeEqual(left, right);
};

/** Requires `x-api-key` on every request when a key is configured; open otherwise. */
export const apiKeyMiddleware = (apiKey: string | undefined): RequestHandler => {
  return (req, _res, next) => {
    if (!apiKey) {
      next();
      return;
    }

    const provided = req.header(API_KEY_HEADER);

    if (!provided || !matchesApiKey(provided, apiKey)) {
      next(new AppError(401, 'Missing or invalid API key.', 'UNAUTHORIZED'));
      return;
    }

    next();
  };
};
