import { NextFunction, Request, Response } from 'express';
import { ERROR_MESSAGES, HTTP_STATUS } from '../config/constants';
import { AuthenticationError } from '../utils/errors';

const BEARER_PREFIX = 'Bearer ';

/**
 * Bearer API key check for the tool API. With no key configured every
 * request passes (local development).
 */
export const apiKeyAuth =
  (apiKey: string | undefined) =>
  (req: Request, _res: Response, next: NextFunction): void => {
    if (!apiKey) {
      next();
      return;
    }

    const header = req.get('authorization') ?? '';
    if (!header.startsWith(BEARER_PREFIX)) {
      next(new AuthenticationError(ERROR_MESSAGES.MISSING_AUTH_HEADER, HTTP_STATUS.UNAUTHORIZED));
      return;
    }

    if (header.slice(BEARER_PREFIX.length) !== apiKey) {
      next(new AuthenticationError(ERROR_MESSAGES.INVALID_API_KEY));
      return;
    }

    next();
  };
