import { NextFunction, Request, Response } from 'express';
import logger from '../config/logger';
import { ERROR_MESSAGES, HTTP_STATUS } from '../config/constants';
import { GatewayError, IngestionError } from '../utils/errors';

const isBodyParseError = (err: Error): boolean =>
  err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';

/**
 * Error handling middleware
 *
 * GatewayErrors map to their own status; anything else is a 500.
 */
export const errorHandler = (err: Error, _req: Request, res: Response, _next: NextFunction): void => {
  const log = res.locals.requestLogger ?? logger;

  if (isBodyParseError(err)) {
    res.status(HTTP_STATUS.BAD_REQUEST).json({ error: ERROR_MESSAGES.INVALID_JSON });
    return;
  }

  if (err instanceof IngestionError) {
    log.error({ error: err.message }, 'Lead ingestion failed');
    res.status(err.statusCode).json({ error: err.message, status: 'failed' });
    return;
  }

  if (err instanceof GatewayError) {
    log.warn({ error: err.message, errorType: err.errorType, statusCode: err.statusCode }, 'Request rejected');
    res.status(err.statusCode).json(err.details === undefined ? { error: err.message } : { error: err.message, details: err.details });
    return;
  }

  log.error({ error: err.message, stack: err.stack }, 'Unhandled error');

  res.status(HTTP_STATUS.INTERNAL_SERVER_ERROR).json({
    error: 'Internal server error',
    message: err.message,
  });
};
