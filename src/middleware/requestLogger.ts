import { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { createChildLogger, Logger } from '../config/logger';

declare global {
  namespace Express {
    interface Locals {
      requestId: string;
      requestLogger: Logger;
    }
  }
}

/**
 * Request logging middleware
 *
 * Gives every request an id and a child logger (res.locals.requestLogger)
 * that handlers and the error middleware log through.
 */
export const requestLogger =
  (server: string) =>
  (req: Request, res: Response, next: NextFunction): void => {
    const requestId = req.get('x-request-id') || uuidv4();
    const log = createChildLogger({ requestId, server });

    res.locals.requestId = requestId;
    res.locals.requestLogger = log;
    res.setHeader('x-request-id', requestId);

    log.info({ method: req.method, path: req.path }, 'Incoming request');

    res.on('finish', () => {
      log.debug({ statusCode: res.statusCode }, 'Request completed');
    });

    next();
  };
