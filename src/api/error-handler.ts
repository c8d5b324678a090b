/**
 * Fallback handlers: 404 for unknown routes and a central error handler that
 * logs the failure and answers with a plain-text 500.
 */

import { NextFunction, Request, Response } from 'express';
import { logger } from '../config/logger';

export function notFoundHandler(req: Request, res: Response) {
  res.status(404).type('text/plain').send('Not Found');
}

export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction) {
  logger.error('Unhandled request error', {
    error: err.message,
    stack: err.stack,
    path: req.path,
    method: req.method,
  });

  res.status(500).type('text/plain').send('Internal Server Error');
}
