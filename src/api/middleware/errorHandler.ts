/**
 * Central error middleware. Route handlers and guards pass failures to
 * `next(err)`; this turns them into `{ error, code }` JSON responses.
 *
 * - AppError subclasses carry their own status and code.
 * - 401 responses advertise the Bearer scheme.
 * - Unexpected errors become an opaque 500; the detail only goes to the log.
 */

import { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import { ZodError } from 'zod';
import { AppError, NotFoundError } from '../../shared/errors';
import { logger } from '../../shared/logger';

function isBodyParserSyntaxError(error: unknown): boolean {
  return error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed';
}

function send(res: Response, status: number, code: string, message: string): void {
  if (status === 401) {
    res.setHeader('WWW-Authenticate', 'Bearer');
  }
  res.status(status).json({ error: message, code });
}

export const errorHandler: ErrorRequestHandler = (
  error: unknown,
  req: Request,
  res: Response,
  next: NextFunction
) => {
  if (res.headersSent) {
    next(error);
    return;
  }

  const meta = { method: req.method, path: req.originalUrl };

  if (error instanceof ZodError) {
    const firstIssue = error.issues[0];
    const message = firstIssue ? `Validation error: ${firstIssue.message}` : 'Validation error';
    logger.warn('API error', { ...meta, status: 400, code: 'VALIDATION_ERROR', error: message });
    send(res, 400, 'VALIDATION_ERROR', message);
    return;
  }

  if (isBodyParserSyntaxError(error)) {
    logger.warn('API error', { ...meta, status: 400, code: 'INVALID_JSON' });
    send(res, 400, 'INVALID_JSON', 'Invalid JSON body');
    return;
  }

  if (error instanceof AppError) {
    const logPayload = { ...meta, status: error.statusCode, code: error.code, error: error.message };
    if (error.statusCode >= 500) {
      logger.error('API error', logPayload);
    } else if (error.statusCode === 401 || error.statusCode === 403) {
      logger.info('API error', logPayload);
    } else {
      logger.warn('API error', logPayload);
    }
    // Server faults keep their code but not their message
    const message = error.statusCode >= 500 ? 'Internal server error' : error.message;
    send(res, error.statusCode, error.code, message);
    return;
  }

  logger.error(
    'Unhandled error',
    error instanceof Error
      ? { ...meta, error: error.message, stack: error.stack }
      : { ...meta, error: String(error) }
  );
  send(res, 500, 'INTERNAL_ERROR', 'Internal server error');
};

export const notFoundHandler: RequestHandler = (req, _res, next) => {
  next(new NotFoundError('Route', `${req.method} ${req.path}`));
};
