/**
 * Error Handler Middleware
 * Global error handling for Express
 */

import { Request, Response, NextFunction } from 'express';
import { isDBError } from '../db/errors';
import { AppError, BadRequestError, InternalError, NotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * Translate a data-access failure into its transport error.
 * Every DBError kind becomes a 500; only pre-delegation checks produce 400s.
 */
export function toHandlerError(error: unknown): unknown {
  if (isDBError(error)) {
    return new InternalError(error.message, { kind: error.kind });
  }
  return error;
}

/**
 * express.json() rejects unparseable bodies with a SyntaxError carrying status 400
 */
function isMalformedBodyError(err: unknown): boolean {
  return err instanceof SyntaxError && 'status' in err && err.status === 400;
}

export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError(`Route ${req.method} ${req.path}`));
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const error = isMalformedBodyError(err) ? new BadRequestError('Malformed JSON body') : err;

  // Log error
  logger.error('Request error', error, {
    method: req.method,
    path: req.path,
  });

  // Handle known AppError types
  if (error instanceof AppError) {
    res.status(error.statusCode).json({
      error: {
        code: error.code || 'ERROR',
        message: error.message,
        details: error.details,
      },
    });
    return;
  }

  // Handle unknown errors
  res.status(500).json({
    error: {
      code: 'INTERNAL_SERVER_ERROR',
      message: 'An unexpected error occurred',
    },
  });
}
