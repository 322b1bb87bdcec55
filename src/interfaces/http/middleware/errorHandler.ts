/**
 * Global Error Handler Middleware
 * Layer: Interfaces (HTTP)
 *
 * Last in the chain. Express 5 forwards rejected promises from async handlers
 * here, so handlers just throw.
 *
 *   - Operational AppError (400, 404, 503): logged at warn, the client gets
 *     the error's statusCode and message.
 *   - Anything else, including QueryExecutionError: logged at error, the
 *     client gets a generic 500 with no internals.
 *
 * Express recognises an error handler by its four parameters.
 */
import { logger } from '@core/logger';
import { AppError } from '@shared/errors/AppError';
import type { NextFunction, Request, Response } from 'express';

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof AppError && err.isOperational) {
    logger.warn({ statusCode: err.statusCode, message: err.message }, 'Operational error');
    res.status(err.statusCode).json({
      status: 'error',
      message: err.message,
    });
    return;
  }

  logger.error({ err }, 'Unhandled error');
  res.status(500).json({
    status: 'error',
    message: 'Internal server error',
  });
}
