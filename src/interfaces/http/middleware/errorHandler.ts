/**
 * Global Error Handler Middleware
 * Layer: Interfaces (HTTP)
 *
 * Express 5 forwards rejected promises from async handlers here, so
 * controllers simply throw.
 *
 *   - Operational AppError (ValidationError 400, FetchFailure 502, ...):
 *     logged at warn, sent with its statusCode and message.
 *   - Anything else, including non-operational AppErrors such as a
 *     ConfigurationError: logged at error, sent as a generic 500.
 *
 * Express only treats a middleware as an error handler when it takes FOUR
 * parameters, hence the unused `_next`.
 */
import { logger } from '@core/logger';
import { AppError, FetchFailure } from '@shared/errors/AppError';
import type { NextFunction, Request, Response } from 'express';

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof AppError && err.isOperational) {
    logger.warn(
      {
        statusCode: err.statusCode,
        message: err.message,
        ...(err instanceof FetchFailure && { url: err.url }),
      },
      'Operational error',
    );
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
