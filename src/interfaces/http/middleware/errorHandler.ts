/**
 * Global Error Handler Middleware
 * Layer: Interfaces (HTTP)
 *
 * The last middleware in the stack. Express 5 forwards both thrown errors and
 * rejected promises from handlers here.
 *
 *   - AppError marked operational (e.g. ValidationError): logged at "warn",
 *     answered with its own statusCode and message.
 *   - Client errors raised by middleware such as the JSON body parser, which
 *     carry a 4xx `status`: logged at "warn", answered with that status.
 *   - Anything else, including non-operational AppErrors such as
 *     ConfigurationError: logged at "error", answered with a generic 500 that
 *     leaks no internals.
 *
 * Express recognises an error handler by its four parameters.
 */
import { logger } from '@core/logger';
import { AppError } from '@shared/errors/AppError';
import type { NextFunction, Request, Response } from 'express';

function clientErrorStatus(err: Error): number | undefined {
  if (!('status' in err) || typeof err.status !== 'number') return undefined;
  return err.status >= 400 && err.status < 500 ? err.status : undefined;
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof AppError && err.isOperational) {
    logger.warn({ statusCode: err.statusCode, message: err.message }, 'Operational error');
    res.status(err.statusCode).json({
      status: 'error',
      message: err.message,
    });
    return;
  }

  const clientStatus = clientErrorStatus(err);
  if (clientStatus !== undefined) {
    logger.warn({ statusCode: clientStatus, message: err.message }, 'Client error');
    res.status(clientStatus).json({
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
