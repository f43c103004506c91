/**
 * Error Handler
 * =============
 * Logs a failure at the level its kind deserves.
 */

import { AppError } from './errors.js';
import { logger } from './logger.js';

/**
 * Log an error: operational AppErrors as warnings, everything else as errors
 */
export function handleError(error: unknown, context?: Record<string, unknown>): void {
  const err = error instanceof Error ? error : new Error(String(error));

  if (!(err instanceof AppError)) {
    logger.error('Unknown error occurred', err, context);
    return;
  }
  if (err.isOperational) {
    logger.warn('Operational error occurred', {
      ...err.context,
      ...context,
      error: { name: err.name, message: err.message, code: err.code, statusCode: err.statusCode },
    });
    return;
  }
  logger.error('Application error occurred', err, { ...err.context, ...context });
}
