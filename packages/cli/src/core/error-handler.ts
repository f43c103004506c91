/**
 * Error Handler - User-facing error messages
 */

import { handleError as logHandledError } from '@racelab/utils';

/**
 * Format error for user display
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'An unexpected error occurred';
}

/**
 * Log the error and return the message to show the user
 */
export function handleError(error: unknown, context?: Record<string, unknown>): string {
  logHandledError(error, context);
  return formatError(error);
}
