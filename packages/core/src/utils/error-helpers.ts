/**
 * Error handling utilities
 */

import { isDroverError } from '../errors.js';

/**
 * Format an error for logging or display
 * @returns A formatted error string
 */
export function formatError(error: unknown): string {
  if (isDroverError(error)) {
    return `[${error.code}] ${error.message}`;
  }

  if (error instanceof Error) {
    return `[${error.name}] ${error.message}`;
  }

  if (typeof error === 'string') {
    return error;
  }

  return String(error);
}
