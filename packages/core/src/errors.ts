/**
 * Error codes and custom error classes for Drover
 */

/**
 * All error codes used by the session manager
 */
export type ErrorCode =
  // Pool errors
  | 'POOL_EXHAUSTED'
  | 'POOL_CLOSED'

  // Driver errors
  | 'DRIVER_CRASHED'
  | 'DRIVER_TIMEOUT'
  | 'DRIVER_LAUNCH_FAILED'
  | 'ACTION_FAILED'

  // Manager errors
  | 'NOT_READY'

  // Validation errors
  | 'INVALID_TASK'
  | 'CONFIGURATION_ERROR'

  // System errors
  | 'INTERNAL_ERROR';

/**
 * Error code to HTTP status code mapping, for whichever HTTP layer sits in front
 */
export const ERROR_HTTP_STATUS: Record<ErrorCode, number> = {
  // 429 Too Many Requests (retry later)
  POOL_EXHAUSTED: 429,

  // 503 Service Unavailable
  POOL_CLOSED: 503,
  DRIVER_LAUNCH_FAILED: 503,
  NOT_READY: 503,

  // 502 Bad Gateway (the browser went away)
  DRIVER_CRASHED: 502,

  // 504 Gateway Timeout
  DRIVER_TIMEOUT: 504,

  // 4xx, diagnosable by the caller
  ACTION_FAILED: 422,
  INVALID_TASK: 400,

  // 500 Internal Server Error
  CONFIGURATION_ERROR: 500,
  INTERNAL_ERROR: 500,
};

/**
 * Custom error class for Drover errors
 */
export class DroverError extends Error {
  /** Error code */
  readonly code: ErrorCode;

  /** HTTP status code */
  readonly httpStatus: number;

  /** Whether the caller may retry the request */
  readonly retryable: boolean;

  /** User-friendly message (safe to show to end users) */
  readonly userMessage?: string;

  /** Additional error details */
  readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      retryable?: boolean;
      userMessage?: string;
      details?: Record<string, unknown>;
      cause?: unknown;
    }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'DroverError';
    this.code = code;
    this.httpStatus = ERROR_HTTP_STATUS[code];
    this.retryable = options?.retryable ?? false;
    this.userMessage = options?.userMessage;
    this.details = options?.details;

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DroverError);
    }
  }

  /**
   * Create a JSON representation of the error
   */
  toJSON(): {
    code: ErrorCode;
    message: string;
    httpStatus: number;
    retryable: boolean;
    userMessage?: string;
    details?: Record<string, unknown>;
  } {
    return {
      code: this.code,
      message: this.message,
      httpStatus: this.httpStatus,
      retryable: this.retryable,
      userMessage: this.userMessage,
      details: this.details,
    };
  }
}

function causeMessage(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Error factory functions for common error types
 */
export const Errors = {
  // Pool errors
  poolExhausted: (timeoutMs: number) =>
    new DroverError('POOL_EXHAUSTED', `No driver became available within ${timeoutMs}ms`, {
      retryable: true,
      details: { timeoutMs },
      userMessage: 'All browser sessions are busy. Please try again later.',
    }),

  poolClosed: () =>
    new DroverError('POOL_CLOSED', 'Driver pool has been shut down', {
      userMessage: 'The service is shutting down.',
    }),

  // Driver errors
  driverCrashed: (handleId: string, cause?: unknown) =>
    new DroverError(
      'DRIVER_CRASHED',
      cause === undefined
        ? `Driver ${handleId} became unresponsive`
        : `Driver ${handleId} became unresponsive: ${causeMessage(cause)}`,
      { retryable: true, details: { handleId }, cause }
    ),

  driverTimeout: (handleId: string, timeoutMs: number) =>
    new DroverError('DRIVER_TIMEOUT', `Task exceeded its ${timeoutMs}ms budget on driver ${handleId}`, {
      details: { handleId, timeoutMs },
    }),

  driverLaunchFailed: (cause: unknown) =>
    new DroverError('DRIVER_LAUNCH_FAILED', `Failed to launch browser: ${causeMessage(cause)}`, {
      retryable: true,
      cause,
      userMessage: 'A browser session could not be started.',
    }),

  actionFailed: (step: number, action: string, cause: unknown) =>
    new DroverError('ACTION_FAILED', `Step ${step} (${action}) failed: ${causeMessage(cause)}`, {
      details: { step, action, cause: causeMessage(cause) },
      cause,
    }),

  // Manager errors
  notReady: (state: string) =>
    new DroverError('NOT_READY', `Session manager is not accepting tasks (state: ${state})`, {
      retryable: true,
      details: { state },
      userMessage: 'The service is not ready. Please try again later.',
    }),

  // Validation errors
  invalidTask: (message: string, details?: Record<string, unknown>) =>
    new DroverError('INVALID_TASK', message, { details }),

  configurationError: (message: string, details?: Record<string, unknown>) =>
    new DroverError('CONFIGURATION_ERROR', message, { details }),

  // System errors
  internalError: (message: string, cause?: unknown) =>
    new DroverError('INTERNAL_ERROR', message, {
      cause,
      userMessage: 'An unexpected error occurred. Please try again.',
    }),
};

/**
 * Type guard to check if an error is a DroverError
 */
export function isDroverError(error: unknown): error is DroverError {
  return error instanceof DroverError;
}

/**
 * Convert any error to a DroverError
 */
export function toDroverError(error: unknown): DroverError {
  if (error instanceof DroverError) {
    return error;
  }

  if (error instanceof Error) {
    return new DroverError('INTERNAL_ERROR', error.message, {
      cause: error,
    });
  }

  return new DroverError('INTERNAL_ERROR', String(error));
}
