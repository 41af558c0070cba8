/**
 * Base error types for the application
 * All domain errors should extend these base types
 */

/**
 * Base interface for all application errors
 */
export interface AppError {
  readonly type: string;
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Validation errors (command-line or configuration input failures)
 */
export interface InvalidOptionsError extends AppError {
  readonly type: 'InvalidOptions';
  readonly details: string[];
}

export const createInvalidOptionsError = (
  message: string,
  details: string[] = []
): InvalidOptionsError => ({
  type: 'InvalidOptions',
  message,
  details,
});

/**
 * Best-effort message extraction for values caught at script boundaries.
 */
export const errorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === 'object' && error !== null && 'message' in error) {
    const maybeMessage = error.message;
    if (typeof maybeMessage === 'string') {
      return maybeMessage;
    }
  }

  return String(error);
};

/**
 * Renders an application error for the terminal, one detail per line.
 */
export const formatAppError = (error: AppError & { details?: readonly string[] }): string => {
  if (error.details !== undefined && error.details.length > 0) {
    return `${error.message}\n  - ${error.details.join('\n  - ')}`;
  }

  return error.message;
};
