/**
 * Custom error class that includes HTTP status code for proper error mapping
 * Used throughout the application for consistent error handling
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly details?: unknown;

  constructor(message: string, statusCode: number, details?: unknown, isOperational = true) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.details = details;
    this.isOperational = isOperational;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    // Set the prototype explicitly to ensure instanceof works correctly
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

/**
 * Factory functions for common HTTP errors
 */
// Duplicate registrations are reported as 400, which is what existing clients expect
export const createConflictError = (message: string): AppError => {
  return new AppError(message, 400);
};

export const createUnauthorizedError = (message: string): AppError => {
  return new AppError(message, 401);
};

export const createNotFoundError = (message: string): AppError => {
  return new AppError(message, 404);
};

export const createValidationError = (message: string, details: unknown): AppError => {
  return new AppError(message, 422, details);
};

export const createUnavailableError = (message: string): AppError => {
  return new AppError(message, 503);
};
