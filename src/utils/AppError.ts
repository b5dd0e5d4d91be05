/**
 * Operational HTTP error. The global error handler turns it into the
 * standard `{ success: false, error }` payload with its status code.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly details?: unknown;

  constructor(message: string, statusCode: number, isOperational = true, details?: unknown) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
    Object.setPrototypeOf(this, AppError.prototype);
  }

  static badRequest(message: string, details?: unknown): AppError {
    return new AppError(message, 400, true, details);
  }

  static notFound(message = 'Resource not found'): AppError {
    return new AppError(message, 404);
  }

  static conflict(message: string): AppError {
    return new AppError(message, 409);
  }

  static payloadTooLarge(message = 'Uploaded file is too large'): AppError {
    return new AppError(message, 413);
  }

  static unprocessable(message: string, details?: unknown): AppError {
    return new AppError(message, 422, true, details);
  }
}

export default AppError;
