import { Request, Response, NextFunction } from 'express';
import { MulterError } from 'multer';
import { AppError, logger } from '../utils';
import { env } from '../config';

/**
 * Upload errors raised by multer before the route handler runs
 */
const fromMulterError = (err: MulterError): AppError => {
  if (err.code === 'LIMIT_FILE_SIZE') {
    return AppError.payloadTooLarge(`File exceeds the ${env.MAX_UPLOAD_SIZE_MB}MB upload limit`);
  }
  if (err.code === 'LIMIT_UNEXPECTED_FILE') {
    return AppError.badRequest(`Unexpected upload field "${err.field ?? ''}"`);
  }
  return AppError.badRequest(err.message);
};

/**
 * Global error handling middleware
 */
export const errorHandler = (
  err: Error | AppError,
  _req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const error = err instanceof MulterError ? fromMulterError(err) : err;

  // Default error values
  let statusCode = 500;
  let message = 'Internal Server Error';
  let isOperational = false;
  let details: unknown;

  // Check if it's our custom AppError
  if (error instanceof AppError) {
    statusCode = error.statusCode;
    message = error.message;
    isOperational = error.isOperational;
    details = error.details;
  }

  // Log error
  if (!isOperational) {
    logger.error('Unhandled Error:', error);
  } else {
    logger.warn(`Operational Error: ${message}`);
  }

  // Send response
  res.status(statusCode).json({
    success: false,
    error: message,
    ...(details !== undefined && { details }),
    ...(env.NODE_ENV === 'development' && {
      stack: error.stack,
    }),
    timestamp: new Date().toISOString(),
  });
};

export default errorHandler;
