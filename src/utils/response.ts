import { Response } from 'express';
import { ApiResponse, OffsetPaginatedResponse } from '../types';

/**
 * Send a success response
 */
export const sendSuccess = <T>(
  res: Response,
  data: T,
  message?: string,
  statusCode = 200
): Response => {
  const response: ApiResponse<T> = {
    success: true,
    data,
    message,
    timestamp: new Date().toISOString(),
  };

  return res.status(statusCode).json(response);
};

/**
 * Send an error response
 */
export const sendError = (
  res: Response,
  error: string,
  statusCode = 500,
  details?: unknown
): Response => {
  const response: ApiResponse = {
    success: false,
    error,
    details,
    timestamp: new Date().toISOString(),
  };

  return res.status(statusCode).json(response);
};

/**
 * Send one page of a list addressed by limit/offset
 */
export const sendPaginated = <T>(
  res: Response,
  data: T[],
  page: { limit: number; offset: number; total: number },
  message?: string
): Response => {
  const response: OffsetPaginatedResponse<T> = {
    success: true,
    data,
    message,
    timestamp: new Date().toISOString(),
    pagination: {
      ...page,
      hasMore: page.offset + data.length < page.total,
    },
  };

  return res.status(200).json(response);
};
