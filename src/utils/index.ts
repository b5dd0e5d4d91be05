export { default as logger, Logging } from './logger';
export { sendSuccess, sendError, sendPaginated } from './response';
export { asyncHandler } from './asyncHandler';
export { AppError } from './AppError';
