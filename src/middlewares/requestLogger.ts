import morgan, { StreamOptions } from 'morgan';
import { logger } from '../utils';
import { env } from '../config';

// Morgan stream for Winston
const stream: StreamOptions = {
  write: (message: string) => {
    logger.http(message.trim());
  },
};

// Skip logging in test environment and for health probes
const skip = (req: { url?: string }): boolean => {
  return env.NODE_ENV === 'test' || (req.url ?? '').includes('/health/live');
};

// Request logger middleware
export const requestLogger = morgan(env.NODE_ENV === 'production' ? 'combined' : 'dev', { stream, skip });

export default requestLogger;
