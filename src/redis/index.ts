/**
 * Redis Module
 *
 * Optional: the service runs without Redis, processing jobs in process and
 * answering status polls from the local job registry.
 */

export {
  getRedisClient,
  getRedisConnectionOptions,
  isRedisEnabled,
  isRedisAvailable,
  disconnectRedis,
  safeRedisOperation,
  safeRedisWrite,
} from './client';

export {
  JOB_PROGRESS_TTL_SECONDS,
  getCachedJobProgress,
  setCachedJobProgress,
  type JobProgress,
} from './jobProgress';
