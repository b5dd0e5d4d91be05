/**
 * Job Progress Mirror
 *
 * Redis hash per reconciliation job so any API instance can answer status
 * polls for a job running elsewhere. Writes follow registry updates and
 * never block or fail a job.
 *
 * KEY FORMAT: job:{jobId}:progress
 */

import { safeRedisOperation, safeRedisWrite } from './client';

// 1 hour; jobs finish well within this
export const JOB_PROGRESS_TTL_SECONDS = 60 * 60;

const getCacheKey = (jobId: string): string => `job:${jobId}:progress`;

export interface JobProgress {
  status: string;
  progress: number;
  message: string;
  stage?: string;
  updatedAt: string;
}

/**
 * Cached progress, or null when absent or Redis is unavailable
 */
export async function getCachedJobProgress(jobId: string): Promise<JobProgress | null> {
  return safeRedisOperation(
    async (client) => {
      const data = await client.hgetall(getCacheKey(jobId));
      if (!data || Object.keys(data).length === 0) {
        return null;
      }

      return {
        status: data.status || 'unknown',
        progress: parseInt(data.progress || '0', 10),
        message: data.message || '',
        stage: data.stage || undefined,
        updatedAt: data.updatedAt || '',
      };
    },
    null,
    `Job progress GET (${jobId})`
  );
}

export async function setCachedJobProgress(jobId: string, progress: JobProgress): Promise<void> {
  const cacheKey = getCacheKey(jobId);

  await safeRedisWrite(async (client) => {
    const multi = client.multi();
    multi.hset(cacheKey, {
      status: progress.status,
      progress: progress.progress.toString(),
      message: progress.message,
      stage: progress.stage ?? '',
      updatedAt: progress.updatedAt,
    });
    multi.expire(cacheKey, JOB_PROGRESS_TTL_SECONDS);
    await multi.exec();
  }, `Job progress SET (${jobId})`);
}
