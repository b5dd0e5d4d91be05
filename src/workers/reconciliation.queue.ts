import { Queue, Worker, Job, ConnectionOptions } from 'bullmq';
import { env } from '../config';
import { getRedisConnectionOptions } from '../redis';
import type { JobFile } from '../services/job.service';
import { logger } from '../utils';

// ============================================
// Types
// ============================================

export interface ReconciliationJobData {
  jobId: string;
  files: JobFile[];
  reportingPeriod?: string;
}

// ============================================
// Redis Connection for BullMQ
// ============================================

function getConnection(): ConnectionOptions {
  return {
    ...getRedisConnectionOptions(),
    // BullMQ requires maxRetriesPerRequest to be null
    maxRetriesPerRequest: null,
  };
}

// ============================================
// Queue Definition
// ============================================

export const RECONCILIATION_QUEUE_NAME = 'facility-reconciliation';

export const RECONCILIATION_JOB_ATTEMPTS = 3;

let reconciliationQueue: Queue<ReconciliationJobData> | null = null;

/**
 * The queue, created on first use so that nothing connects when Redis is
 * disabled.
 */
export function getReconciliationQueue(): Queue<ReconciliationJobData> {
  if (!reconciliationQueue) {
    reconciliationQueue = new Queue<ReconciliationJobData>(RECONCILIATION_QUEUE_NAME, {
      connection: getConnection(),
      defaultJobOptions: {
        attempts: RECONCILIATION_JOB_ATTEMPTS,
        backoff: {
          type: 'exponential',
          delay: 1000,
        },
        removeOnComplete: true,
        removeOnFail: false,
      },
    });
  }
  return reconciliationQueue;
}

export async function closeReconciliationQueue(): Promise<void> {
  if (reconciliationQueue) {
    await reconciliationQueue.close();
    reconciliationQueue = null;
  }
}

// ============================================
// Worker Setup
// ============================================

export function setupReconciliationWorker(
  processor: (job: Job<ReconciliationJobData>) => Promise<void>
): Worker<ReconciliationJobData> {
  const worker = new Worker<ReconciliationJobData>(RECONCILIATION_QUEUE_NAME, processor, {
    connection: getConnection(),
    concurrency: env.WORKER_CONCURRENCY,
    // Large uploads take a while to match
    lockDuration: 60000,
  });

  worker.on('completed', (job) => {
    logger.info(`[Job ${job.data.jobId}] Reconciliation completed`);
  });

  worker.on('failed', (job, err) => {
    logger.error(`[Job ${job?.data.jobId ?? 'unknown'}] Reconciliation attempt failed: ${err.message}`);
  });

  worker.on('error', (err) => {
    logger.error(`Worker error: ${err.message}`);
  });

  return worker;
}
