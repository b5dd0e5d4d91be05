/**
 * Reconciliation Background Worker
 *
 * Runs one uploaded job end to end:
 * 1. LOAD - each uploaded CSV is streamed into typed records
 * 2. RECONCILE - the pipeline runs, reporting every stage to the job
 *    registry (and its Redis mirror) as progress
 * 3. EXPORT - the master summary is written under OUTPUT_DIR
 *
 * With Redis enabled jobs go through BullMQ and are retried; otherwise they
 * run in this process right after the upload returns.
 */

import { unlink } from 'fs/promises';
import { Job } from 'bullmq';
import { env, loadReconciliationConfig } from '../config';
import { runReconciliation, type ReconciliationIssue, type SourceExtract } from '../reconciliation';
import { isRedisEnabled } from '../redis';
import { jobRegistry, type JobFile } from '../services/job.service';
import { loadExtractFile } from '../services/extractLoader.service';
import { CsvSummaryExporter } from '../services/summaryExport.service';
import { logger } from '../utils';
import { getReconciliationQueue, type ReconciliationJobData } from './reconciliation.queue';

// ============================================
// Helper Functions
// ============================================

async function loadUploadedFiles(
  files: JobFile[]
): Promise<{ extracts: SourceExtract[]; issues: ReconciliationIssue[] }> {
  const extracts: SourceExtract[] = [];
  const issues: ReconciliationIssue[] = [];

  for (const file of files) {
    const loaded = await loadExtractFile({
      extractId: file.extractId,
      kind: file.kind,
      filePath: file.path,
      originalName: file.originalName,
    });
    extracts.push(loaded.extract);
    issues.push(...loaded.issues);
  }

  return { extracts, issues };
}

async function removeUploadedFiles(jobId: string, files: JobFile[]): Promise<void> {
  for (const file of files) {
    try {
      await unlink(file.path);
    } catch (error) {
      logger.debug(`[${jobId}] Could not remove ${file.path}: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  }
  logger.debug(`[${jobId}] Cleaned up ${files.length} uploaded file(s)`);
}

// ============================================
// Main Job Handler
// ============================================

export interface RunJobOptions {
  /** False while the queue will retry; the job stays "processing" and keeps its files */
  finalAttempt?: boolean;
  /** Label for log lines, e.g. the BullMQ job id */
  attemptLabel?: string;
}

/**
 * Loads, reconciles and exports one registered job.
 */
export async function runReconciliationJob(data: ReconciliationJobData, options: RunJobOptions = {}): Promise<void> {
  const { jobId, files } = data;
  const finalAttempt = options.finalAttempt ?? true;
  const label = options.attemptLabel ?? 'direct';
  const startTime = Date.now();

  if (!jobRegistry.get(jobId)) {
    jobRegistry.create(files, { id: jobId, reportingPeriod: data.reportingPeriod });
  }

  try {
    jobRegistry.markProcessing(jobId);
    logger.info(`[${jobId}] Starting job ${label} with ${files.length} file(s)`);

    const config = loadReconciliationConfig();
    const loaded = await loadUploadedFiles(files);

    const result = await runReconciliation(loaded.extracts, {
      config,
      runId: jobId,
      exporter: new CsvSummaryExporter(env.OUTPUT_DIR),
      onStageComplete: (event) => jobRegistry.recordStage(jobId, event),
    });

    jobRegistry.markCompleted(jobId, result, loaded.issues);

    const duration = Date.now() - startTime;
    logger.info(
      `[${jobId}] Job ${label} complete: ${result.rows.length} facilities, ${loaded.issues.length + result.issues.length} issues in ${duration}ms`
    );
  } catch (error) {
    if (finalAttempt) {
      jobRegistry.markFailed(jobId, error);
    }
    logger.error(`[${jobId}] Job ${label} failed: ${error instanceof Error ? error.message : 'Unknown error'}`);
    throw error;
  } finally {
    // Retries need the uploads
    if (finalAttempt || jobRegistry.get(jobId)?.status === 'completed') {
      await removeUploadedFiles(jobId, files);
    }
  }
}

/**
 * BullMQ processor
 */
export async function processReconciliationJob(job: Job<ReconciliationJobData>): Promise<void> {
  const attempts = job.opts.attempts ?? 1;
  await runReconciliationJob(job.data, {
    finalAttempt: job.attemptsMade + 1 >= attempts,
    attemptLabel: `${job.id ?? 'unknown'} (attempt ${job.attemptsMade + 1}/${attempts})`,
  });
}

/**
 * Hands a queued job to BullMQ, or runs it in this process when Redis is
 * disabled. Returns once the job is handed off, not when it finishes.
 */
export async function startBackgroundProcessing(jobId: string): Promise<void> {
  const job = jobRegistry.get(jobId);
  if (!job) {
    throw new Error(`Unknown job ${jobId}`);
  }

  jobRegistry.markQueued(jobId);
  const data: ReconciliationJobData = { jobId, files: job.files, reportingPeriod: job.reportingPeriod };

  if (isRedisEnabled()) {
    await getReconciliationQueue().add('reconcile', data, { jobId });
    logger.info(`[${jobId}] Job queued on BullMQ`);
    return;
  }

  setImmediate(() => {
    runReconciliationJob(data).catch((error: unknown) => {
      // Already recorded on the job as failed
      logger.debug(`[${jobId}] In-process run ended with error: ${error instanceof Error ? error.message : 'Unknown error'}`);
    });
  });
}

export default {
  processReconciliationJob,
  runReconciliationJob,
  startBackgroundProcessing,
};
