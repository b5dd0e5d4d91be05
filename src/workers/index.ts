/**
 * Workers Module
 *
 * Background processing of uploaded reconciliation jobs.
 */

export {
  processReconciliationJob,
  runReconciliationJob,
  startBackgroundProcessing,
  type RunJobOptions,
} from './reconciliationWorker';

export {
  getReconciliationQueue,
  closeReconciliationQueue,
  setupReconciliationWorker,
  RECONCILIATION_QUEUE_NAME,
  RECONCILIATION_JOB_ATTEMPTS,
  type ReconciliationJobData,
} from './reconciliation.queue';
