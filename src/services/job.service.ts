/**
 * Job Service
 *
 * Tracks reconciliation jobs from upload to result:
 *
 *   uploading → queued → processing → completed | failed
 *
 * The registry lives in this process and is the source of truth. Each
 * change is mirrored to Redis (when enabled) so status polls can be
 * answered by any instance. Finished jobs are evicted once they are older
 * than the mirror's TTL.
 */

import { v4 as uuidv4 } from 'uuid';
import { JOB_PROGRESS_TTL_SECONDS, setCachedJobProgress, getCachedJobProgress } from '../redis';
import {
  summarizeIssues,
  type ColumnDefinition,
  type ExtractKind,
  type FacilityMetricsRow,
  type FacilityOverview,
  type IssueCode,
  type ReconciliationIssue,
  type ReconciliationResult,
  type ReconciliationStage,
  type StageEvent,
} from '../reconciliation';

// ============================================
// Types
// ============================================

export const JOB_STATUSES = ['uploading', 'queued', 'processing', 'completed', 'failed'] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export interface JobFile {
  extractId: string;
  kind: ExtractKind;
  originalName: string;
  path: string;
  size: number;
}

export interface JobResult {
  columns: ColumnDefinition[];
  rows: FacilityMetricsRow[];
  facilities: FacilityOverview[];
  exportLocation?: string;
}

export interface ReconciliationJob {
  id: string;
  status: JobStatus;
  /** 0-100 */
  progress: number;
  message: string;
  stage?: ReconciliationStage;
  /** Free-text label supplied at upload, e.g. "2025-08" */
  reportingPeriod?: string;
  files: JobFile[];
  errors: string[];
  issues: ReconciliationIssue[];
  result?: JobResult;
  createdAt: Date;
  updatedAt: Date;
  startedAt?: Date;
  completedAt?: Date;
}

export interface JobStatusView {
  id: string;
  status: string;
  progress: number;
  message: string;
  stage?: string;
  reportingPeriod?: string;
  files: Array<Pick<JobFile, 'kind' | 'originalName' | 'size'>>;
  errors: string[];
  issueSummary: Record<IssueCode, number>;
  createdAt?: string;
  updatedAt: string;
  startedAt?: string;
  completedAt?: string;
}

export interface ListJobsParams {
  status?: JobStatus;
  limit: number;
  offset: number;
}

// ============================================
// Progress Mapping
// ============================================

/**
 * Percentage reported once a stage completes. Upload and queueing take the
 * first 20%; the finished job reports 100.
 */
export const STAGE_PROGRESS: Record<ReconciliationStage, number> = {
  LOADED: 30,
  NORMALIZED: 40,
  MATCHED: 60,
  DEDUPLICATED: 75,
  AGGREGATED: 85,
  EXPORTED: 95,
};

const STAGE_MESSAGES: Record<ReconciliationStage, string> = {
  LOADED: 'Extracts loaded',
  NORMALIZED: 'Facility names normalized',
  MATCHED: 'Patients matched across extracts',
  DEDUPLICATED: 'Encounters deduplicated',
  AGGREGATED: 'Facility metrics computed',
  EXPORTED: 'Summary exported',
};

// ============================================
// Registry
// ============================================

export class JobRegistry {
  private readonly jobs = new Map<string, ReconciliationJob>();

  /**
   * @param retentionMs - how long a completed or failed job stays listed
   */
  constructor(private readonly retentionMs: number = JOB_PROGRESS_TTL_SECONDS * 1000) {}

  /**
   * Registers a job. A worker picking up a job uploaded to another instance
   * passes the queued id so progress is mirrored under the same key.
   */
  create(files: JobFile[], options: { id?: string; reportingPeriod?: string } = {}): ReconciliationJob {
    this.evictExpired();
    const now = new Date();
    const job: ReconciliationJob = {
      id: options.id ?? uuidv4(),
      status: 'uploading',
      progress: 0,
      message: `Received ${files.length} file(s)`,
      reportingPeriod: options.reportingPeriod,
      files,
      errors: [],
      issues: [],
      createdAt: now,
      updatedAt: now,
    };
    this.jobs.set(job.id, job);
    this.mirror(job);
    return job;
  }

  get(jobId: string): ReconciliationJob | undefined {
    this.evictExpired();
    return this.jobs.get(jobId);
  }

  /**
   * Newest first, optionally filtered by status
   */
  list(params: ListJobsParams): { jobs: ReconciliationJob[]; total: number } {
    this.evictExpired();
    const matching = [...this.jobs.values()]
      .filter((job) => params.status === undefined || job.status === params.status)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());

    return {
      jobs: matching.slice(params.offset, params.offset + params.limit),
      total: matching.length,
    };
  }

  countByStatus(): Record<JobStatus, number> {
    this.evictExpired();
    const counts: Record<JobStatus, number> = { uploading: 0, queued: 0, processing: 0, completed: 0, failed: 0 };
    for (const job of this.jobs.values()) {
      counts[job.status] += 1;
    }
    return counts;
  }

  markQueued(jobId: string): void {
    this.update(jobId, { status: 'queued', progress: 10, message: 'Files uploaded; waiting for a worker' });
  }

  markProcessing(jobId: string): void {
    this.update(jobId, {
      status: 'processing',
      progress: 20,
      message: 'Reconciliation started',
      startedAt: new Date(),
    });
  }

  recordStage(jobId: string, event: StageEvent): void {
    this.update(jobId, {
      stage: event.stage,
      progress: STAGE_PROGRESS[event.stage],
      message: STAGE_MESSAGES[event.stage],
    });
  }

  /**
   * @param loadIssues - rows rejected while parsing the uploads
   */
  markCompleted(jobId: string, result: ReconciliationResult, loadIssues: ReconciliationIssue[] = []): void {
    this.update(jobId, {
      status: 'completed',
      progress: 100,
      message: `Reconciled ${result.rows.length} facilities`,
      issues: [...loadIssues, ...result.issues],
      result: {
        columns: result.columns,
        rows: result.rows,
        facilities: result.facilities,
        exportLocation: result.exportLocation,
      },
      completedAt: new Date(),
    });
  }

  markFailed(jobId: string, error: unknown): void {
    const job = this.jobs.get(jobId);
    if (!job) return;
    const reason = error instanceof Error ? error.message : String(error);
    this.update(jobId, {
      status: 'failed',
      message: 'Reconciliation failed',
      errors: [...job.errors, reason],
      completedAt: new Date(),
    });
  }

  /** Test helper; jobs otherwise live for the life of the process */
  clear(): void {
    this.jobs.clear();
  }

  private evictExpired(now: number = Date.now()): void {
    for (const [id, job] of this.jobs) {
      if (job.completedAt && now - job.completedAt.getTime() > this.retentionMs) {
        this.jobs.delete(id);
      }
    }
  }

  private update(jobId: string, changes: Partial<Omit<ReconciliationJob, 'id' | 'createdAt'>>): void {
    const job = this.jobs.get(jobId);
    if (!job) return;
    Object.assign(job, changes, { updatedAt: new Date() });
    this.mirror(job);
  }

  private mirror(job: ReconciliationJob): void {
    void setCachedJobProgress(job.id, {
      status: job.status,
      progress: job.progress,
      message: job.message,
      stage: job.stage,
      updatedAt: job.updatedAt.toISOString(),
    });
  }
}

export const jobRegistry = new JobRegistry();

// ============================================
// Views
// ============================================

export function toJobStatusView(job: ReconciliationJob): JobStatusView {
  return {
    id: job.id,
    status: job.status,
    progress: job.progress,
    message: job.message,
    stage: job.stage,
    reportingPeriod: job.reportingPeriod,
    files: job.files.map(({ kind, originalName, size }) => ({ kind, originalName, size })),
    errors: job.errors,
    issueSummary: summarizeIssues(job.issues),
    createdAt: job.createdAt.toISOString(),
    updatedAt: job.updatedAt.toISOString(),
    startedAt: job.startedAt?.toISOString(),
    completedAt: job.completedAt?.toISOString(),
  };
}

/**
 * Status of a job: from the local registry, else from the Redis mirror for
 * a job owned by another instance.
 */
export async function getJobStatus(jobId: string): Promise<JobStatusView | null> {
  const job = jobRegistry.get(jobId);
  if (job) {
    return toJobStatusView(job);
  }

  const cached = await getCachedJobProgress(jobId);
  if (!cached) {
    return null;
  }

  return {
    id: jobId,
    status: cached.status,
    progress: cached.progress,
    message: cached.message,
    stage: cached.stage,
    files: [],
    errors: [],
    issueSummary: summarizeIssues([]),
    updatedAt: cached.updatedAt,
  };
}
