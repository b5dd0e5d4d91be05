import { Request, Response } from 'express';
import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import { commonSchemas } from '../middlewares/validateRequest';
import type { ExtractKind } from '../reconciliation';
import {
  getJobStatus,
  jobRegistry,
  JOB_STATUSES,
  summaryToCsv,
  SUMMARY_FILENAME,
  toJobStatusView,
  type JobFile,
} from '../services';
import { startBackgroundProcessing } from '../workers';
import { sendSuccess, sendPaginated, asyncHandler, AppError, Logging } from '../utils';

// ============================================
// Upload Fields
// ============================================

/**
 * Multipart field → extract kind. `visit_files` is accepted for charge
 * capture exports that are labelled as visits.
 */
export const UPLOAD_FIELDS: Record<string, ExtractKind> = {
  adt_files: 'ADT',
  los_files: 'LOS',
  charge_capture_files: 'CHARGE_CAPTURE',
  visit_files: 'CHARGE_CAPTURE',
  assessment_files: 'FUNCTIONAL_ASSESSMENT',
};

// ============================================
// Request Schemas
// ============================================

export const listJobsQuerySchema = commonSchemas.pagination.extend({
  status: z.enum(JOB_STATUSES).optional(),
});

export const uploadBodySchema = z.object({
  reportingPeriod: z.string().trim().max(32).optional(),
});

const collectUploadedFiles = (req: Request): JobFile[] => {
  const uploaded = req.files;
  if (!uploaded || Array.isArray(uploaded)) {
    return [];
  }

  const files: JobFile[] = [];
  for (const [field, kind] of Object.entries(UPLOAD_FIELDS)) {
    for (const file of uploaded[field] ?? []) {
      files.push({
        extractId: uuidv4(),
        kind,
        originalName: file.originalname,
        path: file.path,
        size: file.size,
      });
    }
  }
  return files;
};

/**
 * Completed job or the right HTTP error for one that is not
 */
const requireCompletedJob = (jobId: string) => {
  const job = jobRegistry.get(jobId);
  if (!job) {
    throw AppError.notFound('Reconciliation job not found');
  }
  if (job.status === 'failed') {
    throw AppError.unprocessable('Reconciliation job failed', job.errors);
  }
  if (job.status !== 'completed' || !job.result) {
    throw AppError.conflict(`Reconciliation job is ${job.status} (${job.progress}%); summary not ready`);
  }
  return { job, result: job.result };
};

// ============================================
// Controller
// ============================================

/**
 * Reconciliation jobs controller
 */
export class JobsController {
  /**
   * POST /jobs/upload
   * Accepts the extracts of one run and starts processing
   */
  upload = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    Logging.info('📥 Extract upload received');

    const files = collectUploadedFiles(req);
    if (files.length === 0) {
      Logging.warn('❌ Upload rejected: no files provided');
      throw AppError.badRequest(
        `No files uploaded. Use one or more of the fields: ${Object.keys(UPLOAD_FIELDS).join(', ')}`
      );
    }

    const { reportingPeriod } = uploadBodySchema.parse(req.body);
    const job = jobRegistry.create(files, { reportingPeriod: reportingPeriod || undefined });

    for (const file of files) {
      Logging.info(`   ${file.kind}: ${file.originalName} (${(file.size / 1024).toFixed(2)} KB)`);
    }
    Logging.success(`✅ Job created: ${job.id}`);

    await startBackgroundProcessing(job.id);

    sendSuccess(
      res,
      {
        jobId: job.id,
        status: job.status,
        statusUrl: `${req.baseUrl}/${job.id}`,
      },
      'Files uploaded successfully. Processing started.',
      202
    );
  });

  /**
   * GET /jobs
   * Jobs of this instance, newest first
   */
  list = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const query = listJobsQuerySchema.parse(req.query);
    const { jobs, total } = jobRegistry.list(query);

    sendPaginated(
      res,
      jobs.map(toJobStatusView),
      { limit: query.limit, offset: query.offset, total },
      `Retrieved ${jobs.length} of ${total} jobs`
    );
  });

  /**
   * GET /jobs/:jobId
   * Status, progress and issue counts
   */
  getStatus = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const status = await getJobStatus(req.params.jobId);
    if (!status) {
      throw AppError.notFound('Reconciliation job not found');
    }

    sendSuccess(res, status, 'Job status retrieved');
  });

  /**
   * GET /jobs/:jobId/summary
   * Columns, rows and issues of a completed job
   */
  getSummary = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { job, result } = requireCompletedJob(req.params.jobId);

    sendSuccess(
      res,
      {
        jobId: job.id,
        reportingPeriod: job.reportingPeriod,
        columns: result.columns,
        rows: result.rows,
        facilities: result.facilities,
        issues: job.issues,
      },
      `Summary for ${result.rows.length} facilities`
    );
  });

  /**
   * GET /jobs/:jobId/summary.csv
   * The master summary as a CSV download
   */
  downloadSummaryCsv = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { job, result } = requireCompletedJob(req.params.jobId);

    res
      .status(200)
      .type('text/csv')
      .attachment(`${job.id}_${SUMMARY_FILENAME}`)
      .send(summaryToCsv(result.columns, result.rows));
  });
}

export const jobsController = new JobsController();

export default jobsController;
