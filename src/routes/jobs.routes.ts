/**
 * Reconciliation Job Routes
 *
 * Upload of facility extracts and job tracking. HTTP concerns only; the
 * work happens in the job service and the background worker.
 *
 * Endpoints:
 * - POST /upload - Upload ADT, LOS, charge capture and assessment CSVs
 * - GET / - List jobs
 * - GET /:jobId - Job status and progress
 * - GET /:jobId/summary - Summary rows once completed
 * - GET /:jobId/summary.csv - Summary as CSV
 */

import { Router, Request } from 'express';
import multer from 'multer';
import { extname, resolve } from 'path';
import { existsSync, mkdirSync } from 'fs';
import { env } from '../config';
import { jobsController, UPLOAD_FIELDS, listJobsQuerySchema } from '../controllers/jobs.controller';
import { validateRequest, commonSchemas } from '../middlewares/validateRequest';
import { AppError } from '../utils';

const router = Router();

// ============================================
// Multer Configuration
// ============================================

const UPLOADS_DIR = resolve(process.cwd(), env.UPLOAD_DIR);
if (!existsSync(UPLOADS_DIR)) {
  mkdirSync(UPLOADS_DIR, { recursive: true });
}

/**
 * Files are stored on disk so the loader can stream them
 */
const storage = multer.diskStorage({
  destination: (_req, _file, cb) => {
    cb(null, UPLOADS_DIR);
  },
  filename: (_req, file, cb) => {
    const uniqueSuffix = `${Date.now()}-${Math.round(Math.random() * 1e9)}`;
    const extension = extname(file.originalname) || '.csv';
    cb(null, `${file.fieldname}_${uniqueSuffix}${extension}`);
  },
});

/**
 * CSV only
 */
const fileFilter = (_req: Request, file: Express.Multer.File, cb: multer.FileFilterCallback) => {
  const allowedMimeTypes = ['text/csv', 'application/csv', 'text/plain', 'application/vnd.ms-excel'];
  const extensionOk = file.originalname.toLowerCase().endsWith('.csv');

  if (extensionOk || allowedMimeTypes.includes(file.mimetype)) {
    cb(null, true);
  } else {
    cb(AppError.badRequest(`Only CSV files are allowed (got "${file.originalname}")`));
  }
};

const upload = multer({
  storage,
  fileFilter,
  limits: {
    fileSize: env.MAX_UPLOAD_SIZE_MB * 1024 * 1024,
  },
});

const uploadFields = upload.fields(Object.keys(UPLOAD_FIELDS).map((name) => ({ name })));

// ============================================
// Routes
// ============================================

/**
 * @route   POST /jobs/upload
 * @desc    Upload the extracts of one reconciliation run
 * @access  Public (should be protected in production)
 *
 * Request (multipart/form-data):
 * - adt_files, los_files, charge_capture_files (or visit_files),
 *   assessment_files: CSV files, any number per field
 * - reportingPeriod: optional label, e.g. "2025-08"
 *
 * Response:
 * - 202 Accepted: { jobId, status, statusUrl }
 * - 400 Bad Request: no files, or a non-CSV file
 * - 413 Payload Too Large: file over MAX_UPLOAD_SIZE_MB
 */
router.post('/upload', uploadFields, jobsController.upload);

/**
 * @route   GET /jobs
 * @desc    List jobs, newest first
 *
 * Query params:
 * - status: uploading | queued | processing | completed | failed
 * - limit: number (default: 20, max: 100)
 * - offset: number (default: 0)
 */
router.get('/', validateRequest({ query: listJobsQuerySchema }), jobsController.list);

/**
 * @route   GET /jobs/:jobId
 * @desc    Job status, progress %, stage and issue counts
 */
router.get('/:jobId', validateRequest({ params: commonSchemas.jobId }), jobsController.getStatus);

/**
 * @route   GET /jobs/:jobId/summary
 * @desc    Summary columns and rows
 *
 * Response:
 * - 200 OK once completed
 * - 404 Not Found: unknown job
 * - 409 Conflict: still running
 * - 422 Unprocessable Entity: job failed
 */
router.get('/:jobId/summary', validateRequest({ params: commonSchemas.jobId }), jobsController.getSummary);

/**
 * @route   GET /jobs/:jobId/summary.csv
 * @desc    Summary as a CSV download
 */
router.get('/:jobId/summary.csv', validateRequest({ params: commonSchemas.jobId }), jobsController.downloadSummaryCsv);

export default router;
