/**
 * Tests for the reconciliation job endpoints
 *
 * Redis is disabled in tests, so uploaded jobs run in process.
 */

import request from 'supertest';
import { Application } from 'express';
import { createApp } from '../../src/app';
import { jobRegistry } from '../../src/services/job.service';

const LOS_CSV = ['First Name,Last Name,Payer,Days', 'John,Smith,Medicare A,12', 'Mary,Jones,HMO,8'].join('\n');

const VISITS_CSV = [
  'First Name,Last Name,DOS,POS,CPT',
  'John,Smith,8/4/2025,32,99309',
  'John,Smith,8/18/2025,32,99309',
].join('\n');

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('Jobs Endpoints', () => {
  let app: Application;

  beforeAll(() => {
    app = createApp();
  });

  afterEach(() => {
    jobRegistry.clear();
  });

  const waitForJob = async (jobId: string): Promise<request.Response> => {
    for (let attempt = 0; attempt < 200; attempt++) {
      const response = await request(app).get(`/api/v1/jobs/${jobId}`);
      if (response.body.data?.status === 'completed' || response.body.data?.status === 'failed') {
        return response;
      }
      await sleep(25);
    }
    throw new Error(`Job ${jobId} did not finish`);
  };

  // ============================================
  // Upload
  // ============================================

  describe('POST /api/v1/jobs/upload', () => {
    it('should reject a request without files', async () => {
      const response = await request(app).post('/api/v1/jobs/upload');

      expect(response.status).toBe(400);
      expect(response.body).toHaveProperty('success', false);
      expect(response.body.error).toMatch(/^No files uploaded/);
    });

    it('should reject a file that is not CSV', async () => {
      const response = await request(app)
        .post('/api/v1/jobs/upload')
        .attach('los_files', Buffer.from('%PDF-1.4'), 'notes.pdf');

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('Only CSV files are allowed (got "notes.pdf")');
    });

    it('should reject an unknown upload field', async () => {
      const response = await request(app)
        .post('/api/v1/jobs/upload')
        .attach('invoice_files', Buffer.from(LOS_CSV), 'LOS.csv');

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('Unexpected upload field "invoice_files"');
    });

    it('should accept extracts and reconcile them in the background', async () => {
      const upload = await request(app)
        .post('/api/v1/jobs/upload')
        .field('reportingPeriod', '2025-08')
        .attach('los_files', Buffer.from(LOS_CSV), 'LOS Medilodge of Wyoming.csv')
        .attach('visit_files', Buffer.from(VISITS_CSV), 'Medilodge of Wyoming Charges.csv');

      expect(upload.status).toBe(202);
      const { jobId, statusUrl } = upload.body.data;
      expect(statusUrl).toBe(`/api/v1/jobs/${jobId}`);

      const status = await waitForJob(jobId);
      expect(status.body.data).toMatchObject({ status: 'completed', progress: 100, reportingPeriod: '2025-08' });
      expect(status.body.data.files).toEqual([
        { kind: 'LOS', originalName: 'LOS Medilodge of Wyoming.csv', size: LOS_CSV.length },
        { kind: 'CHARGE_CAPTURE', originalName: 'Medilodge of Wyoming Charges.csv', size: VISITS_CSV.length },
      ]);

      const summary = await request(app).get(`/api/v1/jobs/${jobId}/summary`);
      expect(summary.status).toBe(200);
      expect(summary.body.data.rows).toHaveLength(1);
      expect(summary.body.data.rows[0].facility).toBe('Medilodge of Wyoming');
      expect(summary.body.data.rows[0].values).toMatchObject({
        patientsServed: 2,
        totalVisits: 2,
        visitedPatients: 1,
        'cpt.99309': 2,
        'payer.Medicare A.ratio': '1:2',
        'payer.Managed Care.ratio': '1:2',
      });

      const csv = await request(app).get(`/api/v1/jobs/${jobId}/summary.csv`);
      expect(csv.status).toBe(200);
      expect(csv.headers['content-type']).toMatch(/text\/csv/);
      expect(csv.headers['content-disposition']).toBe(`attachment; filename="${jobId}_master_summary.csv"`);
      expect(csv.text.split('\r\n')[0]).toMatch(/^Facility,Patients Served,Total Visits,Visited Patients,/);
      expect(csv.text.split('\r\n')[1]).toMatch(/^Medilodge of Wyoming,2,2,1,2,1:2,/);
    });

    it('should fail a job whose extracts hold no usable record', async () => {
      const upload = await request(app)
        .post('/api/v1/jobs/upload')
        .attach('los_files', Buffer.from('First Name,Last Name,Days\n'), 'LOS Harbor.csv');

      const status = await waitForJob(upload.body.data.jobId);
      expect(status.body.data.status).toBe('failed');
      expect(status.body.data.errors).toEqual(['No usable records in any extract (1 extract(s) checked)']);

      const summary = await request(app).get(`/api/v1/jobs/${upload.body.data.jobId}/summary`);
      expect(summary.status).toBe(422);
    });
  });

  // ============================================
  // Status and listing
  // ============================================

  describe('GET /api/v1/jobs/:jobId', () => {
    it('should return 404 for an unknown job', async () => {
      const response = await request(app).get('/api/v1/jobs/3f1c8a52-6d2e-4b7a-9c1d-0e5f6a7b8c9d');

      expect(response.status).toBe(404);
      expect(response.body.error).toBe('Reconciliation job not found');
    });

    it('should reject a malformed job id', async () => {
      const response = await request(app).get('/api/v1/jobs/not-a-job');

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('Validation failed');
      expect(response.body.details).toEqual([{ field: 'jobId', message: 'Invalid job ID format' }]);
    });
  });

  describe('GET /api/v1/jobs/:jobId/summary', () => {
    it('should return 409 while the job is still running', async () => {
      const job = jobRegistry.create([]);
      jobRegistry.markProcessing(job.id);

      const response = await request(app).get(`/api/v1/jobs/${job.id}/summary`);

      expect(response.status).toBe(409);
      expect(response.body.error).toBe('Reconciliation job is processing (20%); summary not ready');
    });

    it('should return 404 for an unknown job', async () => {
      const response = await request(app).get('/api/v1/jobs/3f1c8a52-6d2e-4b7a-9c1d-0e5f6a7b8c9d/summary');

      expect(response.status).toBe(404);
    });
  });

  describe('GET /api/v1/jobs', () => {
    it('should page through jobs', async () => {
      jobRegistry.create([]);
      jobRegistry.create([]);
      jobRegistry.create([]);

      const response = await request(app).get('/api/v1/jobs?limit=2&offset=0');

      expect(response.status).toBe(200);
      expect(response.body.data).toHaveLength(2);
      expect(response.body.pagination).toEqual({ limit: 2, offset: 0, total: 3, hasMore: true });
    });

    it('should reject an unknown status filter', async () => {
      const response = await request(app).get('/api/v1/jobs?status=archived');

      expect(response.status).toBe(400);
      expect(response.body.details[0].field).toBe('status');
    });
  });
});
