import request from 'supertest';
import { createApp } from '../src/app';
import { Application } from 'express';
import { jobRegistry } from '../src/services/job.service';

describe('Health Endpoints', () => {
  let app: Application;

  beforeAll(() => {
    app = createApp();
  });

  afterEach(() => {
    jobRegistry.clear();
  });

  describe('GET /api/v1/health', () => {
    it('should return health status', async () => {
      const response = await request(app).get('/api/v1/health');

      expect(response.status).toBe(200);
      expect(response.body).toHaveProperty('success', true);
      expect(response.body.data).toHaveProperty('status', 'healthy');
      expect(response.body.data).toHaveProperty('timestamp');
      expect(response.body.data).toHaveProperty('uptime');
      expect(response.body.data).toHaveProperty('environment');
      expect(response.body.data).toHaveProperty('version');
    });

    it('should report in-process queueing and job counts', async () => {
      jobRegistry.markQueued(jobRegistry.create([]).id);

      const response = await request(app).get('/api/v1/health');

      expect(response.body.data.queue).toBe('in-process');
      expect(response.body.data.jobs).toEqual({ uploading: 0, queued: 1, processing: 0, completed: 0, failed: 0 });
      expect(response.body.message).toBe('Service is healthy; 1 job(s) active');
    });

    it('should return correct content type', async () => {
      const response = await request(app).get('/api/v1/health');

      expect(response.headers['content-type']).toMatch(/application\/json/);
    });
  });

  describe('GET /api/v1/health/ready', () => {
    it('should return readiness status', async () => {
      const response = await request(app).get('/api/v1/health/ready');

      expect(response.status).toBe(200);
      expect(response.body).toHaveProperty('success', true);
      expect(response.body.data).toHaveProperty('ready', true);
      expect(response.body.data).toHaveProperty('checks');
    });

    it('should not require Redis when the queue runs in process', async () => {
      const response = await request(app).get('/api/v1/health/ready');

      expect(response.body.data.checks).toEqual({ server: true });
    });
  });

  describe('GET /api/v1/health/live', () => {
    it('should return liveness status', async () => {
      const response = await request(app).get('/api/v1/health/live');

      expect(response.status).toBe(200);
      expect(response.body).toHaveProperty('success', true);
      expect(response.body.data).toHaveProperty('alive', true);
    });
  });
});

