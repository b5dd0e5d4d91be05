import { HealthService } from '../../src/services/health.service';
import { jobRegistry } from '../../src/services/job.service';

describe('HealthService', () => {
  let healthService: HealthService;

  beforeEach(() => {
    healthService = new HealthService();
  });

  describe('getHealthStatus', () => {
    it('should return health status with all required fields', () => {
      const status = healthService.getHealthStatus();

      expect(status).toHaveProperty('status', 'healthy');
      expect(status).toHaveProperty('timestamp');
      expect(status).toHaveProperty('uptime');
      expect(status).toHaveProperty('environment');
      expect(status).toHaveProperty('version');
    });

    it('should return a valid ISO timestamp', () => {
      const status = healthService.getHealthStatus();

      expect(new Date(status.timestamp).toISOString()).toBe(status.timestamp);
    });

    it('should return non-negative uptime', () => {
      const status = healthService.getHealthStatus();

      expect(status.uptime).toBeGreaterThanOrEqual(0);
    });

    it('should report the test environment', () => {
      const status = healthService.getHealthStatus();

      expect(status.environment).toBe('test');
      expect(status.version.length).toBeGreaterThan(0);
    });
  });

  describe('job counts', () => {
    afterEach(() => {
      jobRegistry.clear();
    });

    it('should count jobs of this instance per status', () => {
      const first = jobRegistry.create([]);
      jobRegistry.create([]);
      jobRegistry.markProcessing(first.id);

      const status = healthService.getHealthStatus();

      expect(status.queue).toBe('in-process');
      expect(status.jobs).toEqual({ uploading: 1, queued: 0, processing: 1, completed: 0, failed: 0 });
    });
  });

  describe('checkReadiness', () => {
    it('should return readiness status', async () => {
      const result = await healthService.checkReadiness();

      expect(result).toHaveProperty('ready');
      expect(result).toHaveProperty('checks');
      expect(typeof result.ready).toBe('boolean');
    });

    it('should only check the server while Redis is disabled', async () => {
      const result = await healthService.checkReadiness();

      expect(result).toEqual({ ready: true, checks: { server: true } });
    });
  });
});
