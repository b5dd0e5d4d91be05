import { HealthCheckResponse, ReadinessResponse } from '../types';
import { env } from '../config';
import { isRedisAvailable, isRedisEnabled } from '../redis';
import { jobRegistry } from './job.service';

/**
 * Health check service
 */
export class HealthService {
  private readonly startTime: number;
  private readonly version: string;

  constructor() {
    this.startTime = Date.now();
    this.version = process.env.npm_package_version || '1.0.0';
  }

  /**
   * Process status plus the job counts of this instance
   */
  getHealthStatus(): HealthCheckResponse {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      environment: env.NODE_ENV,
      version: this.version,
      queue: isRedisEnabled() ? 'bullmq' : 'in-process',
      jobs: jobRegistry.countByStatus(),
    };
  }

  /**
   * Redis is only a dependency when the job queue runs on it.
   */
  async checkReadiness(): Promise<ReadinessResponse> {
    const checks: Record<string, boolean> = {
      server: true,
    };

    if (isRedisEnabled()) {
      checks.redis = isRedisAvailable();
    }

    return { ready: Object.values(checks).every(Boolean), checks };
  }
}

export const healthService = new HealthService();

export default healthService;
