import { Request, Response } from 'express';
import { healthService } from '../services';
import { sendSuccess, sendError, asyncHandler } from '../utils';

/**
 * Health check controller
 */
export class HealthController {
  /**
   * GET /health
   */
  getHealth = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    const health = healthService.getHealthStatus();
    const active = health.jobs.queued + health.jobs.processing;
    sendSuccess(res, health, `Service is healthy; ${active} job(s) active`);
  });

  /**
   * GET /health/ready
   * 503 while the queue backend is unreachable
   */
  getReadiness = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    const { ready, checks } = await healthService.checkReadiness();

    if (!ready) {
      sendError(res, 'Service is not ready', 503, { checks });
      return;
    }
    sendSuccess(res, { ready, checks }, 'Service is ready');
  });

  /**
   * GET /health/live
   */
  getLiveness = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    sendSuccess(res, { alive: true }, 'Service is alive');
  });
}

export const healthController = new HealthController();

export default healthController;
