/**
 * Health Routes
 *
 * - GET / - Uptime, queue mode and job counts of this instance
 * - GET /ready - 503 while Redis is enabled but unreachable
 * - GET /live - Process liveness; not request-logged
 */

import { Router } from 'express';
import { healthController } from '../controllers';

const router = Router();

router.get('/', healthController.getHealth);
router.get('/ready', healthController.getReadiness);
router.get('/live', healthController.getLiveness);

export default router;
