import { Router } from 'express';
import healthRoutes from './health.routes';
import jobsRoutes from './jobs.routes';

const router = Router();

// Health check routes
router.use('/health', healthRoutes);

// Reconciliation jobs (extract upload, status, summary)
router.use('/jobs', jobsRoutes);

export default router;
