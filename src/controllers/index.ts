export { healthController, HealthController } from './health.controller';
export { jobsController, JobsController } from './jobs.controller';
