export { healthService, HealthService } from './health.service';
export * from './job.service';
export * from './extractLoader.service';
export * from './summaryExport.service';
