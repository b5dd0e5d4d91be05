// API Response types
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  message?: string;
  error?: string;
  details?: unknown;
  timestamp: string;
}

export interface OffsetPaginatedResponse<T> extends ApiResponse<T[]> {
  pagination: {
    limit: number;
    offset: number;
    total: number;
    hasMore: boolean;
  };
}

// Health check response
export interface HealthCheckResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
  environment: string;
  version: string;
  /** Where jobs run: BullMQ workers, or this process when Redis is off */
  queue: 'bullmq' | 'in-process';
  /** Jobs known to this instance, per status */
  jobs: Record<string, number>;
}

export interface ReadinessResponse {
  ready: boolean;
  checks: Record<string, boolean>;
}
