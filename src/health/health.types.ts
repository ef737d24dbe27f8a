export type HealthStatus = 'up' | 'down' | 'degraded';

export interface HealthIndicatorResult {
  name: string;
  status: HealthStatus;
  message: string;
  timestamp: string;
  details?: Record<string, unknown>;
}

export interface HealthReport {
  status: HealthStatus;
  rulesVersion: string;
  checks: HealthIndicatorResult[];
}
