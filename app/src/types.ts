/**
 * Service-level HTTP types (health and error envelopes).
 *
 * Domain types for dispatch live in ./types/dispatch.ts.
 */

/** Health status for the service */
export interface ServiceHealth {
  status: 'healthy' | 'degraded' | 'unreachable';
  latency_ms?: number;
  error?: string;
}

/** Health response */
export interface HealthResponse {
  status: 'healthy' | 'degraded' | 'unhealthy';
  version: string;
  uptime_seconds: number;
  services: Record<string, ServiceHealth>;
  timestamp: string;
}

/** Standard error response */
export interface ErrorResponse {
  error: string;
  message: string;
}
