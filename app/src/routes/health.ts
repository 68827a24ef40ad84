import { Hono } from 'hono';
import type { HealthResponse } from '../types.js';

export const VERSION = '1.0.0';
const startedAt = Date.now();

/**
 * Liveness endpoint. The planner has no upstream dependencies, so the
 * service is healthy whenever it can answer.
 */
export function createHealthRoutes(): Hono {
  const app = new Hono();

  app.get('/', (c) => {
    const response: HealthResponse = {
      status: 'healthy',
      version: VERSION,
      uptime_seconds: Math.floor((Date.now() - startedAt) / 1000),
      services: { planner: { status: 'healthy' } },
      timestamp: new Date().toISOString(),
    };
    return c.json(response);
  });

  return app;
}
