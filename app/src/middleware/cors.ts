import { cors as honoCors } from 'hono/cors';

/**
 * CORS middleware for the planning API. Read-only service: no credentials.
 */
export function createCors(origins: string[]) {
  return honoCors({
    origin: origins,
    allowMethods: ['GET', 'POST', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'X-Request-Id', 'traceparent', 'tracestate'],
    exposeHeaders: ['X-Request-Id', 'X-Response-Time', 'traceparent'],
    maxAge: 3600,
  });
}
