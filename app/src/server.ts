import { Hono } from 'hono';
import { secureHeaders } from 'hono/secure-headers';
import { requestId } from './middleware/request-id.js';
import { createCors } from './middleware/cors.js';
import { createTracing } from './middleware/tracing.js';
import { createLogger, type LogCallback } from './middleware/logger.js';
import { createBodyLimit } from './middleware/body-limit.js';
import { createHealthRoutes } from './routes/health.js';
import { createProductionPlanRoutes } from './routes/production-plan.js';
import type { DispatchConfig } from './config.js';
import './types/hono-env.js';

export interface DispatchApp {
  app: Hono;
  log: LogCallback;
}

export interface DispatchAppOptions {
  /** Log sink; defaults to stdout. */
  write?: (line: string) => void;
}

/**
 * Create and configure the dispatch Hono application.
 */
export function createDispatchApp(config: DispatchConfig, opts: DispatchAppOptions = {}): DispatchApp {
  const app = new Hono();
  const { middleware: loggerMiddleware, log } = createLogger('merit-dispatch', config.logLevel, opts.write);

  // Middleware ordering:
  // 1. requestId — id exists before anything logs or traces
  // 2. tracing — span per request, traceparent on the response
  // 3. secureHeaders
  // 4. cors — before body handling so preflights short-circuit
  // 5. bodyLimit — reject oversized payloads before parsing
  // 6. responseTime
  // 7. logger — access line with the final status
  app.use('*', requestId());
  app.use('*', createTracing());
  app.use('*', secureHeaders({
    strictTransportSecurity: 'max-age=31536000; includeSubDomains',
    xFrameOptions: 'DENY',
    referrerPolicy: 'no-referrer',
  }));
  app.use('*', createCors(config.corsOrigins));
  app.use('/productionplan', createBodyLimit(config.bodyLimitBytes));

  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();
    c.header('X-Response-Time', `${Date.now() - start}ms`);
  });

  app.use('*', loggerMiddleware);

  app.route('/health', createHealthRoutes());
  app.route('/productionplan', createProductionPlanRoutes({ log }));

  app.notFound((c) => c.json({ error: 'not_found', message: `No route for ${c.req.method} ${c.req.path}` }, 404));

  app.onError((err, c) => {
    log('error', {
      event: 'unhandled_error',
      message: err.message,
      path: c.req.path,
    });
    return c.json({ error: 'internal_error', message: 'Internal server error' }, 500);
  });

  return { app, log };
}
