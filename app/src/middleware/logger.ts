import { createMiddleware } from 'hono/factory';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'] as const;

/** Log callback handed to services (dependency injection). */
export type LogCallback = (level: LogLevel, data: Record<string, unknown>) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Structured JSON logger.
 *
 * Emits one JSON log line per request to stdout with:
 * - level, timestamp, service, request_id, trace_id
 * - method, path, status, latency_ms
 */
export function createLogger(
  serviceName: string,
  configuredLevel: LogLevel = 'info',
  write: (line: string) => void = (line) => process.stdout.write(line),
) {
  const threshold = LEVEL_ORDER[configuredLevel];

  const log: LogCallback = (level, data) => {
    if (LEVEL_ORDER[level] > threshold) return;
    const entry = {
      level,
      timestamp: new Date().toISOString(),
      service: serviceName,
      ...data,
    };
    write(JSON.stringify(entry) + '\n');
  };

  const middleware = createMiddleware(async (c, next) => {
    const start = Date.now();
    await next();
    const latencyMs = Date.now() - start;

    const requestId = c.res.headers.get('X-Request-Id') ?? '';
    const traceId = c.res.headers.get('x-trace-id') ?? undefined;
    const status = c.res.status;

    const level: LogLevel = status >= 500 ? 'error' : status >= 400 ? 'warn' : 'info';

    log(level, {
      request_id: requestId,
      method: c.req.method,
      path: new URL(c.req.url).pathname,
      status,
      latency_ms: latencyMs,
      ...(traceId ? { trace_id: traceId } : {}),
    });
  });

  return { middleware, log };
}
