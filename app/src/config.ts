import { isLogLevel, type LogLevel } from './middleware/logger.js';

export interface DispatchConfig {
  port: number;
  corsOrigins: string[];
  /** Largest accepted request body (bytes) */
  bodyLimitBytes: number;
  nodeEnv: string;
  logLevel: LogLevel;
  otelEndpoint: string | null;
}

/**
 * Environment variables:
 *
 * DISPATCH_PORT               (optional) — HTTP listen port; default 8888
 * DISPATCH_CORS_ORIGINS       (optional) — comma-separated allowed origins; default http://localhost:{port}
 * DISPATCH_BODY_LIMIT_BYTES   (optional) — max request body size; default 102400
 * NODE_ENV                    (optional) — runtime environment; default 'development'
 * LOG_LEVEL                   (optional) — error | warn | info | debug; default 'info'
 * OTEL_EXPORTER_OTLP_ENDPOINT (optional) — OpenTelemetry collector endpoint; null disables tracing export
 */
export function loadConfig(): DispatchConfig {
  const port = parseIntEnv('DISPATCH_PORT', 8888);
  if (port < 1 || port > 65_535) {
    throw new Error(`DISPATCH_PORT must be between 1 and 65535 (got ${port})`);
  }

  const bodyLimitBytes = parseIntEnv('DISPATCH_BODY_LIMIT_BYTES', 102_400);
  if (bodyLimitBytes <= 0) {
    throw new Error(`DISPATCH_BODY_LIMIT_BYTES must be positive (got ${bodyLimitBytes})`);
  }

  const logLevelRaw = process.env.LOG_LEVEL ?? 'info';
  if (!isLogLevel(logLevelRaw)) {
    throw new Error(`LOG_LEVEL must be one of error, warn, info, debug (got ${logLevelRaw})`);
  }

  const corsOriginsRaw = process.env.DISPATCH_CORS_ORIGINS ?? `http://localhost:${port}`;
  const corsOrigins = corsOriginsRaw.split(',').map((o) => o.trim()).filter((o) => o.length > 0);

  return {
    port,
    corsOrigins,
    bodyLimitBytes,
    nodeEnv: process.env.NODE_ENV ?? 'development',
    logLevel: logLevelRaw,
    otelEndpoint: process.env.OTEL_EXPORTER_OTLP_ENDPOINT || null,
  };
}

function parseIntEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = Number.parseInt(raw, 10);
  if (!Number.isInteger(value) || String(value) !== raw.trim()) {
    throw new Error(`${name} must be an integer (got ${raw})`);
  }
  return value;
}
