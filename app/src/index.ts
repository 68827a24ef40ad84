import { serve } from '@hono/node-server';
import { createDispatchApp } from './server.js';
import { loadConfig } from './config.js';
import { initTelemetry, shutdownTelemetry } from './telemetry.js';

const config = loadConfig();

// OTEL SDK must start before the app is built
const telemetrySdk = initTelemetry(config.otelEndpoint);

const { app, log } = createDispatchApp(config);

const server = serve(
  { fetch: app.fetch, port: config.port },
  (info) => {
    log('info', { event: 'listening', port: info.port, node_env: config.nodeEnv });
  },
);

let shuttingDown = false;
async function gracefulShutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  log('info', { event: 'shutdown', signal });

  server.close();

  try {
    await shutdownTelemetry(telemetrySdk);
  } catch (err) {
    log('warn', {
      event: 'telemetry_shutdown_error',
      message: err instanceof Error ? err.message : String(err),
    });
  }

  log('info', { event: 'shutdown_complete' });

  // Force exit if the event loop does not drain within 10s. Unref'd so it
  // does not itself keep the process alive.
  setTimeout(() => process.exit(1), 10_000).unref();
}

process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
