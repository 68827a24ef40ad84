import { createMiddleware } from 'hono/factory';

/**
 * Body size limit middleware.
 * Rejects requests whose Content-Length exceeds `maxBytes` before the plan
 * body is parsed. Requests without Content-Length pass through.
 */
export function createBodyLimit(maxBytes: number = 102_400) {
  return createMiddleware(async (c, next) => {
    const declared = Number(c.req.header('content-length') ?? '0');
    if (Number.isFinite(declared) && declared > maxBytes) {
      return c.json(
        { error: 'payload_too_large', message: `Body exceeds ${maxBytes} bytes` },
        413,
      );
    }
    await next();
  });
}
