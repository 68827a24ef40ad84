import { createMiddleware } from 'hono/factory';
import { propagation, context } from '@opentelemetry/api';
import { startSanitizedSpan, addSanitizedAttributes } from '../utils/span-sanitizer.js';

/**
 * One `dispatch.request` span per HTTP request.
 *
 * A caller's traceparent/tracestate becomes the parent, so a plan request
 * joins the trace of whatever scheduler or market gateway sent it. The span
 * carries the request id (mounted after requestId()) and the declared body
 * size, which tracks fleet size without recording the fleet itself; the
 * nested `dispatch.plan` span adds plant count and load once parsed.
 *
 * Responses carry traceparent plus x-trace-id / x-span-id; the access log
 * picks up x-trace-id from there.
 */
export function createTracing() {
  return createMiddleware(async (c, next) => {
    const start = Date.now();

    const carrier: Record<string, string> = {};
    const incoming = c.req.header('traceparent');
    if (incoming) carrier['traceparent'] = incoming;
    const tracestate = c.req.header('tracestate');
    if (tracestate) carrier['tracestate'] = tracestate;
    const parentCtx = propagation.extract(context.active(), carrier);

    const declaredLength = c.req.header('content-length');
    const bodyBytes = declaredLength === undefined ? undefined : Number(declaredLength);

    await context.with(parentCtx, () =>
      startSanitizedSpan(
        'dispatch.request',
        {
          method: c.req.method,
          url: c.req.path,
          request_id: c.get('requestId'),
          body_bytes: Number.isFinite(bodyBytes) ? bodyBytes : undefined,
        },
        async (span) => {
          const ctx = span.spanContext();
          const flags = ctx.traceFlags.toString(16).padStart(2, '0');
          c.header('traceparent', `00-${ctx.traceId}-${ctx.spanId}-${flags}`);
          c.header('x-trace-id', ctx.traceId);
          c.header('x-span-id', ctx.spanId);
          c.set('traceId', ctx.traceId);

          await next();

          addSanitizedAttributes(span, 'dispatch.request', {
            status_code: c.res.status,
            duration_ms: Date.now() - start,
          });
        },
      ),
    );
  });
}
