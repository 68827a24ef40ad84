/**
 * Span Sanitizer — allowlisted OpenTelemetry span creation.
 *
 * Each span name has a fixed set of attributes it may carry; anything else is
 * dropped, as are values that are not string/number/boolean. Request bodies
 * (fleet composition, prices) never reach the tracing backend this way.
 */
import { trace, type Span, type Attributes, SpanStatusCode } from '@opentelemetry/api';

const TRACER_NAME = 'merit-dispatch';

/** Error messages recorded on spans are cut to this many characters. */
const MAX_ERROR_MESSAGE_LENGTH = 256;

let _tracer: ReturnType<typeof trace.getTracer> | null = null;
function getTracer() {
  if (!_tracer) _tracer = trace.getTracer(TRACER_NAME);
  return _tracer;
}

const SPAN_ALLOWLISTS: Record<string, ReadonlySet<string>> = {
  'dispatch.request': new Set(['method', 'url', 'request_id', 'body_bytes', 'status_code', 'duration_ms']),
  'dispatch.plan': new Set([
    'plant_count',
    'load_mw',
    'outcome',
    'infeasibility_reason',
    'duration_ms',
  ]),
};

/**
 * Sanitize attributes for a span type.
 * Unknown span types get no attributes at all.
 */
export function sanitizeAttributes(
  spanName: string,
  attrs: Record<string, unknown>,
): Attributes {
  const allowlist = SPAN_ALLOWLISTS[spanName];
  if (!allowlist) return {};

  const sanitized: Attributes = {};
  for (const [key, value] of Object.entries(attrs)) {
    if (!allowlist.has(key)) continue;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      sanitized[key] = value;
    }
  }
  return sanitized;
}

/**
 * Add sanitized attributes to an existing span, for values only known
 * after the span started.
 */
export function addSanitizedAttributes(
  span: Span,
  spanName: string,
  attrs: Record<string, unknown>,
): void {
  span.setAttributes(sanitizeAttributes(spanName, attrs));
}

function truncateErrorMessage(msg: string): string {
  return msg.length > MAX_ERROR_MESSAGE_LENGTH ? `${msg.slice(0, MAX_ERROR_MESSAGE_LENGTH)}…` : msg;
}

/**
 * Run `fn` inside an active span whose attributes pass the allowlist.
 * The span is ended whether `fn` resolves or throws; errors are rethrown.
 *
 * ```ts
 * const plan = await startSanitizedSpan('dispatch.plan', { plant_count: 6 }, async () => computePlan(req));
 * ```
 */
export async function startSanitizedSpan<T>(
  spanName: string,
  attrs: Record<string, unknown>,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  const tracer = getTracer();
  const sanitized = sanitizeAttributes(spanName, attrs);

  return tracer.startActiveSpan(spanName, async (span) => {
    span.setAttributes(sanitized);
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (err) {
      const message = truncateErrorMessage(err instanceof Error ? err.message : String(err));
      span.setStatus({ code: SpanStatusCode.ERROR, message });
      span.recordException(new Error(message));
      throw err;
    } finally {
      span.end();
    }
  });
}
