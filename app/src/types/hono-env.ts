/**
 * Hono ContextVariableMap type augmentation — compile-time safety for c.set()/c.get().
 */
declare module 'hono' {
  interface ContextVariableMap {
    /** Unique request identifier (set by request-id middleware). */
    requestId: string;
    /** OTEL trace ID for log-trace correlation (set by tracing middleware). */
    traceId: string;
  }
}

export {};
