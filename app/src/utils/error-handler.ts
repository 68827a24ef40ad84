import type { Context } from 'hono';
import { ApiError } from '../errors.js';
import { DispatchError, toApiError } from '../services/dispatch-errors.js';

/**
 * Shared route error handler — maps ApiError and DispatchError to structured
 * JSON responses; everything else becomes a 500 with a generic message.
 */
export function handleRouteError(
  c: Context,
  err: unknown,
  fallbackMessage = 'Internal server error',
): Response {
  if (err instanceof DispatchError) {
    const apiErr = toApiError(err);
    return c.json(apiErr.body, apiErr.status);
  }
  if (ApiError.isApiError(err)) {
    return c.json(err.body, err.status);
  }
  return c.json({ error: 'internal_error', message: fallbackMessage }, 500);
}
