/**
 * ApiError — Structured HTTP error class for the dispatch service.
 *
 * Extends native Error to keep `.stack` traces for logging while carrying
 * the HTTP `status` and a structured `body`. Catch handlers can use
 * `err instanceof ApiError` (or ApiError.isApiError) for type-safe matching.
 */
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { ErrorResponse } from './types.js';

/**
 * Extended error body that may include additional diagnostic fields
 * beyond the base ErrorResponse (e.g., the infeasibility reason).
 */
export type ApiErrorBody = ErrorResponse & Record<string, unknown>;

export class ApiError extends Error {
  /**
   * HTTP status code for the error response.
   */
  readonly status: ContentfulStatusCode;

  /**
   * Structured response body matching the ErrorResponse shape,
   * potentially with additional diagnostic fields.
   */
  readonly body: ApiErrorBody;

  /**
   * @param status - HTTP status code (e.g., 400, 413, 422, 500)
   * @param body - Structured error body with `error` and `message` fields
   */
  constructor(status: ContentfulStatusCode, body: ApiErrorBody) {
    super(`ApiError(${status}): ${body.message}`);
    this.name = 'ApiError';
    this.status = status;
    this.body = body;

    // Ensure prototype chain is correct for instanceof checks
    // (required when extending built-in classes in TypeScript)
    Object.setPrototypeOf(this, ApiError.prototype);
  }

  override toString(): string {
    return `ApiError(${this.status}): ${this.body.error} — ${this.body.message}`;
  }

  /**
   * Type guard: check if an unknown error is an ApiError.
   */
  static isApiError(err: unknown): err is ApiError {
    return err instanceof ApiError;
  }
}

export { toApiError } from './services/dispatch-errors.js';
