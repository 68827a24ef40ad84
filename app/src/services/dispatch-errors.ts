/**
 * Dispatch Errors — failure taxonomy for the production planner.
 *
 * - InvalidInputError: the request is structurally wrong (negative load,
 *   pmax < pmin, duplicate names...). Normally caught by the route schema
 *   before the planner runs.
 * - InfeasibleDemandError: the request is well-formed but no plan satisfies
 *   it. Raised from inside the allocation engine or reconciliation.
 *
 * toApiError() maps both onto ApiError for the HTTP layer.
 */
import { ApiError } from '../errors.js';
import type { ApiErrorBody } from '../errors.js';

export type DispatchErrorCode = 'invalid_input' | 'infeasible_demand';

export type InfeasibilityReason =
  | 'insufficient_capacity'
  | 'minimum_output_conflict'
  | 'rounding_conflict';

export abstract class DispatchError extends Error {
  abstract readonly code: DispatchErrorCode;
}

export class InvalidInputError extends DispatchError {
  readonly code = 'invalid_input' as const;
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = 'InvalidInputError';
    this.field = field;
  }
}

export class InfeasibleDemandError extends DispatchError {
  readonly code = 'infeasible_demand' as const;
  readonly reason: InfeasibilityReason;
  /** Unserved MW, when the failure is a capacity shortfall */
  readonly shortfallMw: number | null;

  constructor(reason: InfeasibilityReason, message: string, shortfallMw: number | null = null) {
    super(message);
    this.name = 'InfeasibleDemandError';
    this.reason = reason;
    this.shortfallMw = shortfallMw;
  }
}

/**
 * Convert a DispatchError to an ApiError.
 *
 * - invalid_input → 400
 * - infeasible_demand → 422 (request understood, demand cannot be met)
 */
export function toApiError(err: DispatchError): ApiError {
  if (err instanceof InfeasibleDemandError) {
    const body: ApiErrorBody = {
      error: err.code,
      message: err.message,
      reason: err.reason,
    };
    if (err.shortfallMw !== null) {
      body.shortfall_mw = err.shortfallMw;
    }
    return new ApiError(422, body);
  }

  if (err instanceof InvalidInputError) {
    return new ApiError(400, { error: 'invalid_request', message: err.message, field: err.field });
  }

  return new ApiError(400, { error: err.code, message: err.message });
}
