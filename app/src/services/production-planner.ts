/**
 * Production Planner — the one entry point the HTTP layer calls.
 *
 * evaluate → merit order → allocate → finalize. Pure and synchronous: the same
 * request always yields the same plan, and nothing is shared between calls.
 */
import type {
  DispatchRequest,
  PlanExplanation,
  ProductionAssignment,
} from '../types/dispatch.js';
import type { LogCallback } from '../middleware/logger.js';
import { evaluateFleet } from './cost-model.js';
import { sortByMeritOrder, toMeritOrderEntries } from './merit-order.js';
import { allocate } from './allocation-engine.js';
import { finalize } from './reconciliation.js';
import { InvalidInputError } from './dispatch-errors.js';

export interface PlannerOptions {
  /** Debug hook: receives one entry per evaluated plant. */
  log?: LogCallback;
}

export function computePlan(request: DispatchRequest, opts?: PlannerOptions): ProductionAssignment[] {
  return explainPlan(request, opts).plan;
}

/** computePlan plus the merit order it was derived from. */
export function explainPlan(request: DispatchRequest, opts?: PlannerOptions): PlanExplanation {
  const sorted = sortByMeritOrder(evaluateFleet(request.plants, request.fuels));

  if (opts?.log) {
    for (const [rank, e] of sorted.entries()) {
      opts.log('debug', {
        event: 'plant_evaluated',
        plant: e.plant.name,
        rank,
        marginal_cost: e.marginalCost,
        effective_pmin: e.effectivePmin,
        effective_pmax: e.effectivePmax,
      });
    }
  }

  const raw = allocate(sorted, request.load);
  return {
    plan: finalize(raw, sorted, request.load),
    meritOrder: toMeritOrderEntries(sorted),
  };
}

/**
 * Structural checks the planner relies on. The route schema enforces the
 * same rules; this exists for callers that build requests in code.
 *
 * @throws InvalidInputError on the first violation found
 */
export function assertValidRequest(request: DispatchRequest): void {
  const { load, fuels, plants } = request;

  if (!Number.isFinite(load) || load < 0) {
    throw new InvalidInputError('load', `Load must be a non-negative number (got ${load})`);
  }
  for (const key of ['gas', 'kerosine', 'co2'] as const) {
    if (!Number.isFinite(fuels[key]) || fuels[key] < 0) {
      throw new InvalidInputError(`fuels.${key}`, `Fuel price ${key} must be a non-negative number`);
    }
  }
  if (!Number.isFinite(fuels.windPct) || fuels.windPct < 0 || fuels.windPct > 100) {
    throw new InvalidInputError('fuels.wind', `Wind availability must be between 0 and 100 (got ${fuels.windPct})`);
  }

  const seen = new Set<string>();
  for (const plant of plants) {
    if (seen.has(plant.name)) {
      throw new InvalidInputError('powerplants', `Duplicate plant name: ${plant.name}`);
    }
    seen.add(plant.name);

    if (plant.type !== 'windturbine' && !(plant.efficiency > 0 && plant.efficiency <= 1)) {
      throw new InvalidInputError(
        'powerplants',
        `Plant ${plant.name}: efficiency must be in (0, 1] (got ${plant.efficiency})`,
      );
    }
    if (!(plant.pmin >= 0)) {
      throw new InvalidInputError('powerplants', `Plant ${plant.name}: pmin must be non-negative`);
    }
    if (!(plant.pmax >= plant.pmin)) {
      throw new InvalidInputError(
        'powerplants',
        `Plant ${plant.name}: pmax (${plant.pmax}) is below pmin (${plant.pmin})`,
      );
    }
  }
}
