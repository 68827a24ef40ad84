/**
 * Allocation Engine — exact-match dispatch under minimum-output constraints.
 *
 * Two phases over a merit-ordered plant list:
 *
 * 1. Forward greedy pass. Each plant takes min(remaining, effectivePmax).
 * 2. Bounded local repair at the boundary plant. When the remainder is below
 *    a plant's effectivePmin that plant cannot run at exactly the remainder.
 *    The engine first tries to skip it (leave it off and let the costlier
 *    plants after it cover the rest). Only when nothing after it can, the
 *    committed plants yield output, most expensive first, until the boundary
 *    plant can run at its floor. Failing that, the most recently committed
 *    plant is switched off entirely and the boundary plant takes its share.
 *
 * The repair is a single step at the boundary: it lowers earlier plants
 * toward their own floors but never re-dispatches them.
 *
 * Output is raw (unrounded) MW keyed by plant name; rounding is
 * reconciliation.ts's job.
 */
import type { EvaluatedPlant } from '../types/dispatch.js';
import { InfeasibleDemandError } from './dispatch-errors.js';

/** Residual demand below this is treated as fully served (MW). */
export const LOAD_TOLERANCE_MW = 1e-6;

interface Commitment {
  readonly plant: EvaluatedPlant;
  readonly power: number;
}

/**
 * Allocate `load` across `sorted` (cheapest first).
 *
 * @returns raw output per plant name; every plant is present, idle plants at 0
 * @throws InfeasibleDemandError when capacity is short or minimum outputs
 *   make an exact match impossible
 */
export function allocate(sorted: readonly EvaluatedPlant[], load: number): Map<string, number> {
  const raw = new Map<string, number>(sorted.map((e) => [e.plant.name, 0]));
  if (load <= LOAD_TOLERANCE_MW) return raw;

  const capacity = sorted.reduce((sum, e) => sum + e.effectivePmax, 0);
  if (capacity < load - LOAD_TOLERANCE_MW) {
    throw new InfeasibleDemandError(
      'insufficient_capacity',
      `Load of ${load} MW exceeds available capacity of ${capacity} MW`,
      load - capacity,
    );
  }

  const commitments = dispatchFrom(sorted, 0, load, []);
  if (!commitments) {
    throw new InfeasibleDemandError(
      'minimum_output_conflict',
      `No combination of plants can produce exactly ${load} MW within their minimum output constraints`,
    );
  }

  for (const { plant, power } of commitments) {
    raw.set(plant.plant.name, power);
  }
  return raw;
}

/**
 * Greedy pass from `start` with `remaining` MW still to place.
 * Returns the full commitment list, or null when this branch cannot finish.
 */
function dispatchFrom(
  sorted: readonly EvaluatedPlant[],
  start: number,
  remaining: number,
  committed: readonly Commitment[],
): readonly Commitment[] | null {
  if (remaining <= LOAD_TOLERANCE_MW) return committed;
  if (start >= sorted.length) return null;

  const current = sorted[start];
  const want = Math.min(remaining, current.effectivePmax);

  // No capacity right now (e.g. becalmed wind farm)
  if (want <= LOAD_TOLERANCE_MW) {
    return dispatchFrom(sorted, start + 1, remaining, committed);
  }

  if (want >= current.effectivePmin - LOAD_TOLERANCE_MW) {
    const power = Math.max(want, current.effectivePmin);
    return dispatchFrom(sorted, start + 1, remaining - power, [...committed, { plant: current, power }]);
  }

  // Boundary plant: remainder is below its floor.
  const skipped = dispatchFrom(sorted, start + 1, remaining, committed);
  if (skipped) return skipped;

  return repairBoundary(committed, current, remaining);
}

/**
 * Make room for `boundary` at the expense of the committed plants.
 *
 * Preferred: lower committed plants, most expensive first, each no further
 * than its own floor, until the boundary plant can run at exactly its floor.
 * Fallback: switch the last plant off and give its output plus the remainder
 * to the boundary plant.
 */
function repairBoundary(
  committed: readonly Commitment[],
  boundary: EvaluatedPlant,
  remaining: number,
): readonly Commitment[] | null {
  if (committed.length === 0) return null;

  const trimmed = trimToFloor(committed, boundary.effectivePmin - remaining);
  if (trimmed) {
    return [...trimmed, { plant: boundary, power: boundary.effectivePmin }];
  }

  const last = committed[committed.length - 1];
  const takeoverShare = remaining + last.power;
  if (fits(boundary, takeoverShare)) {
    return [...committed.slice(0, -1), { plant: boundary, power: takeoverShare }];
  }

  return null;
}

/**
 * Free `deficit` MW from `committed`, walking back from the costliest plant.
 * Returns null when the plants' floors leave less than that to give.
 */
function trimToFloor(committed: readonly Commitment[], deficit: number): Commitment[] | null {
  const result = [...committed];
  let owed = deficit;
  for (let i = result.length - 1; i >= 0 && owed > LOAD_TOLERANCE_MW; i--) {
    const { plant, power } = result[i];
    const give = Math.min(owed, Math.max(0, power - plant.effectivePmin));
    if (give <= 0) continue;
    result[i] = { plant, power: power - give };
    owed -= give;
  }
  return owed > LOAD_TOLERANCE_MW ? null : result;
}

function fits(plant: EvaluatedPlant, power: number): boolean {
  return (
    power >= plant.effectivePmin - LOAD_TOLERANCE_MW &&
    power <= plant.effectivePmax + LOAD_TOLERANCE_MW
  );
}
