/**
 * Rounding & Reconciliation — turns raw MW into the reported 0.1 MW plan.
 *
 * All arithmetic happens in integer tenths of a MW so the reported sum is
 * exact. Each running plant is rounded half-up, then clamped into its own
 * range (a 11.88 MW wind cap reports 11.8, not 11.9). The residual against
 * the load goes to the running plant with the largest output (ties by merit
 * order); if that plant cannot absorb it within its bounds, the next-largest
 * does. A plant whose range contains no whole tenth reports 0 and its share
 * moves to the others.
 */
import type { EvaluatedPlant, ProductionAssignment } from '../types/dispatch.js';
import { InfeasibleDemandError } from './dispatch-errors.js';

/** Tenths of a MW the reported sum may differ from the load. */
const RESIDUAL_BAND_TENTHS = 1;

/** Guards x × 10 landing a hair under .5 (0.15 × 10 = 1.4999999999999998). */
const HALF_UP_EPSILON = 1e-9;

export function toTenths(mw: number): number {
  return Math.floor(mw * 10 + 0.5 + HALF_UP_EPSILON);
}

interface Slot {
  readonly plant: EvaluatedPlant;
  /** Merit position, for tie-breaks */
  readonly rank: number;
  readonly minTenths: number;
  readonly maxTenths: number;
  tenths: number;
}

/**
 * @param raw - unrounded MW per plant name, from allocate()
 * @param sorted - merit-ordered plants (rank = position)
 * @param load - demand the plan must sum to
 * @returns one assignment per plant, in input order
 */
export function finalize(
  raw: ReadonlyMap<string, number>,
  sorted: readonly EvaluatedPlant[],
  load: number,
): ProductionAssignment[] {
  const slots: Slot[] = sorted.map((plant, rank) => {
    const floorTenths = Math.ceil(plant.effectivePmin * 10 - HALF_UP_EPSILON);
    const capTenths = Math.floor(plant.effectivePmax * 10 + HALF_UP_EPSILON);
    // No tenth lies in [pmin, pmax] (e.g. 10.05–10.08): the plant can only report 0
    if (floorTenths > capTenths) {
      return { plant, rank, minTenths: 0, maxTenths: 0, tenths: 0 };
    }
    const rounded = toTenths(raw.get(plant.plant.name) ?? 0);
    const tenths = rounded > 0 ? Math.min(Math.max(rounded, floorTenths), capTenths) : 0;
    return { plant, rank, minTenths: floorTenths, maxTenths: capTenths, tenths };
  });

  const target = toTenths(load);
  let residual = target - slots.reduce((sum, s) => sum + s.tenths, 0);

  // Largest running output first, merit order on ties
  const candidates = slots
    .filter((s) => s.tenths > 0)
    .sort((a, b) => b.tenths - a.tenths || a.rank - b.rank);

  while (residual !== 0) {
    const absorber = candidates.find((s) => canAbsorb(s, residual));
    if (absorber) {
      absorber.tenths += residual;
      residual = 0;
      break;
    }

    const partial = candidates.find((s) => headroom(s, residual) !== 0);
    if (!partial) break;
    const step = headroom(partial, residual);
    partial.tenths += step;
    residual -= step;
  }

  if (Math.abs(residual) > RESIDUAL_BAND_TENTHS) {
    throw new InfeasibleDemandError(
      'rounding_conflict',
      `Rounded plan misses the load of ${load} MW by ${residual / 10} MW`,
    );
  }

  return [...slots]
    .sort((a, b) => a.plant.index - b.plant.index)
    .map((s) => ({ name: s.plant.plant.name, p: s.tenths / 10 }));
}

function canAbsorb(slot: Slot, delta: number): boolean {
  const next = slot.tenths + delta;
  return next >= slot.minTenths && next <= slot.maxTenths && next > 0;
}

/** Largest part of `delta` the slot can take (same sign as delta). */
function headroom(slot: Slot, delta: number): number {
  if (delta > 0) return Math.max(0, Math.min(delta, slot.maxTenths - slot.tenths));
  // Stay running: never below the floor, never below one tenth
  const floor = Math.max(slot.minTenths, 1);
  return Math.min(0, Math.max(delta, floor - slot.tenths));
}
