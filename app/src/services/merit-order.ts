import type { EvaluatedPlant, MeritOrderEntry } from '../types/dispatch.js';

/**
 * Order plants cheapest first. Equal costs keep their input order, so two
 * identical plants always dispatch in the same relative order.
 */
export function sortByMeritOrder(evaluated: readonly EvaluatedPlant[]): EvaluatedPlant[] {
  return [...evaluated].sort(
    (a, b) => a.marginalCost - b.marginalCost || a.index - b.index,
  );
}

export function toMeritOrderEntries(sorted: readonly EvaluatedPlant[]): MeritOrderEntry[] {
  return sorted.map((e) => ({
    name: e.plant.name,
    type: e.plant.type,
    marginalCost: e.marginalCost,
    effectivePmin: e.effectivePmin,
    effectivePmax: e.effectivePmax,
  }));
}
