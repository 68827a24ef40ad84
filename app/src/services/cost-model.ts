/**
 * Cost Model — prices a plant against the current fuels.
 *
 * Marginal cost is what one extra MWh of output costs right now:
 * - gasfired:    gas / efficiency + co2 × GAS_EMISSION_FACTOR
 * - turbojet:    kerosine / efficiency
 * - windturbine: 0, capacity scaled by wind availability
 *
 * Pure and total for validated input.
 */
import type { EvaluatedPlant, FuelPrices, PlantSpec } from '../types/dispatch.js';

/** Tons of CO2 emitted per MWh generated by a gas-fired plant. */
export const GAS_EMISSION_FACTOR = 0.3;

export function evaluatePlant(plant: PlantSpec, fuels: FuelPrices, index: number): EvaluatedPlant {
  switch (plant.type) {
    case 'gasfired':
      return {
        plant,
        index,
        marginalCost: fuels.gas / plant.efficiency + fuels.co2 * GAS_EMISSION_FACTOR,
        effectivePmin: plant.pmin,
        effectivePmax: plant.pmax,
      };
    case 'turbojet':
      return {
        plant,
        index,
        marginalCost: fuels.kerosine / plant.efficiency,
        effectivePmin: plant.pmin,
        effectivePmax: plant.pmax,
      };
    case 'windturbine':
      // Wind cannot be held at a floor: whatever blows is available, nothing more.
      return {
        plant,
        index,
        marginalCost: 0,
        effectivePmin: 0,
        effectivePmax: plant.pmax * (fuels.windPct / 100),
      };
    default:
      return assertNever(plant.type);
  }
}

/** Evaluate every plant, preserving input order. */
export function evaluateFleet(plants: readonly PlantSpec[], fuels: FuelPrices): EvaluatedPlant[] {
  return plants.map((plant, index) => evaluatePlant(plant, fuels, index));
}

function assertNever(value: never): never {
  throw new Error(`Unhandled plant type: ${String(value)}`);
}
