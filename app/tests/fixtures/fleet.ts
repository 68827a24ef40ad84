import type { DispatchRequest, EvaluatedPlant, PlantSpec, PlantType } from '../../src/types/dispatch.js';

/** Six-plant fleet: two large CCGTs, one small gas plant, a turbojet, two wind parks. */
export const SAMPLE_PLANTS: PlantSpec[] = [
  { name: 'gasfiredbig1', type: 'gasfired', efficiency: 0.53, pmin: 100, pmax: 460 },
  { name: 'gasfiredbig2', type: 'gasfired', efficiency: 0.53, pmin: 100, pmax: 460 },
  { name: 'gasfiredsomewhatsmaller', type: 'gasfired', efficiency: 0.37, pmin: 40, pmax: 210 },
  { name: 'tj1', type: 'turbojet', efficiency: 0.3, pmin: 0, pmax: 16 },
  { name: 'windpark1', type: 'windturbine', efficiency: 1, pmin: 0, pmax: 150 },
  { name: 'windpark2', type: 'windturbine', efficiency: 1, pmin: 0, pmax: 36 },
];

export function sampleRequest(overrides: Partial<DispatchRequest> = {}): DispatchRequest {
  return {
    load: 910,
    fuels: { gas: 13.4, kerosine: 50.8, co2: 20, windPct: 60 },
    plants: SAMPLE_PLANTS,
    ...overrides,
  };
}

/** Same request as sampleRequest(), in the HTTP wire format. */
export function samplePayload(load = 910): Record<string, unknown> {
  return {
    load,
    fuels: {
      'gas(euro/MWh)': 13.4,
      'kerosine(euro/MWh)': 50.8,
      'co2(euro/ton)': 20,
      'wind(%)': 60,
    },
    powerplants: SAMPLE_PLANTS,
  };
}

/** Build an already-priced plant for engine-level tests. */
export function makeEvaluated(
  name: string,
  index: number,
  marginalCost: number,
  pmin: number,
  pmax: number,
  type: PlantType = 'gasfired',
): EvaluatedPlant {
  return {
    plant: { name, type, efficiency: type === 'windturbine' ? 1 : 0.5, pmin, pmax },
    index,
    marginalCost,
    effectivePmin: pmin,
    effectivePmax: pmax,
  };
}
