/**
 * Dispatch domain types — fuel prices, plant specs and the production plan.
 *
 * Everything here is request-scoped: values are built from one request body,
 * flow through the planner once and are discarded.
 */

/** Closed set of plant technologies the cost model knows how to price. */
export const PLANT_TYPES = ['gasfired', 'turbojet', 'windturbine'] as const;

export type PlantType = (typeof PLANT_TYPES)[number];

export interface FuelPrices {
  /** Gas price (currency/MWh of fuel) */
  readonly gas: number;
  /** Kerosine price (currency/MWh of fuel) */
  readonly kerosine: number;
  /** CO2 allowance price (currency/ton) */
  readonly co2: number;
  /** Wind availability, 0–100 */
  readonly windPct: number;
}

export interface PlantSpec {
  readonly name: string;
  readonly type: PlantType;
  readonly efficiency: number;
  readonly pmin: number;
  readonly pmax: number;
}

export interface DispatchRequest {
  /** Demand to cover (MW) */
  readonly load: number;
  readonly fuels: FuelPrices;
  /** Input order drives tie-breaking and output ordering. */
  readonly plants: readonly PlantSpec[];
}

/** A plant priced against the current fuels. Engine-internal. */
export interface EvaluatedPlant {
  readonly plant: PlantSpec;
  /** Position in the request's plant list */
  readonly index: number;
  /** Currency/MWh produced */
  readonly marginalCost: number;
  readonly effectivePmin: number;
  readonly effectivePmax: number;
}

export interface ProductionAssignment {
  readonly name: string;
  /** MW, one decimal */
  readonly p: number;
}

/** Merit order row returned alongside a plan when diagnostics are requested. */
export interface MeritOrderEntry {
  readonly name: string;
  readonly type: PlantType;
  readonly marginalCost: number;
  readonly effectivePmin: number;
  readonly effectivePmax: number;
}

export interface PlanExplanation {
  readonly plan: ProductionAssignment[];
  readonly meritOrder: MeritOrderEntry[];
}
