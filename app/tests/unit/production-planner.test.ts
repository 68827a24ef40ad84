import { describe, it, expect, vi } from 'vitest';
import {
  computePlan,
  explainPlan,
  assertValidRequest,
} from '../../src/services/production-planner.js';
import { evaluateFleet } from '../../src/services/cost-model.js';
import { InfeasibleDemandError, InvalidInputError } from '../../src/services/dispatch-errors.js';
import { SAMPLE_PLANTS, sampleRequest } from '../fixtures/fleet.js';

describe('computePlan', () => {
  it('dispatches wind, then the two large CCGTs, for 910 MW', () => {
    expect(computePlan(sampleRequest())).toEqual([
      { name: 'gasfiredbig1', p: 460 },
      { name: 'gasfiredbig2', p: 338.4 },
      { name: 'gasfiredsomewhatsmaller', p: 0 },
      { name: 'tj1', p: 0 },
      { name: 'windpark1', p: 90 },
      { name: 'windpark2', p: 21.6 },
    ]);
  });

  it('returns every plant at zero for zero load', () => {
    const plan = computePlan(sampleRequest({ load: 0 }));
    expect(plan.map((a) => a.p)).toEqual([0, 0, 0, 0, 0, 0]);
    expect(plan.map((a) => a.name)).toEqual(SAMPLE_PLANTS.map((p) => p.name));
  });

  it('produces nothing from wind at 0% availability', () => {
    const plan = computePlan(sampleRequest({
      load: 480,
      fuels: { gas: 13.4, kerosine: 50.8, co2: 20, windPct: 0 },
    }));
    expect(plan).toEqual([
      { name: 'gasfiredbig1', p: 440 },
      { name: 'gasfiredbig2', p: 0 },
      { name: 'gasfiredsomewhatsmaller', p: 40 },
      { name: 'tj1', p: 0 },
      { name: 'windpark1', p: 0 },
      { name: 'windpark2', p: 0 },
    ]);
  });

  it('backs off two wind parks so a gas plant can run at its floor', () => {
    const plan = computePlan({
      load: 55,
      fuels: { gas: 13.4, kerosine: 50.8, co2: 20, windPct: 100 },
      plants: [
        { name: 'windA', type: 'windturbine', efficiency: 1, pmin: 0, pmax: 10 },
        { name: 'windB', type: 'windturbine', efficiency: 1, pmin: 0, pmax: 10 },
        { name: 'gas', type: 'gasfired', efficiency: 0.5, pmin: 50, pmax: 100 },
      ],
    });
    expect(plan).toEqual([
      { name: 'windA', p: 5 },
      { name: 'windB', p: 0 },
      { name: 'gas', p: 50 },
    ]);
  });

  it('is deterministic for identical input', () => {
    const request = sampleRequest({ load: 150 });
    expect(computePlan(request)).toEqual(computePlan(request));
  });

  it.each([0, 50, 150, 480, 910, 1000, 1200, 1250])(
    'meets %d MW inside every plant\'s bounds',
    (load) => {
      const request = sampleRequest({ load });
      const plan = computePlan(request);
      const bounds = evaluateFleet(request.plants, request.fuels);

      const total = plan.reduce((sum, a) => sum + a.p, 0);
      expect(Math.abs(total - load)).toBeLessThanOrEqual(0.1 + 1e-9);

      plan.forEach((a, i) => {
        expect(a.name).toBe(bounds[i].plant.name);
        expect(a.p).toBeGreaterThanOrEqual(0);
        expect(a.p).toBeLessThanOrEqual(bounds[i].effectivePmax + 1e-9);
        if (a.p > 0) {
          expect(a.p).toBeGreaterThanOrEqual(bounds[i].effectivePmin - 1e-9);
        }
      });
    },
  );

  it('rejects demand above total available capacity', () => {
    expect(() => computePlan(sampleRequest({ load: 1300 }))).toThrow(InfeasibleDemandError);
  });

  it('rejects demand below a lone plant\'s minimum', () => {
    const request = {
      load: 30,
      fuels: { gas: 10, kerosine: 50, co2: 20, windPct: 50 },
      plants: [{ name: 'solo', type: 'gasfired' as const, efficiency: 0.5, pmin: 50, pmax: 100 }],
    };
    expect(() => computePlan(request)).toThrow(
      'No combination of plants can produce exactly 30 MW within their minimum output constraints',
    );
  });
});

describe('explainPlan', () => {
  it('returns the merit order next to the plan', () => {
    const { plan, meritOrder } = explainPlan(sampleRequest());

    expect(plan).toEqual(computePlan(sampleRequest()));
    expect(meritOrder.map((m) => m.name)).toEqual([
      'windpark1',
      'windpark2',
      'gasfiredbig1',
      'gasfiredbig2',
      'gasfiredsomewhatsmaller',
      'tj1',
    ]);
    expect(meritOrder[0].marginalCost).toBe(0);
    expect(meritOrder[2].marginalCost).toBeCloseTo(31.283, 3);
  });

  it('logs each evaluated plant at debug level', () => {
    const log = vi.fn();
    explainPlan(sampleRequest(), { log });

    expect(log).toHaveBeenCalledTimes(6);
    expect(log).toHaveBeenNthCalledWith(1, 'debug', expect.objectContaining({
      event: 'plant_evaluated',
      plant: 'windpark1',
      rank: 0,
    }));
  });
});

describe('assertValidRequest', () => {
  it('accepts the sample request', () => {
    expect(() => assertValidRequest(sampleRequest())).not.toThrow();
  });

  it('rejects a negative load', () => {
    expect(() => assertValidRequest(sampleRequest({ load: -1 }))).toThrow(InvalidInputError);
  });

  it('rejects duplicate plant names', () => {
    const plants = [...SAMPLE_PLANTS, { ...SAMPLE_PLANTS[0] }];
    expect(() => assertValidRequest(sampleRequest({ plants }))).toThrow(
      'Duplicate plant name: gasfiredbig1',
    );
  });

  it('rejects pmax below pmin', () => {
    const plants = [{ name: 'bad', type: 'gasfired' as const, efficiency: 0.5, pmin: 50, pmax: 10 }];
    expect(() => assertValidRequest(sampleRequest({ plants }))).toThrow(
      'Plant bad: pmax (10) is below pmin (50)',
    );
  });

  it('rejects zero efficiency for thermal plants only', () => {
    const gas = [{ name: 'g', type: 'gasfired' as const, efficiency: 0, pmin: 0, pmax: 10 }];
    const wind = [{ name: 'w', type: 'windturbine' as const, efficiency: 0, pmin: 0, pmax: 10 }];

    expect(() => assertValidRequest(sampleRequest({ plants: gas }))).toThrow(InvalidInputError);
    expect(() => assertValidRequest(sampleRequest({ plants: wind }))).not.toThrow();
  });

  it('rejects wind availability above 100%', () => {
    const fuels = { gas: 13.4, kerosine: 50.8, co2: 20, windPct: 120 };
    expect(() => assertValidRequest(sampleRequest({ fuels }))).toThrow(InvalidInputError);
  });
});
