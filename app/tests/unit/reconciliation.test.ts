import { describe, it, expect } from 'vitest';
import { finalize, toTenths } from '../../src/services/reconciliation.js';
import { InfeasibleDemandError } from '../../src/services/dispatch-errors.js';
import { makeEvaluated } from '../fixtures/fleet.js';

describe('toTenths', () => {
  it('rounds half up', () => {
    expect(toTenths(0.05)).toBe(1);
    expect(toTenths(0.15)).toBe(2);
    expect(toTenths(2.25)).toBe(23);
    expect(toTenths(2.24)).toBe(22);
  });

  it('absorbs floating error just below a tenth', () => {
    expect(toTenths(910 - 90 - 21.6 - 460)).toBe(3384);
  });
});

describe('finalize', () => {
  it('rounds each output to 0.1 MW when the sum already matches', () => {
    const sorted = [makeEvaluated('a', 0, 10, 0, 100), makeEvaluated('b', 1, 20, 0, 100)];
    const raw = new Map([['a', 100 / 3], ['b', 200 / 3]]);

    expect(finalize(raw, sorted, 100)).toEqual([
      { name: 'a', p: 33.3 },
      { name: 'b', p: 66.7 },
    ]);
  });

  it('gives a positive residual to the largest output, merit order breaking ties', () => {
    const sorted = [
      makeEvaluated('a', 0, 10, 0, 100),
      makeEvaluated('b', 1, 20, 0, 100),
      makeEvaluated('c', 2, 30, 0, 100),
    ];
    const third = 100 / 3;
    const raw = new Map([['a', third], ['b', third], ['c', third]]);

    expect(finalize(raw, sorted, 100)).toEqual([
      { name: 'a', p: 33.4 },
      { name: 'b', p: 33.3 },
      { name: 'c', p: 33.3 },
    ]);
  });

  it('takes a negative residual from the largest output', () => {
    const sorted = [makeEvaluated('a', 0, 10, 0, 100), makeEvaluated('b', 1, 20, 0, 100)];
    const raw = new Map([['a', 10.06], ['b', 10.06]]);

    expect(finalize(raw, sorted, 20.1)).toEqual([
      { name: 'a', p: 10 },
      { name: 'b', p: 10.1 },
    ]);
  });

  it('moves to the next-largest plant when the largest is at its maximum', () => {
    const sorted = [makeEvaluated('a', 0, 10, 0, 50), makeEvaluated('b', 1, 20, 0, 100)];
    const raw = new Map([['a', 50], ['b', 20.04]]);

    expect(finalize(raw, sorted, 70.1)).toEqual([
      { name: 'a', p: 50 },
      { name: 'b', p: 20.1 },
    ]);
  });

  it('never reports wind above its available capacity', () => {
    const wind = { ...makeEvaluated('wind', 0, 0, 0, 36, 'windturbine'), effectivePmax: 11.88 };
    const sorted = [wind, makeEvaluated('gas', 1, 20, 0, 100)];
    const raw = new Map([['wind', 11.88], ['gas', 8.12]]);

    expect(finalize(raw, sorted, 20)).toEqual([
      { name: 'wind', p: 11.8 },
      { name: 'gas', p: 8.2 },
    ]);
  });

  it('reports plants in input order, idle ones at zero', () => {
    // merit order: c, a, b
    const sorted = [
      makeEvaluated('c', 2, 0, 0, 100, 'windturbine'),
      makeEvaluated('a', 0, 10, 0, 100),
      makeEvaluated('b', 1, 20, 0, 100),
    ];
    const raw = new Map([['c', 100], ['a', 25], ['b', 0]]);

    expect(finalize(raw, sorted, 125)).toEqual([
      { name: 'a', p: 25 },
      { name: 'b', p: 0 },
      { name: 'c', p: 100 },
    ]);
  });

  it('switches off a plant whose range holds no whole tenth', () => {
    const sorted = [makeEvaluated('a', 0, 10, 0, 100), makeEvaluated('narrow', 1, 20, 10.05, 10.08)];
    const raw = new Map([['a', 50], ['narrow', 10.06]]);

    expect(finalize(raw, sorted, 60.06)).toEqual([
      { name: 'a', p: 60.1 },
      { name: 'narrow', p: 0 },
    ]);
  });

  it('fails when the only running plant has no reportable tenth', () => {
    const sorted = [makeEvaluated('narrow', 0, 20, 10.05, 10.08)];
    const raw = new Map([['narrow', 10.06]]);

    let caught: unknown;
    try {
      finalize(raw, sorted, 10.06);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InfeasibleDemandError);
    expect(caught instanceof InfeasibleDemandError && caught.reason).toBe('rounding_conflict');
  });

  it('fails when rounding leaves more than 0.1 MW that no plant can absorb', () => {
    const sorted = [makeEvaluated('a', 0, 10, 0, 10)];
    const raw = new Map([['a', 10]]);

    expect(() => finalize(raw, sorted, 10.5)).toThrow(InfeasibleDemandError);
  });
});
