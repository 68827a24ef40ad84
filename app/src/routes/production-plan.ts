import { Hono } from 'hono';
import { z } from 'zod';
import type { DispatchRequest, FuelPrices } from '../types/dispatch.js';
import { PLANT_TYPES } from '../types/dispatch.js';
import type { LogCallback } from '../middleware/logger.js';
import { assertValidRequest, explainPlan } from '../services/production-planner.js';
import { DispatchError, InfeasibleDemandError } from '../services/dispatch-errors.js';
import { addSanitizedAttributes, startSanitizedSpan } from '../utils/span-sanitizer.js';
import { handleRouteError } from '../utils/error-handler.js';

// ─── Request Schemas ──────────────────────────────────────────

/**
 * Fuel keys as published by market feeds, with the bare names accepted as
 * aliases. First match wins.
 */
const FUEL_KEYS: Record<keyof FuelPrices, readonly string[]> = {
  gas: ['gas(euro/MWh)', 'gas'],
  kerosine: ['kerosine(euro/MWh)', 'kerosine'],
  co2: ['co2(euro/ton)', 'co2'],
  windPct: ['wind(%)', 'wind'],
};

function pickFuel(raw: Record<string, number>, keys: readonly string[]): number | undefined {
  for (const key of keys) {
    if (key in raw) return raw[key];
  }
  return undefined;
}

const FuelsSchema = z
  .record(z.string(), z.number().finite())
  .transform((raw, ctx): FuelPrices => {
    const gas = pickFuel(raw, FUEL_KEYS.gas);
    const kerosine = pickFuel(raw, FUEL_KEYS.kerosine);
    const co2 = pickFuel(raw, FUEL_KEYS.co2);
    const windPct = pickFuel(raw, FUEL_KEYS.windPct);
    if (gas === undefined || kerosine === undefined || co2 === undefined || windPct === undefined) {
      const missing = (Object.keys(FUEL_KEYS) as (keyof FuelPrices)[])
        .filter((field) => pickFuel(raw, FUEL_KEYS[field]) === undefined)
        .map((field) => FUEL_KEYS[field][0]);
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing fuel value: ${missing.join(', ')}` });
      return z.NEVER;
    }
    return { gas, kerosine, co2, windPct };
  })
  .refine((f) => f.gas >= 0 && f.kerosine >= 0 && f.co2 >= 0, {
    message: 'Fuel prices must be non-negative',
  })
  .refine((f) => f.windPct >= 0 && f.windPct <= 100, {
    message: 'wind(%) must be between 0 and 100',
  });

const PowerPlantSchema = z.object({
  name: z.string().min(1).max(128),
  type: z.enum(PLANT_TYPES),
  efficiency: z.number().finite().min(0).max(1),
  pmin: z.number().finite().min(0),
  pmax: z.number().finite().min(0),
});

const ProductionPlanRequestSchema = z.object({
  load: z.number().finite().min(0),
  fuels: FuelsSchema,
  powerplants: z.array(PowerPlantSchema).max(1_000),
});

export type ProductionPlanRequest = z.infer<typeof ProductionPlanRequestSchema>;

function describeIssue(issue: z.ZodIssue | undefined): string {
  if (!issue) return 'Invalid request body';
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}

// ─── Dependencies ─────────────────────────────────────────────

export interface ProductionPlanRouteDeps {
  log?: LogCallback;
}

/**
 * Production plan routes.
 *
 * Endpoints:
 * - POST /  — compute the plan; `?explain=true` adds the merit order
 *
 * Status codes: 200 plan, 400 malformed request, 422 demand cannot be met,
 * 500 unexpected failure.
 */
export function createProductionPlanRoutes(deps: ProductionPlanRouteDeps = {}): Hono {
  const { log } = deps;
  const app = new Hono();

  app.post('/', async (c): Promise<Response> => {
    const raw: unknown = await c.req.json().catch(() => null);
    const parsed = ProductionPlanRequestSchema.safeParse(raw);
    if (!parsed.success) {
      return c.json({ error: 'invalid_request', message: describeIssue(parsed.error.issues[0]) }, 400);
    }

    const request: DispatchRequest = {
      load: parsed.data.load,
      fuels: parsed.data.fuels,
      plants: parsed.data.powerplants,
    };
    const explain = c.req.query('explain') === 'true';
    const requestId = c.get('requestId') ?? '';
    const start = Date.now();

    try {
      assertValidRequest(request);

      const result = await startSanitizedSpan(
        'dispatch.plan',
        { plant_count: request.plants.length, load_mw: request.load },
        async (span) => {
          try {
            const explanation = explainPlan(request, { log });
            addSanitizedAttributes(span, 'dispatch.plan', {
              outcome: 'planned',
              duration_ms: Date.now() - start,
            });
            return explanation;
          } catch (err) {
            if (err instanceof InfeasibleDemandError) {
              addSanitizedAttributes(span, 'dispatch.plan', {
                outcome: 'infeasible',
                infeasibility_reason: err.reason,
                duration_ms: Date.now() - start,
              });
            }
            throw err;
          }
        },
      );

      log?.('info', {
        event: 'plan_computed',
        request_id: requestId,
        plant_count: request.plants.length,
        load_mw: request.load,
        duration_ms: Date.now() - start,
      });

      return explain ? c.json(result) : c.json(result.plan);
    } catch (err) {
      if (err instanceof InfeasibleDemandError) {
        log?.('warn', {
          event: 'plan_infeasible',
          request_id: requestId,
          reason: err.reason,
          message: err.message,
        });
      } else if (!(err instanceof DispatchError)) {
        log?.('error', {
          event: 'plan_error',
          request_id: requestId,
          message: err instanceof Error ? err.message : String(err),
        });
      }
      return handleRouteError(c, err, 'Internal server error while calculating production plan');
    }
  });

  return app;
}
