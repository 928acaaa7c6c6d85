/**
 * Static scenario analysis: fixed rate pairs weighted by probability.
 * Independent of the month-by-month rate paths.
 */

import type { FxScenario, ProjectionParams } from "@/domain/treasury/treasury.schema";
import { monthlyCost } from "./costs";
import type { ScenarioExpectedValue, ScenarioRow } from "./types";

/** Hedged total over the horizon at the start rates, spreads charged once on the whole amount. */
export function hedgedHorizonTotal(params: ProjectionParams): number {
  const hedgedMonthly = monthlyCost(params.usdPlnStart, params.eurUsdStart, params.plnCosts, params.eurCosts);
  return hedgedMonthly * params.horizonMonths * (1 + params.otcSpread + params.bankSpread);
}

function scenarioMonthlyCost(scenario: FxScenario, params: ProjectionParams): number {
  return monthlyCost(scenario.usdPln, scenario.eurUsd, params.plnCosts, params.eurCosts);
}

/**
 * evUnhedged = sum over scenarios of monthlyCost * horizon * probability.
 * evHedged uses the start rates. Probabilities are used as given (no normalisation).
 */
export function scenarioExpectedValue(scenarios: FxScenario[], params: ProjectionParams): ScenarioExpectedValue {
  const evUnhedged = scenarios.reduce(
    (sum, s) => sum + scenarioMonthlyCost(s, params) * params.horizonMonths * s.probability,
    0
  );
  const evHedged = hedgedHorizonTotal(params);
  return { evUnhedged, evHedged, evSavings: evUnhedged - evHedged };
}

export function buildScenarioTable(scenarios: FxScenario[], params: ProjectionParams): ScenarioRow[] {
  const hedgedTotal = hedgedHorizonTotal(params);
  return scenarios.map((s) => {
    const cost = scenarioMonthlyCost(s, params);
    const totalCost = cost * params.horizonMonths;
    return {
      scenarioId: s.id,
      name: s.name,
      probability: s.probability,
      usdPln: s.usdPln,
      eurUsd: s.eurUsd,
      monthlyCost: cost,
      totalCost,
      runwayMonths: cost > 0 ? params.treasury / cost : Number.POSITIVE_INFINITY,
      hedgedTotal,
      savings: totalCost - hedgedTotal,
    };
  });
}
