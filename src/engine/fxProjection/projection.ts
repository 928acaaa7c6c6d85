/**
 * Full projection: composes rate paths, cost series, treasury depletion, runway,
 * scenario analysis and the hedging recommendation into one result.
 */

import { DEFAULT_FX_SCENARIOS } from "@/config/treasuryDefaults";
import type { FxScenario, ProjectionParams } from "@/domain/treasury/treasury.schema";
import { buildRatePaths } from "./ratePaths";
import { hedgedBlendCosts, hedgedCosts, hedgingExecutionCost, unhedgedCosts } from "./costs";
import { cumulative, runway, treasuryRemaining } from "./runway";
import { buildScenarioTable, scenarioExpectedValue } from "./scenario";
import type { HedgingRecommendation, MonthlyRow, ProjectionResult } from "./types";

export function round2(x: number): number {
  return Math.round(x * 100) / 100;
}

function last(series: number[]): number {
  return series.length > 0 ? series[series.length - 1] ?? 0 : 0;
}

function sum(series: number[]): number {
  return series.reduce((s, v) => s + v, 0);
}

/**
 * Hedging pays off when the cost difference before execution costs exceeds the execution costs.
 * grossSavings = cumUnhedged[last] - (cumHedged[last] - totalHedgingCost).
 */
export function buildRecommendation(
  cumulativeUnhedged: number[],
  cumulativeHedged: number[],
  executionCost: number[],
  runwayDelta: number
): HedgingRecommendation {
  const totalHedgingCost = sum(executionCost);
  const grossSavings = last(cumulativeUnhedged) - (last(cumulativeHedged) - totalHedgingCost);
  return {
    profitable: grossSavings > totalHedgingCost,
    totalHedgingCost,
    grossSavings,
    netSavings: grossSavings - totalHedgingCost,
    runwayExtension: runwayDelta,
  };
}

/**
 * Computes every series and summary for validated params.
 * Params must have passed ProjectionParamsSchema (see parseProjectionParams).
 */
export function computeProjection(
  params: ProjectionParams,
  scenarios: FxScenario[] = DEFAULT_FX_SCENARIOS
): ProjectionResult {
  const n = params.horizonMonths;
  const ratePaths = buildRatePaths(params);

  const unhedged = unhedgedCosts(params);
  const hedged = hedgedCosts(params);
  const hedgedBlend = hedgedBlendCosts(params);
  const executionCost = hedgingExecutionCost(params);
  const hedgedTotal = hedgedBlend.map((c, i) => c + (executionCost[i] ?? 0));

  const cumulativeUnhedged = cumulative(unhedged);
  const cumulativeHedged = cumulative(hedgedTotal);
  const treasuryUnhedged = treasuryRemaining(params.treasury, cumulativeUnhedged);
  const treasuryHedged = treasuryRemaining(params.treasury, cumulativeHedged);

  const runwayUnhedged = runway(params.treasury, unhedged);
  const runwayHedged = runway(params.treasury, hedgedTotal);
  const runwayDelta = runwayHedged - runwayUnhedged;

  const monthlyRows: MonthlyRow[] = Array.from({ length: n }, (_, i) => ({
    month: i + 1,
    usdPln: round2(ratePaths.marketUsdPln[i] ?? 0),
    eurUsd: round2(ratePaths.marketEurUsd[i] ?? 0),
    costUnhedged: round2(unhedged[i] ?? 0),
    costHedged: round2(hedgedBlend[i] ?? 0),
    executionCost: round2(executionCost[i] ?? 0),
    treasuryUnhedged: round2(treasuryUnhedged[i] ?? 0),
    treasuryHedged: round2(treasuryHedged[i] ?? 0),
  }));

  return {
    months: Array.from({ length: n }, (_, i) => i + 1),
    ratePaths,
    costs: { unhedged, hedged, hedgedBlend, executionCost, hedgedTotal },
    cumulative: { unhedged: cumulativeUnhedged, hedged: cumulativeHedged },
    treasury: { unhedged: treasuryUnhedged, hedged: treasuryHedged },
    metrics: {
      runwayUnhedged,
      runwayHedged,
      runwayDelta,
      totalSavings: last(cumulativeUnhedged) - last(cumulativeHedged),
    },
    scenarios: {
      rows: buildScenarioTable(scenarios, params),
      expectedValue: scenarioExpectedValue(scenarios, params),
    },
    monthlyRows,
    recommendation: buildRecommendation(cumulativeUnhedged, cumulativeHedged, executionCost, runwayDelta),
  };
}
