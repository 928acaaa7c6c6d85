/**
 * FX projection engine — pure deterministic functions.
 * Rate paths, cost series, treasury depletion, runway, scenario expected value.
 */

export type {
  RatePaths,
  CostSeries,
  ScenarioExpectedValue,
  ScenarioRow,
  ProjectionMetrics,
  MonthlyRow,
  HedgingRecommendation,
  ProjectionResult,
} from "./types";

export { buildRatePaths, linearPath, constantPath } from "./ratePaths";
export { monthlyCost, unhedgedCosts, hedgedCosts, hedgedBlendCosts, hedgingExecutionCost } from "./costs";
export { cumulative, treasuryRemaining, runway } from "./runway";
export { scenarioExpectedValue, buildScenarioTable, hedgedHorizonTotal } from "./scenario";
export { computeProjection, buildRecommendation, round2 } from "./projection";
