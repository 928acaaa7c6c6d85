/**
 * FX projection engine — types.
 * All series have length = params.horizonMonths; index 0 is the first forecast month.
 */

/** Market (interpolated) and hedged (frozen at start) rate paths. */
export type RatePaths = {
  marketUsdPln: number[];
  hedgeUsdPln: number[];
  marketEurUsd: number[];
  hedgeEurUsd: number[];
};

/** Monthly costs in USD per regime. */
export type CostSeries = {
  unhedged: number[];
  /** Pure hedge: every month at the frozen start rates. */
  hedged: number[];
  /** coverage * hedged + (1 - coverage) * unhedged. */
  hedgedBlend: number[];
  executionCost: number[];
  /** hedgedBlend + executionCost; what the hedged treasury actually pays. */
  hedgedTotal: number[];
};

export type ScenarioExpectedValue = {
  evUnhedged: number;
  evHedged: number;
  evSavings: number;
};

/** One row of the scenario analysis table. */
export type ScenarioRow = {
  scenarioId: string;
  name: string;
  probability: number;
  usdPln: number;
  eurUsd: number;
  monthlyCost: number;
  totalCost: number;
  /** treasury / monthlyCost, not capped at the horizon. Infinity when the monthly cost is 0. */
  runwayMonths: number;
  hedgedTotal: number;
  savings: number;
};

export type ProjectionMetrics = {
  runwayUnhedged: number;
  runwayHedged: number;
  runwayDelta: number;
  totalSavings: number;
};

/** Monthly breakdown row; numbers rounded to 2 decimals for display. */
export type MonthlyRow = {
  month: number;
  usdPln: number;
  eurUsd: number;
  costUnhedged: number;
  costHedged: number;
  executionCost: number;
  treasuryUnhedged: number;
  treasuryHedged: number;
};

export type HedgingRecommendation = {
  profitable: boolean;
  totalHedgingCost: number;
  grossSavings: number;
  netSavings: number;
  runwayExtension: number;
};

export type ProjectionResult = {
  months: number[];
  ratePaths: RatePaths;
  costs: CostSeries;
  cumulative: { unhedged: number[]; hedged: number[] };
  treasury: { unhedged: number[]; hedged: number[] };
  metrics: ProjectionMetrics;
  scenarios: {
    rows: ScenarioRow[];
    expectedValue: ScenarioExpectedValue;
  };
  monthlyRows: MonthlyRow[];
  recommendation: HedgingRecommendation;
};
