import { MAX_HORIZON_MONTHS } from "@/domain/treasury/treasury.schema";
import type { FxScenario, ProjectionParams } from "@/domain/treasury/treasury.schema";

export { MAX_HORIZON_MONTHS };

/** Default treasury and cost assumptions (USDT treasury, PLN + EUR opex). */
export const DEFAULT_PROJECTION_PARAMS: ProjectionParams = {
  treasury: 1_025_000,
  plnCosts: 230_000,
  eurCosts: 95_000,
  horizonMonths: 6,
  usdPlnStart: 3.6,
  usdPlnEnd: 3.5,
  eurUsdStart: 1.175,
  eurUsdEnd: 1.2,
  hedgeCoverage: 1,
  otcSpread: 0.002,
  bankSpread: 0.0015,
};

/** Static future-rate scenarios for the expected-value table. */
export const DEFAULT_FX_SCENARIOS: FxScenario[] = [
  { id: "strong-usd", name: "Strong USD", usdPln: 3.85, eurUsd: 1.1, probability: 0.15 },
  { id: "stabilisation", name: "Stabilisation", usdPln: 3.58, eurUsd: 1.18, probability: 0.25 },
  { id: "consensus", name: "Consensus (weak USD)", usdPln: 3.5, eurUsd: 1.2, probability: 0.6 },
];

export type NumericInputBounds = {
  min: number;
  max: number;
  step: number;
};

/**
 * Dashboard input bounds. Percent fields are edited in percent and divided by 100
 * before validation; the schema itself accepts any fraction in [0, 1].
 */
export const PARAM_INPUT_BOUNDS = {
  treasury: { min: 0, max: 100_000_000, step: 50_000 },
  eurCosts: { min: 0, max: 10_000_000, step: 5_000 },
  plnCosts: { min: 0, max: 50_000_000, step: 10_000 },
  horizonMonths: { min: 1, max: MAX_HORIZON_MONTHS, step: 1 },
  usdPln: { min: 0.01, max: 20, step: 0.01 },
  eurUsd: { min: 0.01, max: 5, step: 0.005 },
  hedgeCoveragePct: { min: 0, max: 100, step: 1 },
  otcSpreadPct: { min: 0.05, max: 0.5, step: 0.05 },
  bankSpreadPct: { min: 0.05, max: 0.3, step: 0.05 },
} as const satisfies Record<string, NumericInputBounds>;
