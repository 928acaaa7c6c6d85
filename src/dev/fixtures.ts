/**
 * Dev-only fixtures for Engine Health checks.
 * Deterministic parameter sets — same every run.
 */

import { DEFAULT_PROJECTION_PARAMS } from "@/config/treasuryDefaults";
import type { ProjectionParams } from "@/domain/treasury/treasury.schema";

function p(partial: Partial<ProjectionParams>): ProjectionParams {
  return { ...DEFAULT_PROJECTION_PARAMS, ...partial };
}

/** Realistic parameter sets: falling / rising rates, partial hedges, long and short horizons. */
export const baselineParams: ProjectionParams[] = [
  p({}),
  p({ horizonMonths: 12, hedgeCoverage: 0.5 }),
  p({ horizonMonths: 24, usdPlnEnd: 4.1, eurUsdEnd: 1.05, hedgeCoverage: 0.75 }),
  p({ treasury: 5_000_000, horizonMonths: 18, hedgeCoverage: 0.3, otcSpread: 0.005, bankSpread: 0.003 }),
  p({ plnCosts: 900_000, eurCosts: 10_000, horizonMonths: 9, usdPlnEnd: 3.2 }),
];

/** Boundary inputs: single month, zero costs, zero coverage, tiny treasury. */
export const edgeParams: ProjectionParams[] = [
  p({ horizonMonths: 1 }),
  p({ plnCosts: 0, eurCosts: 0 }),
  p({ hedgeCoverage: 0, otcSpread: 0, bankSpread: 0 }),
  p({ treasury: 1, horizonMonths: 24 }),
  p({ usdPlnStart: 3.5, usdPlnEnd: 3.5, eurUsdStart: 1.2, eurUsdEnd: 1.2 }),
];
