/**
 * Monthly cost series in USD (pure, deterministic).
 * PLN costs convert at 1 / USD/PLN; EUR costs convert at EUR/USD.
 */

import type { ProjectionParams } from "@/domain/treasury/treasury.schema";
import { buildRatePaths } from "./ratePaths";

/**
 * USD cost of one month of PLN + EUR opex at the given rates.
 * @throws Error if usdPlnRate is not a positive finite number (rejected by ProjectionParamsSchema before this point).
 */
export function monthlyCost(usdPlnRate: number, eurUsdRate: number, plnCosts: number, eurCosts: number): number {
  if (!Number.isFinite(usdPlnRate) || usdPlnRate <= 0) {
    throw new Error(`[fxProjection] monthlyCost: USD/PLN rate must be a positive finite number, got ${usdPlnRate}.`);
  }
  return plnCosts / usdPlnRate + eurCosts * eurUsdRate;
}

function costsOverPaths(usdPln: number[], eurUsd: number[], params: ProjectionParams): number[] {
  return usdPln.map((rate, i) => monthlyCost(rate, eurUsd[i] ?? 0, params.plnCosts, params.eurCosts));
}

/** Costs at market (interpolated) rates. */
export function unhedgedCosts(params: ProjectionParams): number[] {
  const paths = buildRatePaths(params);
  return costsOverPaths(paths.marketUsdPln, paths.marketEurUsd, params);
}

/** Costs with every month at the frozen start rates (full hedge, no blend). */
export function hedgedCosts(params: ProjectionParams): number[] {
  const paths = buildRatePaths(params);
  return costsOverPaths(paths.hedgeUsdPln, paths.hedgeEurUsd, params);
}

/**
 * blended[i] = coverage * hedged[i] + (1 - coverage) * unhedged[i].
 * Coverage 0 and 1 return the unhedged / hedged series exactly.
 */
export function hedgedBlendCosts(params: ProjectionParams): number[] {
  const coverage = params.hedgeCoverage;
  if (coverage === 0) return unhedgedCosts(params);
  if (coverage === 1) return hedgedCosts(params);
  const unhedged = unhedgedCosts(params);
  return hedgedCosts(params).map((h, i) => coverage * h + (1 - coverage) * (unhedged[i] ?? 0));
}

/**
 * Per-month cost of executing the hedge:
 * hedged[i] * coverage * (otcSpread + bankSpread * (plnCosts / usdPlnStart) / hedged[i]).
 * The bank spread is weighted by the PLN-settled share of the hedged cost.
 * A month with zero hedged cost has zero execution cost.
 */
export function hedgingExecutionCost(params: ProjectionParams): number[] {
  const plnLegUsd = params.plnCosts / params.usdPlnStart;
  return hedgedCosts(params).map((h) => {
    if (h === 0) return 0;
    return h * params.hedgeCoverage * (params.otcSpread + (params.bankSpread * plnLegUsd) / h);
  });
}
