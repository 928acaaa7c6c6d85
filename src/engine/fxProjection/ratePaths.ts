/**
 * Exchange-rate paths over the horizon (pure, deterministic).
 */

import type { ProjectionParams } from "@/domain/treasury/treasury.schema";
import type { RatePaths } from "./types";

/**
 * `n` evenly spaced points from start to end, both endpoints included.
 * n = 1 gives [start]; the last point is exactly `end`.
 */
export function linearPath(start: number, end: number, n: number): number[] {
  if (n <= 0) return [];
  if (n === 1) return [start];
  const step = (end - start) / (n - 1);
  return Array.from({ length: n }, (_, i) => (i === n - 1 ? end : start + i * step));
}

export function constantPath(value: number, n: number): number[] {
  return Array.from({ length: Math.max(0, n) }, () => value);
}

/** Market paths interpolate start → end; hedge paths stay at the start rate. */
export function buildRatePaths(params: ProjectionParams): RatePaths {
  const n = params.horizonMonths;
  return {
    marketUsdPln: linearPath(params.usdPlnStart, params.usdPlnEnd, n),
    hedgeUsdPln: constantPath(params.usdPlnStart, n),
    marketEurUsd: linearPath(params.eurUsdStart, params.eurUsdEnd, n),
    hedgeEurUsd: constantPath(params.eurUsdStart, n),
  };
}
