/**
 * Cumulative spend, remaining treasury and runway (pure, deterministic).
 */

/** Running sum: cum[0] = series[0], cum[i] = cum[i-1] + series[i]. */
export function cumulative(series: number[]): number[] {
  const out: number[] = [];
  let sum = 0;
  for (const v of series) {
    sum += v;
    out.push(sum);
  }
  return out;
}

/** treasury - cumulative[i]; negative once the treasury is exhausted. */
export function treasuryRemaining(treasury: number, cumulativeCosts: number[]): number[] {
  return cumulativeCosts.map((c) => treasury - c);
}

/**
 * Months until the treasury reaches zero, interpolated within the depleting month
 * (cost spent uniformly across the month). Returns costSeries.length when the balance
 * stays above zero for the whole series.
 *
 * Zero cost in the depleting month returns the month index with no fraction.
 * The fraction is floored at 0, so a treasury that starts at or below zero gives 0.
 */
export function runway(treasury: number, costSeries: number[]): number {
  let remaining = treasury;
  for (let i = 0; i < costSeries.length; i++) {
    const cost = costSeries[i] ?? 0;
    remaining -= cost;
    if (remaining <= 0) {
      if (cost === 0) return i;
      return i + Math.max(0, (remaining + cost) / cost);
    }
  }
  return costSeries.length;
}
