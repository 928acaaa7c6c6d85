/**
 * Display formatting for projection figures. Non-finite values render as "—".
 */

const DASH = "—";

const wholeNumber = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
});

/** 1025000 -> "1,025,000 USD" */
export function formatUsd(value: number | null | undefined, unit = "USD"): string {
  if (value == null || !Number.isFinite(value)) return DASH;
  return `${wholeNumber.format(value)} ${unit}`;
}

/** 5.8252 -> "5.8 mo" */
export function formatMonths(value: number | null | undefined): string {
  if (value == null || !Number.isFinite(value)) return DASH;
  return `${value.toFixed(1)} mo`;
}

/** 0.0513 -> "+0.05 mo"; used for runway deltas. */
export function formatSignedMonths(value: number | null | undefined): string {
  if (value == null || !Number.isFinite(value)) return DASH;
  const sign = value > 0 ? "+" : value < 0 ? "-" : "";
  return `${sign}${Math.abs(value).toFixed(2)} mo`;
}

/** Fraction to percent: 0.15 -> "15%", 0.002 with 2 digits -> "0.20%". */
export function formatPercent(value: number | null | undefined, digits = 0): string {
  if (value == null || !Number.isFinite(value)) return DASH;
  return `${(value * 100).toFixed(digits)}%`;
}

export function formatRate(value: number | null | undefined, digits = 3): string {
  if (value == null || !Number.isFinite(value)) return DASH;
  return value.toFixed(digits);
}
