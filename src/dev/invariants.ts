/**
 * Dev-only shared invariant helpers for Engine Health.
 * Deterministic predicates and tolerances — no side effects.
 */

export const TOLERANCE = 1e-9;

export function approxEqual(a: number, b: number, tolerance = TOLERANCE): boolean {
  return Math.abs(a - b) <= tolerance * Math.max(1, Math.abs(a), Math.abs(b));
}

export function noNaNOrInfinity(arr: number[]): boolean {
  return arr.every((v) => Number.isFinite(v));
}

export function allSameLength(series: number[][], length: number): boolean {
  return series.every((s) => s.length === length);
}

export function isConstantAt(arr: number[], value: number): boolean {
  return arr.every((v) => v === value);
}

export function isNonDecreasing(arr: number[]): boolean {
  for (let i = 1; i < arr.length; i++) {
    if ((arr[i] ?? 0) < (arr[i - 1] ?? 0)) return false;
  }
  return true;
}

export function inClosedRange(x: number, min: number, max: number): boolean {
  return Number.isFinite(x) && x >= min && x <= max;
}

export function seriesApproxEqual(a: number[], b: number[], tolerance = TOLERANCE): boolean {
  return a.length === b.length && a.every((v, i) => approxEqual(v, b[i] ?? Number.NaN, tolerance));
}
