import { describe, it } from "node:test";
import assert from "node:assert";
import { formatMonths, formatPercent, formatRate, formatSignedMonths, formatUsd } from "./format";

describe("format", () => {
  it("formatUsd groups thousands and drops decimals", () => {
    assert.strictEqual(formatUsd(1_025_000), "1,025,000 USD");
    assert.strictEqual(formatUsd(9_878.886), "9,879 USD");
    assert.strictEqual(formatUsd(1_025_000, "USDT"), "1,025,000 USDT");
  });

  it("formatMonths uses one decimal", () => {
    assert.strictEqual(formatMonths(5.825162714), "5.8 mo");
    assert.strictEqual(formatMonths(6), "6.0 mo");
  });

  it("formatSignedMonths always shows the sign", () => {
    assert.strictEqual(formatSignedMonths(0.051318284), "+0.05 mo");
    assert.strictEqual(formatSignedMonths(-0.5), "-0.50 mo");
    assert.strictEqual(formatSignedMonths(0), "0.00 mo");
  });

  it("formatPercent and formatRate", () => {
    assert.strictEqual(formatPercent(0.15), "15%");
    assert.strictEqual(formatPercent(0.002, 2), "0.20%");
    assert.strictEqual(formatRate(1.175), "1.175");
    assert.strictEqual(formatRate(3.6, 2), "3.60");
  });

  it("non-finite values render as a dash", () => {
    assert.strictEqual(formatUsd(Number.NaN), "—");
    assert.strictEqual(formatMonths(Number.POSITIVE_INFINITY), "—");
    assert.strictEqual(formatSignedMonths(undefined), "—");
    assert.strictEqual(formatPercent(null), "—");
    assert.strictEqual(formatRate(Number.NaN), "—");
  });
});
