import { describe, it } from "node:test";
import assert from "node:assert";
import { DEFAULT_PROJECTION_PARAMS } from "@/config/treasuryDefaults";
import type { ProjectionParams } from "@/domain/treasury/treasury.schema";
import { hedgedBlendCosts, hedgedCosts, hedgingExecutionCost, monthlyCost, unhedgedCosts } from "./costs";

const approx = (actual: number, expected: number, tol = 1e-6) =>
  assert.ok(Math.abs(actual - expected) <= tol, `expected ${actual} ≈ ${expected}`);

const params: ProjectionParams = DEFAULT_PROJECTION_PARAMS;

describe("monthlyCost", () => {
  it("converts PLN at 1/USD-PLN and EUR at EUR/USD", () => {
    assert.strictEqual(monthlyCost(4, 1.5, 400, 100), 100 + 150);
    approx(monthlyCost(3.6, 1.175, 230_000, 95_000), 175_513.888889);
  });

  it("throws on a zero USD/PLN rate", () => {
    assert.throws(() => monthlyCost(0, 1.1, 230_000, 95_000), /USD\/PLN rate must be a positive finite number/);
  });

  it("throws on a negative USD/PLN rate", () => {
    assert.throws(() => monthlyCost(-1, 1.1, 1, 1));
  });
});

describe("unhedgedCosts", () => {
  it("applies monthlyCost along the market paths", () => {
    const costs = unhedgedCosts(params);
    assert.strictEqual(costs.length, 6);
    [175513.888889, 176345.810056, 177181.741573, 178021.751412, 178865.909091, 179714.285714].forEach((v, i) =>
      approx(costs[i] ?? NaN, v)
    );
  });
});

describe("hedgedBlendCosts", () => {
  const moving: ProjectionParams = { ...params, usdPlnEnd: 3.9, eurUsdEnd: 1.05, horizonMonths: 12 };

  it("coverage 0 equals unhedged costs exactly", () => {
    assert.deepStrictEqual(hedgedBlendCosts({ ...moving, hedgeCoverage: 0 }), unhedgedCosts(moving));
  });

  it("coverage 1 equals pure hedged costs exactly", () => {
    assert.deepStrictEqual(hedgedBlendCosts({ ...moving, hedgeCoverage: 1 }), hedgedCosts(moving));
  });

  it("partial coverage blends linearly", () => {
    const p = { ...moving, hedgeCoverage: 0.25 };
    const blend = hedgedBlendCosts(p);
    const u = unhedgedCosts(p);
    const h = hedgedCosts(p);
    blend.forEach((b, i) => approx(b, 0.25 * (h[i] ?? NaN) + 0.75 * (u[i] ?? NaN)));
  });

  it("pure hedged costs are constant", () => {
    const h = hedgedCosts(moving);
    assert.strictEqual(h.length, 12);
    assert.ok(h.every((v) => v === h[0]));
  });
});

describe("hedgingExecutionCost", () => {
  it("charges OTC on the hedged cost and the bank spread on the PLN leg only", () => {
    const exec = hedgingExecutionCost(params);
    assert.strictEqual(exec.length, 6);
    // 175513.888889 * 0.002 + 0.0015 * 230000 / 3.6
    exec.forEach((v) => approx(v, 446.861111));
  });

  it("scales with coverage", () => {
    const half = hedgingExecutionCost({ ...params, hedgeCoverage: 0.5 });
    half.forEach((v) => approx(v, 223.430556));
  });

  it("is zero when coverage is zero", () => {
    assert.deepStrictEqual(hedgingExecutionCost({ ...params, hedgeCoverage: 0 }), [0, 0, 0, 0, 0, 0]);
  });

  it("is zero when both cost inputs are zero", () => {
    const exec = hedgingExecutionCost({ ...params, plnCosts: 0, eurCosts: 0, horizonMonths: 3 });
    assert.deepStrictEqual(exec, [0, 0, 0]);
  });
});
