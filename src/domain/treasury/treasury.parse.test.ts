import { describe, it } from "node:test";
import assert from "node:assert";
import { DEFAULT_FX_SCENARIOS, DEFAULT_PROJECTION_PARAMS } from "@/config/treasuryDefaults";
import { parseProjectionParams, parseScenarios } from "./treasury.parse";

describe("parseProjectionParams", () => {
  it("no input yields the defaults", () => {
    const result = parseProjectionParams(undefined);
    assert.deepStrictEqual(result, { ok: true, params: DEFAULT_PROJECTION_PARAMS });
  });

  it("merges a partial object over the base set", () => {
    const result = parseProjectionParams({ horizonMonths: 12, hedgeCoverage: 0.5 });
    assert(result.ok);
    assert.strictEqual(result.params.horizonMonths, 12);
    assert.strictEqual(result.params.hedgeCoverage, 0.5);
    assert.strictEqual(result.params.treasury, DEFAULT_PROJECTION_PARAMS.treasury);
  });

  it("explicit undefined fields keep the base value", () => {
    const result = parseProjectionParams({ treasury: undefined });
    assert(result.ok);
    assert.strictEqual(result.params.treasury, 1_025_000);
  });

  it("rejects a zero USD/PLN rate", () => {
    assert.deepStrictEqual(parseProjectionParams({ usdPlnStart: 0 }), {
      ok: false,
      errors: ["usdPlnStart: Number must be greater than 0"],
    });
  });

  it("rejects horizons outside 1–24", () => {
    assert.deepStrictEqual(parseProjectionParams({ horizonMonths: 0 }), {
      ok: false,
      errors: ["horizonMonths: Number must be greater than or equal to 1"],
    });
    assert.deepStrictEqual(parseProjectionParams({ horizonMonths: 25 }), {
      ok: false,
      errors: ["horizonMonths: Number must be less than or equal to 24"],
    });
  });

  it("rejects a fractional horizon", () => {
    const result = parseProjectionParams({ horizonMonths: 6.5 });
    assert(!result.ok);
    assert.strictEqual(result.errors.length, 1);
    assert.ok(result.errors[0]?.startsWith("horizonMonths: "));
  });

  it("rejects coverage above 1 and negative costs", () => {
    const result = parseProjectionParams({ hedgeCoverage: 1.5, eurCosts: -1 });
    assert(!result.ok);
    assert.deepStrictEqual(result.errors.map((e) => e.split(":")[0]).sort(), ["eurCosts", "hedgeCoverage"]);
  });

  it("rejects non-object input", () => {
    const result = parseProjectionParams("six months");
    assert.strictEqual(result.ok, false);
  });

  it("validates the base set too", () => {
    const result = parseProjectionParams({}, { ...DEFAULT_PROJECTION_PARAMS, treasury: 0 });
    assert.deepStrictEqual(result, { ok: false, errors: ["treasury: Number must be greater than 0"] });
  });
});

describe("parseScenarios", () => {
  it("accepts the default scenarios", () => {
    assert.deepStrictEqual(parseScenarios(DEFAULT_FX_SCENARIOS), { ok: true, scenarios: DEFAULT_FX_SCENARIOS });
  });

  it("rejects an empty list", () => {
    assert.deepStrictEqual(parseScenarios([]), { ok: false, errors: ["at least one scenario is required"] });
  });

  it("rejects duplicate ids", () => {
    const dup = [DEFAULT_FX_SCENARIOS[0], DEFAULT_FX_SCENARIOS[0]];
    assert.deepStrictEqual(parseScenarios(dup), {
      ok: false,
      errors: ['1.id: duplicate scenario id "strong-usd"'],
    });
  });

  it("rejects non-positive scenario rates", () => {
    const result = parseScenarios([{ id: "x", name: "X", usdPln: 0, eurUsd: 1.1, probability: 0.5 }]);
    assert.deepStrictEqual(result, { ok: false, errors: ["0.usdPln: Number must be greater than 0"] });
  });
});
