import { describe, it } from "node:test";
import assert from "node:assert";
import { DEFAULT_FX_SCENARIOS, DEFAULT_PROJECTION_PARAMS } from "@/config/treasuryDefaults";
import type { FxScenario } from "@/domain/treasury/treasury.schema";
import { buildScenarioTable, hedgedHorizonTotal, scenarioExpectedValue } from "./scenario";

const approx = (actual: number, expected: number, tol = 1e-6) =>
  assert.ok(Math.abs(actual - expected) <= tol, `expected ${actual} ≈ ${expected}`);

describe("scenarioExpectedValue", () => {
  it("weights each scenario's horizon cost by probability", () => {
    const params = { ...DEFAULT_PROJECTION_PARAMS, plnCosts: 400, eurCosts: 100, horizonMonths: 2 };
    const scenarios: FxScenario[] = [
      { id: "a", name: "A", usdPln: 4, eurUsd: 1, probability: 0.5 }, // 100 + 100 = 200 / month
      { id: "b", name: "B", usdPln: 2, eurUsd: 2, probability: 0.3 }, // 200 + 200 = 400 / month
      { id: "c", name: "C", usdPln: 8, eurUsd: 0.5, probability: 0.2 }, // 50 + 50 = 100 / month
    ];
    const ev = scenarioExpectedValue(scenarios, params);
    // 200*2*0.5 + 400*2*0.3 + 100*2*0.2 = 200 + 240 + 40
    approx(ev.evUnhedged, 480, 1e-9);
    // start rates 3.6 / 1.175: (400/3.6 + 117.5) * 2 * 1.0035
    approx(ev.evHedged, (400 / 3.6 + 117.5) * 2 * 1.0035, 1e-9);
    approx(ev.evSavings, ev.evUnhedged - ev.evHedged, 1e-9);
  });

  it("default scenarios and params", () => {
    const ev = scenarioExpectedValue(DEFAULT_FX_SCENARIOS, DEFAULT_PROJECTION_PARAMS);
    approx(ev.evUnhedged, 1_059_306.377421);
    approx(ev.evHedged, 1_056_769.125);
    approx(ev.evSavings, 2_537.252421);
  });

  it("does not normalise probabilities", () => {
    const params = { ...DEFAULT_PROJECTION_PARAMS, plnCosts: 400, eurCosts: 100, horizonMonths: 1 };
    const one: FxScenario = { id: "a", name: "A", usdPln: 4, eurUsd: 1, probability: 1 };
    const two: FxScenario = { id: "b", name: "B", usdPln: 4, eurUsd: 1, probability: 1 };
    approx(scenarioExpectedValue([one, two], params).evUnhedged, 400, 1e-9);
  });
});

describe("buildScenarioTable", () => {
  it("one row per scenario with cost, simple runway and savings", () => {
    const rows = buildScenarioTable(DEFAULT_FX_SCENARIOS, DEFAULT_PROJECTION_PARAMS);
    assert.deepStrictEqual(
      rows.map((r) => r.scenarioId),
      ["strong-usd", "stabilisation", "consensus"]
    );
    const strong = rows[0];
    assert(strong);
    approx(strong.monthlyCost, 164_240.25974);
    approx(strong.totalCost, 985_441.558442);
    approx(strong.runwayMonths, 6.240857154);
    approx(strong.hedgedTotal, 1_056_769.125);
    approx(strong.savings, 985_441.558442 - 1_056_769.125);
  });

  it("hedged total is shared by every row", () => {
    const rows = buildScenarioTable(DEFAULT_FX_SCENARIOS, DEFAULT_PROJECTION_PARAMS);
    const hedged = hedgedHorizonTotal(DEFAULT_PROJECTION_PARAMS);
    assert.ok(rows.every((r) => r.hedgedTotal === hedged));
  });

  it("zero costs give an unbounded simple runway", () => {
    const rows = buildScenarioTable(DEFAULT_FX_SCENARIOS, { ...DEFAULT_PROJECTION_PARAMS, plnCosts: 0, eurCosts: 0 });
    assert.ok(rows.every((r) => r.runwayMonths === Number.POSITIVE_INFINITY));
  });
});
