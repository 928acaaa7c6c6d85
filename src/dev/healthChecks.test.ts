import { describe, it } from "node:test";
import assert from "node:assert";
import { DEFAULT_FX_SCENARIOS } from "@/config/treasuryDefaults";
import { checkScenarioWeights, groupedHealthChecks, runAllChecks } from "./healthChecks";

describe("runAllChecks", () => {
  it("every engine health check passes on the fixtures", () => {
    const { results, durationMs } = runAllChecks();
    assert.strictEqual(results.length, groupedHealthChecks.length);
    const failing = results.filter((r) => r.status !== "pass");
    assert.deepStrictEqual(
      failing.map((r) => `${r.group} / ${r.name}: ${r.message}`),
      []
    );
    assert.ok(durationMs >= 0);
  });

  it("covers every group", () => {
    const groups = new Set(groupedHealthChecks.map((c) => c.group));
    assert.deepStrictEqual([...groups].sort(), [
      "Cost Blend",
      "Cumulative & Treasury",
      "Edge Inputs",
      "Rate Paths",
      "Runway",
      "Scenarios",
    ]);
  });
});

describe("checkScenarioWeights", () => {
  it("passes for the default scenario set", () => {
    assert.deepStrictEqual(checkScenarioWeights(DEFAULT_FX_SCENARIOS), {
      status: "pass",
      message: "probabilities sum to 1",
    });
  });

  it("warns when the weights do not sum to 1", () => {
    const scenarios = [
      { id: "low", name: "Low", usdPln: 3.4, eurUsd: 1.2, probability: 0.5 },
      { id: "high", name: "High", usdPln: 3.9, eurUsd: 1.1, probability: 0.25 },
    ];
    assert.deepStrictEqual(checkScenarioWeights(scenarios), {
      status: "warn",
      message: "probabilities sum to 0.750; expected values are not normalised",
      details: {
        sum: 0.75,
        scenarios: [
          { id: "low", probability: 0.5 },
          { id: "high", probability: 0.25 },
        ],
      },
    });
  });
});
