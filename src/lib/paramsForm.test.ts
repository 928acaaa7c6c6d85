import { describe, it } from "node:test";
import assert from "node:assert";
import { DEFAULT_PROJECTION_PARAMS } from "@/config/treasuryDefaults";
import { parseProjectionParams } from "@/domain/treasury/treasury.parse";
import { formToParams, paramsToForm, parseNumericInput } from "./paramsForm";

describe("paramsForm", () => {
  it("shows coverage and spreads in percent", () => {
    const form = paramsToForm(DEFAULT_PROJECTION_PARAMS);
    assert.strictEqual(form.hedgeCoveragePct, 100);
    assert.strictEqual(form.otcSpreadPct, 0.2);
    assert.strictEqual(form.bankSpreadPct, 0.15);
    assert.strictEqual(form.treasury, 1_025_000);
  });

  it("converts percent back to fractions", () => {
    const params = formToParams({ ...paramsToForm(DEFAULT_PROJECTION_PARAMS), hedgeCoveragePct: 40, otcSpreadPct: 0.5 });
    assert.strictEqual(params.hedgeCoverage, 0.4);
    assert.strictEqual(params.otcSpread, 0.005);
    assert.strictEqual(params.horizonMonths, 6);
  });

  it("empty input fails validation", () => {
    const form = { ...paramsToForm(DEFAULT_PROJECTION_PARAMS), treasury: parseNumericInput("  ") };
    const result = parseProjectionParams(formToParams(form));
    assert.strictEqual(result.ok, false);
  });

  it("parseNumericInput", () => {
    assert.strictEqual(parseNumericInput("3.6"), 3.6);
    assert.ok(Number.isNaN(parseNumericInput("")));
  });
});
