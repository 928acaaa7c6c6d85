/**
 * Dev-only Engine Health check registry.
 * Grouped by: Rate Paths, Cost Blend, Cumulative & Treasury, Runway, Scenarios, Edge Inputs.
 * Deterministic invariants only; no hard-coded expected numbers.
 * "warn" marks inputs the engine accepts but that skew the report (unnormalised scenario weights).
 */

import { DEFAULT_FX_SCENARIOS } from "@/config/treasuryDefaults";
import type { FxScenario, ProjectionParams } from "@/domain/treasury/treasury.schema";
import { computeProjection, hedgedBlendCosts, hedgedCosts, unhedgedCosts } from "@/engine/fxProjection";
import type { ProjectionResult } from "@/engine/fxProjection";
import { baselineParams, edgeParams } from "@/dev/fixtures";
import {
  allSameLength,
  approxEqual,
  inClosedRange,
  isConstantAt,
  isNonDecreasing,
  noNaNOrInfinity,
  seriesApproxEqual,
} from "@/dev/invariants";

export type CheckStatus = "pass" | "warn" | "fail";

export type CheckResult = {
  status: CheckStatus;
  message: string;
  details?: unknown;
};

export type CheckGroup =
  | "Rate Paths"
  | "Cost Blend"
  | "Cumulative & Treasury"
  | "Runway"
  | "Scenarios"
  | "Edge Inputs";

export type GroupedCheck = {
  group: CheckGroup;
  name: string;
  run: () => CheckResult;
};

const allParams = [...baselineParams, ...edgeParams];

function label(params: ProjectionParams, i: number): string {
  return `#${i} (h=${params.horizonMonths}, cov=${params.hedgeCoverage})`;
}

/** Runs `check` per fixture; collects error strings into one result. */
function overFixtures(
  fixtures: ProjectionParams[],
  check: (params: ProjectionParams, result: ProjectionResult) => string | null,
  passMessage: string
): CheckResult {
  const errors: string[] = [];
  fixtures.forEach((params, i) => {
    const err = check(params, computeProjection(params));
    if (err) errors.push(`${label(params, i)}: ${err}`);
  });
  if (errors.length > 0) return { status: "fail", message: errors.join("; "), details: { errors } };
  return { status: "pass", message: passMessage };
}

/**
 * Probabilities are not normalised by the engine, so a set that does not sum to 1
 * scales the expected values. Warns rather than fails.
 */
export function checkScenarioWeights(scenarios: FxScenario[]): CheckResult {
  const sum = scenarios.reduce((s, sc) => s + sc.probability, 0);
  if (approxEqual(sum, 1)) return { status: "pass", message: "probabilities sum to 1" };
  return {
    status: "warn",
    message: `probabilities sum to ${sum.toFixed(3)}; expected values are not normalised`,
    details: { sum, scenarios: scenarios.map((sc) => ({ id: sc.id, probability: sc.probability })) },
  };
}

export const groupedHealthChecks: GroupedCheck[] = [
  // ---------- Rate Paths ----------
  {
    group: "Rate Paths",
    name: "Every series has horizon length",
    run: () =>
      overFixtures(
        allParams,
        (params, r) => {
          const series = [
            r.months,
            r.ratePaths.marketUsdPln,
            r.ratePaths.hedgeUsdPln,
            r.ratePaths.marketEurUsd,
            r.ratePaths.hedgeEurUsd,
            r.costs.unhedged,
            r.costs.hedged,
            r.costs.hedgedBlend,
            r.costs.executionCost,
            r.costs.hedgedTotal,
            r.cumulative.unhedged,
            r.cumulative.hedged,
            r.treasury.unhedged,
            r.treasury.hedged,
          ];
          if (!allSameLength(series, params.horizonMonths)) return "series length differs from horizon";
          if (r.monthlyRows.length !== params.horizonMonths) return "monthly rows length differs from horizon";
          return null;
        },
        "all series length = horizonMonths"
      ),
  },
  {
    group: "Rate Paths",
    name: "Hedge paths constant at start rate",
    run: () =>
      overFixtures(
        allParams,
        (params, r) => {
          if (!isConstantAt(r.ratePaths.hedgeUsdPln, params.usdPlnStart)) return "USD/PLN hedge path not constant";
          if (!isConstantAt(r.ratePaths.hedgeEurUsd, params.eurUsdStart)) return "EUR/USD hedge path not constant";
          return null;
        },
        "hedge paths = start rate every month"
      ),
  },
  {
    group: "Rate Paths",
    name: "Market paths start at start rate and end at end rate",
    run: () =>
      overFixtures(
        allParams,
        (params, r) => {
          const n = params.horizonMonths;
          if (r.ratePaths.marketUsdPln[0] !== params.usdPlnStart) return "USD/PLN path does not start at start rate";
          if (r.ratePaths.marketEurUsd[0] !== params.eurUsdStart) return "EUR/USD path does not start at start rate";
          if (n > 1 && r.ratePaths.marketUsdPln[n - 1] !== params.usdPlnEnd) return "USD/PLN path does not end at end rate";
          if (n > 1 && r.ratePaths.marketEurUsd[n - 1] !== params.eurUsdEnd) return "EUR/USD path does not end at end rate";
          return null;
        },
        "market paths span start → end"
      ),
  },

  // ---------- Cost Blend ----------
  {
    group: "Cost Blend",
    name: "Coverage 0 reduces exactly to unhedged costs",
    run: () =>
      overFixtures(
        allParams,
        (params) => {
          const p = { ...params, hedgeCoverage: 0 };
          const blend = hedgedBlendCosts(p);
          const unhedged = unhedgedCosts(p);
          return blend.every((v, i) => v === unhedged[i]) ? null : "blend differs from unhedged";
        },
        "coverage=0 ⇒ blend = unhedged"
      ),
  },
  {
    group: "Cost Blend",
    name: "Coverage 1 reduces exactly to pure hedged costs",
    run: () =>
      overFixtures(
        allParams,
        (params) => {
          const p = { ...params, hedgeCoverage: 1 };
          const blend = hedgedBlendCosts(p);
          const hedged = hedgedCosts(p);
          return blend.every((v, i) => v === hedged[i]) ? null : "blend differs from hedged";
        },
        "coverage=1 ⇒ blend = hedged"
      ),
  },
  {
    group: "Cost Blend",
    name: "Blend lies between hedged and unhedged",
    run: () =>
      overFixtures(
        allParams,
        (_params, r) => {
          const bad = r.costs.hedgedBlend.findIndex((b, i) => {
            const h = r.costs.hedged[i] ?? 0;
            const u = r.costs.unhedged[i] ?? 0;
            const lo = Math.min(h, u);
            const hi = Math.max(h, u);
            return !(b >= lo - 1e-9 * hi && b <= hi + 1e-9 * hi);
          });
          return bad >= 0 ? `month ${bad + 1} outside [hedged, unhedged]` : null;
        },
        "min(hedged, unhedged) ≤ blend ≤ max(hedged, unhedged)"
      ),
  },
  {
    group: "Cost Blend",
    name: "Execution cost non-negative and finite",
    run: () =>
      overFixtures(
        allParams,
        (_params, r) => {
          if (!noNaNOrInfinity(r.costs.executionCost)) return "non-finite execution cost";
          if (r.costs.executionCost.some((v) => v < 0)) return "negative execution cost";
          return null;
        },
        "execution cost ≥ 0 everywhere"
      ),
  },

  // ---------- Cumulative & Treasury ----------
  {
    group: "Cumulative & Treasury",
    name: "Cumulative series is a non-decreasing running sum",
    run: () =>
      overFixtures(
        allParams,
        (_params, r) => {
          if (!isNonDecreasing(r.cumulative.unhedged) || !isNonDecreasing(r.cumulative.hedged)) return "cumulative decreases";
          let running = 0;
          const prefix = r.costs.hedgedTotal.map((c) => (running += c));
          return seriesApproxEqual(prefix, r.cumulative.hedged) ? null : "cumulative ≠ prefix sum";
        },
        "cumulative[i] = Σ costs[0..i], non-decreasing"
      ),
  },
  {
    group: "Cumulative & Treasury",
    name: "Treasury + cumulative = initial treasury",
    run: () =>
      overFixtures(
        allParams,
        (params, r) => {
          const ok = r.treasury.unhedged.every((t, i) =>
            approxEqual(t + (r.cumulative.unhedged[i] ?? 0), params.treasury)
          );
          return ok ? null : "remaining + spent ≠ treasury";
        },
        "remaining balance reconciles with spend"
      ),
  },

  // ---------- Runway ----------
  {
    group: "Runway",
    name: "Runway within [0, horizon]",
    run: () =>
      overFixtures(
        allParams,
        (params, r) => {
          const { runwayUnhedged, runwayHedged } = r.metrics;
          if (!inClosedRange(runwayUnhedged, 0, params.horizonMonths)) return `unhedged runway ${runwayUnhedged}`;
          if (!inClosedRange(runwayHedged, 0, params.horizonMonths)) return `hedged runway ${runwayHedged}`;
          return null;
        },
        "0 ≤ runway ≤ horizon"
      ),
  },
  {
    group: "Runway",
    name: "Non-depleting treasury gives runway = horizon",
    run: () =>
      overFixtures(
        allParams,
        (params, r) => {
          const n = params.horizonMonths;
          if ((r.treasury.unhedged[n - 1] ?? 0) > 0 && r.metrics.runwayUnhedged !== n) return "unhedged runway ≠ horizon";
          if ((r.treasury.hedged[n - 1] ?? 0) > 0 && r.metrics.runwayHedged !== n) return "hedged runway ≠ horizon";
          return null;
        },
        "balance > 0 at horizon ⇒ runway = horizon"
      ),
  },
  {
    group: "Runway",
    name: "Depleting month matches the treasury series",
    run: () =>
      overFixtures(
        allParams,
        (params, r) => {
          const pairs: Array<[number, number[]]> = [
            [r.metrics.runwayUnhedged, r.treasury.unhedged],
            [r.metrics.runwayHedged, r.treasury.hedged],
          ];
          for (const [rw, balance] of pairs) {
            if (rw >= params.horizonMonths || rw <= 0) continue;
            const month = Math.max(0, Math.ceil(rw) - 1);
            const before = month === 0 ? params.treasury : balance[month - 1] ?? 0;
            const after = balance[month] ?? 0;
            if (!(before > 0 && after <= 0)) return `runway ${rw.toFixed(3)} not in the month the balance crosses zero`;
          }
          return null;
        },
        "fractional runway falls inside the crossing month"
      ),
  },

  // ---------- Scenarios ----------
  {
    group: "Scenarios",
    name: "Default scenario probabilities sum to 1",
    run: () => checkScenarioWeights(DEFAULT_FX_SCENARIOS),
  },
  {
    group: "Scenarios",
    name: "Expected value = probability-weighted scenario totals",
    run: () =>
      overFixtures(
        baselineParams,
        (_params, r) => {
          const weighted = r.scenarios.rows.reduce((s, row) => s + row.totalCost * row.probability, 0);
          return approxEqual(weighted, r.scenarios.expectedValue.evUnhedged) ? null : "EV ≠ Σ totalCost × p";
        },
        "evUnhedged = Σ totalCost × probability"
      ),
  },
  {
    group: "Scenarios",
    name: "Hedged EV charges spreads once on the start-rate total",
    run: () =>
      overFixtures(
        baselineParams,
        (params, r) => {
          const base = (r.costs.hedged[0] ?? 0) * params.horizonMonths;
          const expected = base * (1 + params.otcSpread + params.bankSpread);
          if (!approxEqual(expected, r.scenarios.expectedValue.evHedged)) return "evHedged mismatch";
          if (r.scenarios.rows.length !== DEFAULT_FX_SCENARIOS.length) return "scenario row count mismatch";
          return null;
        },
        "evHedged = hedged monthly × horizon × (1 + spreads)"
      ),
  },
  {
    group: "Scenarios",
    name: "Net savings reconcile with total savings",
    run: () =>
      overFixtures(
        allParams,
        (_params, r) =>
          approxEqual(r.recommendation.netSavings, r.metrics.totalSavings, 1e-6) ? null : "netSavings ≠ totalSavings",
        "gross − hedging cost = cumulative difference"
      ),
  },

  // ---------- Edge Inputs ----------
  {
    group: "Edge Inputs",
    name: "Edge inputs run without throw; series finite",
    run: () => {
      const errors: string[] = [];
      try {
        edgeParams.forEach((params, i) => {
          const r = computeProjection(params);
          const series = [r.costs.hedgedTotal, r.cumulative.unhedged, r.treasury.hedged];
          if (!series.every(noNaNOrInfinity)) errors.push(`${label(params, i)}: non-finite series`);
          if (!Number.isFinite(r.metrics.runwayHedged)) errors.push(`${label(params, i)}: non-finite runway`);
        });
      } catch (e) {
        return { status: "fail", message: `engine threw: ${e instanceof Error ? e.message : String(e)}`, details: String(e) };
      }
      if (errors.length > 0) return { status: "fail", message: errors.join("; "), details: { errors } };
      return { status: "pass", message: "edge inputs run without throw; outputs finite" };
    },
  },
];

export type RunResult = {
  results: Array<{ group: CheckGroup; name: string; status: CheckStatus; message: string; details?: unknown }>;
  durationMs: number;
};

export function runAllChecks(): RunResult {
  const start = performance.now();
  const results = groupedHealthChecks.map((c) => ({
    group: c.group,
    name: c.name,
    ...c.run(),
  }));
  const durationMs = performance.now() - start;
  return { results, durationMs };
}
