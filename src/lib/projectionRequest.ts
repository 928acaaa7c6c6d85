/**
 * Request handling for /api/projection, kept free of Next.js types so it can be tested directly.
 * Body: { params?: Partial<ProjectionParams>, scenarios?: FxScenario[] }.
 */

import { DEFAULT_FX_SCENARIOS, DEFAULT_PROJECTION_PARAMS } from "@/config/treasuryDefaults";
import type { FxScenario, ProjectionParams } from "@/domain/treasury/treasury.schema";
import { parseProjectionParams, parseScenarios } from "@/domain/treasury/treasury.parse";
import { computeProjection, type ProjectionResult } from "@/engine/fxProjection";

export type ProjectionResponseBody = {
  requestId: string;
  params: ProjectionParams;
  scenarioSet: FxScenario[];
} & ProjectionResult;

export type ProjectionRequestOutcome =
  | { ok: true; status: 200; body: ProjectionResponseBody }
  | { ok: false; status: 400; body: { error: string; issues: string[] } };

function invalid(error: string, issues: string[]): ProjectionRequestOutcome {
  return { ok: false, status: 400, body: { error, issues } };
}

export function handleProjectionRequest(body: unknown): ProjectionRequestOutcome {
  if (body == null || typeof body !== "object" || Array.isArray(body)) {
    return invalid("Body must be an object", []);
  }
  const rawParams = "params" in body ? body.params : undefined;
  const rawScenarios = "scenarios" in body ? body.scenarios : undefined;

  const params = parseProjectionParams(rawParams, DEFAULT_PROJECTION_PARAMS);
  if (!params.ok) return invalid("Invalid projection parameters", params.errors);

  let scenarios = DEFAULT_FX_SCENARIOS;
  if (rawScenarios !== undefined && rawScenarios !== null) {
    const parsed = parseScenarios(rawScenarios);
    if (!parsed.ok) return invalid("Invalid scenarios", parsed.errors);
    scenarios = parsed.scenarios;
  }

  return {
    ok: true,
    status: 200,
    body: {
      requestId: crypto.randomUUID(),
      params: params.params,
      scenarioSet: scenarios,
      ...computeProjection(params.params, scenarios),
    },
  };
}
