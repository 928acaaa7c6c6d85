import { DEFAULT_PROJECTION_PARAMS } from "@/config/treasuryDefaults";
import {
  FxScenarioListSchema,
  ProjectionParamsInputSchema,
  ProjectionParamsSchema,
  formatIssues,
  type FxScenario,
  type ProjectionParams,
} from "./treasury.schema";

export type ParamsParseResult = { ok: true; params: ProjectionParams } | { ok: false; errors: string[] };

export type ScenariosParseResult = { ok: true; scenarios: FxScenario[] } | { ok: false; errors: string[] };

/**
 * Validates projection parameters at the boundary.
 * `input` may be partial; provided fields are merged over `base` and the merged set is validated.
 * `undefined` / `null` input yields `base` (validated).
 */
export function parseProjectionParams(
  input: unknown,
  base: ProjectionParams = DEFAULT_PROJECTION_PARAMS
): ParamsParseResult {
  const partial = ProjectionParamsInputSchema.safeParse(input ?? {});
  if (!partial.success) return { ok: false, errors: formatIssues(partial.error) };

  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(partial.data)) {
    if (value !== undefined) merged[key] = value;
  }

  const full = ProjectionParamsSchema.safeParse(merged);
  if (!full.success) return { ok: false, errors: formatIssues(full.error) };
  return { ok: true, params: full.data };
}

/** Validates a scenario list (non-empty; each rate > 0, probability 0–1). Ids must be unique. */
export function parseScenarios(input: unknown): ScenariosParseResult {
  const parsed = FxScenarioListSchema.safeParse(input);
  if (!parsed.success) return { ok: false, errors: formatIssues(parsed.error) };

  const seen = new Set<string>();
  const errors: string[] = [];
  parsed.data.forEach((s, i) => {
    if (seen.has(s.id)) errors.push(`${i}.id: duplicate scenario id "${s.id}"`);
    seen.add(s.id);
  });
  if (errors.length > 0) return { ok: false, errors };
  return { ok: true, scenarios: parsed.data };
}
