/**
 * Dashboard form state ↔ projection params.
 * Coverage and spreads are edited in percent; the engine takes fractions.
 */

import type { ProjectionParams } from "@/domain/treasury/treasury.schema";

export type ParamsFormState = Omit<ProjectionParams, "hedgeCoverage" | "otcSpread" | "bankSpread"> & {
  hedgeCoveragePct: number;
  otcSpreadPct: number;
  bankSpreadPct: number;
};

export type ParamsFormField = keyof ParamsFormState;

export function paramsToForm(params: ProjectionParams): ParamsFormState {
  const { hedgeCoverage, otcSpread, bankSpread, ...rest } = params;
  return {
    ...rest,
    hedgeCoveragePct: hedgeCoverage * 100,
    otcSpreadPct: otcSpread * 100,
    bankSpreadPct: bankSpread * 100,
  };
}

/** Unvalidated; pass the result through parseProjectionParams. */
export function formToParams(form: ParamsFormState): ProjectionParams {
  const { hedgeCoveragePct, otcSpreadPct, bankSpreadPct, ...rest } = form;
  return {
    ...rest,
    hedgeCoverage: hedgeCoveragePct / 100,
    otcSpread: otcSpreadPct / 100,
    bankSpread: bankSpreadPct / 100,
  };
}

/** Input value → number; empty input is NaN so validation reports it. */
export function parseNumericInput(raw: string): number {
  if (raw.trim() === "") return Number.NaN;
  return Number(raw);
}
