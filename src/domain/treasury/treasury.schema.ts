import { z } from "zod";

/** Longest forecast the engine accepts (months). */
export const MAX_HORIZON_MONTHS = 24;

/** Exchange rates must be strictly positive; a zero USD/PLN rate would divide by zero. */
const RateSchema = z.number().finite().positive();

/** Fractions 0–1 (hedge coverage, spreads). */
const FractionSchema = z.number().finite().min(0).max(1);

/**
 * Projection parameters. Every engine precondition is encoded here;
 * the engine trusts values that passed this schema.
 */
export const ProjectionParamsSchema = z.object({
  /** Treasury balance (USDT, treated as USD). */
  treasury: z.number().finite().positive(),
  /** Monthly operating costs settled in PLN. */
  plnCosts: z.number().finite().min(0),
  /** Monthly operating costs settled in EUR. */
  eurCosts: z.number().finite().min(0),
  horizonMonths: z.number().int().min(1).max(MAX_HORIZON_MONTHS),

  usdPlnStart: RateSchema,
  usdPlnEnd: RateSchema,
  eurUsdStart: RateSchema,
  eurUsdEnd: RateSchema,

  /** Share of monthly costs locked at the start rates (0 = none, 1 = fully hedged). */
  hedgeCoverage: FractionSchema,
  otcSpread: FractionSchema,
  /** Bank spread on the EUR/PLN leg; applied against PLN-settled costs only. */
  bankSpread: FractionSchema,
});
export type ProjectionParams = z.infer<typeof ProjectionParamsSchema>;

/** API / form input: any subset of parameters, merged over a base set before validation. */
export const ProjectionParamsInputSchema = ProjectionParamsSchema.partial();
export type ProjectionParamsInput = z.infer<typeof ProjectionParamsInputSchema>;

/**
 * Named future-rate scenario for the expected-value table.
 * Probabilities are weights; they are not required to sum to 1.
 */
export const FxScenarioSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  usdPln: RateSchema,
  eurUsd: RateSchema,
  probability: FractionSchema,
});
export type FxScenario = z.infer<typeof FxScenarioSchema>;

export const FxScenarioListSchema = z.array(FxScenarioSchema).min(1, "at least one scenario is required");

/** Flattens zod issues to "<path>: <message>" strings. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
