import { z } from "zod";

import { ConfigurationError } from "../errors.js";

const rate = z.number().finite();
const share = z.number().finite().min(0).max(1);

const ScenarioRatesSchema = z.object({
  bear: rate,
  base: rate,
  bull: rate,
});

/**
 * Modeling constants of the projector. These are assumptions, not data, so
 * they are parameters rather than literals in the fold.
 */
export const ModelAssumptionsSchema = z.object({
  taxRate: share.default(0.25),
  depreciationPctRevenue: share.default(0.02),
  workingCapitalPctRevenue: share.default(0.01),
  cogsEfficiencyGain: share.default(0.005),
  defaultCogsRatio: share.default(0.6),
  rdGrowthFactor: rate.default(0.8),
  sgaGrowthFactor: rate.default(0.6),
});

export const ProjectionParamsSchema = z.object({
  revenueGrowth: ScenarioRatesSchema.default({ bear: 0.02, base: 0.05, bull: 0.09 }),
  projectionYears: z.number().int().min(0).max(50).default(5),
  /** First projected fiscal year. Defaults to the year after the last historical row. */
  startYear: z.number().int().optional(),
  targetNetMargin: rate.optional(),
  yearsToProfitability: z.number().int().positive().optional(),
  terminalGrowthRate: rate.default(0.025),
  discountRate: rate.default(0.1),
  capexPctRevenue: z
    .object({ bear: share, base: share, bull: share })
    .partial()
    .default({}),
  defaultCapexPctRevenue: share.default(0.03),
  dilutionRate: rate.default(0.01),
  assumptions: ModelAssumptionsSchema.default({}),
});

export type ModelAssumptions = z.output<typeof ModelAssumptionsSchema>;
export type ProjectionParams = z.output<typeof ProjectionParamsSchema>;
export type ProjectionParamsInput = z.input<typeof ProjectionParamsSchema>;

export const parseProjectionParams = (input: unknown = {}): ProjectionParams => {
  const parsed = ProjectionParamsSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError({
      code: "INVALID_PARAMS",
      message: "Invalid projection parameters",
      details: parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    });
  }
  return parsed.data;
};
