import type { MetricRecord, ProfitabilityPath } from "../types/financials.js";
import type { ProjectionParams } from "./params.js";

export type ProfitabilityBand = {
  /** Inclusive lower bound on revenue growth. */
  minGrowth: number;
  targetNetMargin: number;
  yearsToProfitability: number;
};

export type BreakevenAdjustment = {
  /** Applies when the trailing operating margin is strictly above this. */
  operatingMarginAbove: number;
  shortenBy: number;
  minYears: number;
};

// Descending by minGrowth; the first band the growth rate reaches applies.
export const PROFITABILITY_BANDS: readonly ProfitabilityBand[] = [
  { minGrowth: 0.2, targetNetMargin: 0.1, yearsToProfitability: 7 },
  { minGrowth: 0.15, targetNetMargin: 0.12, yearsToProfitability: 6 },
  { minGrowth: 0.08, targetNetMargin: 0.15, yearsToProfitability: 5 },
  { minGrowth: 0.05, targetNetMargin: 0.18, yearsToProfitability: 4 },
  { minGrowth: Number.NEGATIVE_INFINITY, targetNetMargin: 0.2, yearsToProfitability: 3 },
];

// First match wins.
export const BREAKEVEN_ADJUSTMENTS: readonly BreakevenAdjustment[] = [
  { operatingMarginAbove: -0.05, shortenBy: 2, minYears: 2 },
  { operatingMarginAbove: -0.1, shortenBy: 1, minYears: 3 },
];

export type TrailingProfitability = Pick<MetricRecord, "netIncome" | "operatingMargin">;

export type ProfitabilityPolicy = {
  bands: readonly ProfitabilityBand[];
  adjustments: readonly BreakevenAdjustment[];
};

export const DEFAULT_PROFITABILITY_POLICY: ProfitabilityPolicy = {
  bands: PROFITABILITY_BANDS,
  adjustments: BREAKEVEN_ADJUSTMENTS,
};

const NO_CONVERGENCE: ProfitabilityPath = {
  targetNetMargin: null,
  yearsToProfitability: 0,
  converging: false,
  source: "none",
};

/**
 * Picks a target net margin and horizon for an unprofitable entity from its
 * scenario growth rate. Profitable entities (positive trailing net income)
 * need no convergence.
 */
export const inferProfitability = (
  revenueGrowth: number,
  trailing: TrailingProfitability,
  policy: ProfitabilityPolicy = DEFAULT_PROFITABILITY_POLICY,
): ProfitabilityPath => {
  if (trailing.netIncome !== null && trailing.netIncome > 0) return NO_CONVERGENCE;

  const band = policy.bands.find((b) => revenueGrowth >= b.minGrowth);
  if (!band) return NO_CONVERGENCE;

  let years = band.yearsToProfitability;
  const margin = trailing.operatingMargin;
  if (margin !== null) {
    const adjustment = policy.adjustments.find((a) => margin > a.operatingMarginAbove);
    if (adjustment) years = Math.max(adjustment.minYears, years - adjustment.shortenBy);
  }

  return { targetNetMargin: band.targetNetMargin, yearsToProfitability: years, converging: true, source: "inferred" };
};

/** Caller-supplied target margin and horizon take precedence over inferred ones, field by field. */
export const resolveProfitability = (
  params: Pick<ProjectionParams, "targetNetMargin" | "yearsToProfitability">,
  revenueGrowth: number,
  trailing: TrailingProfitability,
  policy: ProfitabilityPolicy = DEFAULT_PROFITABILITY_POLICY,
): ProfitabilityPath => {
  const inferred = inferProfitability(revenueGrowth, trailing, policy);
  if (!inferred.converging) return inferred;

  const explicit = params.targetNetMargin !== undefined || params.yearsToProfitability !== undefined;
  return {
    targetNetMargin: params.targetNetMargin ?? inferred.targetNetMargin,
    yearsToProfitability: params.yearsToProfitability ?? inferred.yearsToProfitability,
    converging: true,
    source: explicit ? "explicit" : "inferred",
  };
};
