import type { ProjectedMetricsTable, ScenarioName, ValuationResult } from "../types/financials.js";
import type { ProjectionParams } from "./params.js";
import { projectedRows } from "./projector.js";

export const DEFAULT_PE_MULTIPLES: Readonly<Record<ScenarioName, number>> = {
  bear: 12,
  base: 15,
  bull: 20,
};

export type DcfBreakdown = {
  presentValueOfFcf: number;
  terminalValue: number;
  presentValueOfTerminal: number;
  value: number;
};

/**
 * Present value of an FCF series (year 1 first) plus a Gordon-growth terminal
 * value on the last year, discounted back by the series length. Callers check
 * `discountRate > terminalGrowthRate` and a non-empty series.
 */
export const discountCashFlows = (fcf: readonly number[], discountRate: number, terminalGrowthRate: number): DcfBreakdown => {
  const presentValueOfFcf = fcf.reduce((sum, value, i) => sum + value / (1 + discountRate) ** (i + 1), 0);
  const lastFcf = fcf[fcf.length - 1];
  const terminalValue = (lastFcf * (1 + terminalGrowthRate)) / (discountRate - terminalGrowthRate);
  const presentValueOfTerminal = terminalValue / (1 + discountRate) ** fcf.length;
  return { presentValueOfFcf, terminalValue, presentValueOfTerminal, value: presentValueOfFcf + presentValueOfTerminal };
};

/** DCF and earnings-multiple value of one projected scenario. */
export const valuate = (
  table: ProjectedMetricsTable,
  discountRate: number,
  terminalGrowthRate: number,
  peMultiple: number,
): ValuationResult => {
  if (![discountRate, terminalGrowthRate, peMultiple].every(Number.isFinite) || discountRate <= -1) {
    return {
      ok: false,
      error: "INVALID_RATE",
      message: `Discount rate ${discountRate}, terminal growth rate ${terminalGrowthRate} and multiple ${peMultiple} must be finite, with a discount rate above -1`,
    };
  }
  if (discountRate <= terminalGrowthRate) {
    return {
      ok: false,
      error: "DISCOUNT_NOT_ABOVE_GROWTH",
      message: `Discount rate ${discountRate} must exceed terminal growth rate ${terminalGrowthRate}`,
    };
  }

  const rows = projectedRows(table);
  const fcf = rows.map((row) => row.metrics.fcf).filter((value): value is number => value !== null);
  if (!fcf.length) {
    return { ok: false, error: "EMPTY_FCF_SERIES", message: `No projected free cash flow for the ${table.scenario} scenario` };
  }

  const final = rows[rows.length - 1].metrics;
  const { value } = discountCashFlows(fcf, discountRate, terminalGrowthRate);

  return {
    ok: true,
    summary: {
      scenario: table.scenario,
      dcfValue: value,
      peValue: final.netIncome === null ? null : final.netIncome * peMultiple,
      peMultiple,
      finalYearFcf: fcf[fcf.length - 1],
      finalYearEps: final.eps,
      finalYearNetIncome: final.netIncome,
    },
  };
};

export const valuateScenarios = (
  tables: Record<ScenarioName, ProjectedMetricsTable>,
  params: Pick<ProjectionParams, "discountRate" | "terminalGrowthRate">,
  multiples: Readonly<Record<ScenarioName, number>> = DEFAULT_PE_MULTIPLES,
): Record<ScenarioName, ValuationResult> => ({
  bear: valuate(tables.bear, params.discountRate, params.terminalGrowthRate, multiples.bear),
  base: valuate(tables.base, params.discountRate, params.terminalGrowthRate, multiples.base),
  bull: valuate(tables.bull, params.discountRate, params.terminalGrowthRate, multiples.bull),
});
