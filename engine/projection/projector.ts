import { ratio, subtract } from "../facts/derivedMetrics.js";
import { ConfigurationError } from "../errors.js";
import { type Logger, silentLogger } from "../logger.js";
import {
  type HistoricalMetricsTable,
  type MetricRecord,
  type MetricRow,
  type ProjectedMetricsTable,
  type ScenarioName,
} from "../types/financials.js";
import type { ModelAssumptions, ProjectionParams } from "./params.js";
import { resolveProfitability } from "./profitability.js";

export type ProjectionStep = {
  growth: number;
  /** 0 for the first projected year. */
  yearIndex: number;
  capexPctRevenue: number;
  dilutionRate: number;
  assumptions: ModelAssumptions;
};

const times = (value: number | null, factor: number): number | null => (value === null ? null : value * factor);

/**
 * Produces one projected year from the previous year's row. Every field is
 * null-propagating; balance-sheet items are not projected.
 */
export const projectNextYear = (prev: MetricRecord, step: ProjectionStep): MetricRecord => {
  const { growth, yearIndex, assumptions: a } = step;

  const revenue = times(prev.revenue, 1 + growth);
  const cogsRatio = (ratio(prev.cogs, prev.revenue) ?? a.defaultCogsRatio) * (1 - a.cogsEfficiencyGain * yearIndex);
  const cogs = times(revenue, cogsRatio);
  const rdExpense = (prev.rdExpense ?? 0) * (1 + growth * a.rdGrowthFactor);
  const sgaExpense = (prev.sgaExpense ?? 0) * (1 + growth * a.sgaGrowthFactor);

  const grossProfit = subtract(revenue, cogs);
  const operatingIncome = grossProfit === null ? null : grossProfit - rdExpense - sgaExpense;
  // No tax benefit is recognized on a loss.
  const netIncome = operatingIncome === null ? null : operatingIncome > 0 ? operatingIncome * (1 - a.taxRate) : operatingIncome;

  const cfo =
    netIncome === null || revenue === null
      ? null
      : netIncome + revenue * a.depreciationPctRevenue - revenue * a.workingCapitalPctRevenue;
  const capex = revenue === null ? null : -(revenue * step.capexPctRevenue);
  const fcf = cfo === null || capex === null ? null : cfo + capex;

  const sharesDiluted = times(prev.sharesDiluted, 1 + step.dilutionRate);

  return {
    revenue,
    cogs,
    rdExpense,
    sgaExpense,
    operatingIncome,
    netIncome,
    eps: ratio(netIncome, sharesDiluted),
    sharesDiluted,
    cfo,
    capex,
    totalDebt: null,
    cash: null,
    bookValue: null,
    grossProfit,
    grossMargin: ratio(grossProfit, revenue),
    operatingMargin: ratio(operatingIncome, revenue),
    netMargin: ratio(netIncome, revenue),
    fcf,
    fcfMargin: ratio(fcf, revenue),
    roe: null,
    debtToEquity: null,
  };
};

export type ProjectOptions = {
  logger?: Logger;
};

/**
 * Projects one scenario forward from the last historical row. The result holds
 * the historical rows followed by exactly `params.projectionYears` projected rows.
 */
export const project = (
  history: HistoricalMetricsTable,
  params: ProjectionParams,
  scenario: ScenarioName,
  options: ProjectOptions = {},
): ProjectedMetricsTable => {
  const logger = options.logger ?? silentLogger;
  const last = history.rows[history.rows.length - 1];
  if (!last) {
    throw new ConfigurationError({ code: "EMPTY_HISTORY", message: "Cannot project without at least one historical year" });
  }

  const startYear = params.startYear ?? last.year + 1;
  if (startYear <= last.year) {
    throw new ConfigurationError({
      code: "INVALID_PARAMS",
      message: `Projection start year ${startYear} must come after the last historical year ${last.year}`,
    });
  }

  const growth = params.revenueGrowth[scenario];
  const profitability = resolveProfitability(params, growth, last.metrics);
  if (profitability.converging) {
    logger.info(
      `${scenario}: unprofitable in ${last.year}; target net margin ${profitability.targetNetMargin} over ${profitability.yearsToProfitability} years (${profitability.source})`,
    );
  }

  const step = {
    growth,
    capexPctRevenue: params.capexPctRevenue[scenario] ?? params.defaultCapexPctRevenue,
    dilutionRate: params.dilutionRate,
    assumptions: params.assumptions,
  };

  const projected: MetricRow[] = [];
  let previous = last.metrics;
  for (let yearIndex = 0; yearIndex < params.projectionYears; yearIndex += 1) {
    const metrics = projectNextYear(previous, { ...step, yearIndex });
    projected.push({ year: startYear + yearIndex, kind: "projected", metrics });
    previous = metrics;
  }

  return {
    scenario,
    growthRate: growth,
    profitability,
    rows: [...history.rows, ...projected],
  };
};

export const projectScenarios = (
  history: HistoricalMetricsTable,
  params: ProjectionParams,
  options: ProjectOptions = {},
): Record<ScenarioName, ProjectedMetricsTable> => ({
  bear: project(history, params, "bear", options),
  base: project(history, params, "base", options),
  bull: project(history, params, "bull", options),
});

export const projectedRows = (table: ProjectedMetricsTable): MetricRow[] =>
  table.rows.filter((row) => row.kind === "projected");
