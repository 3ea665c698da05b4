import {
  type HistoricalMetricsTable,
  type MetricName,
  type MetricRow,
  type ProjectedMetricsTable,
  SCENARIOS,
  type ScenarioName,
  type SummaryStats,
} from "../types/financials.js";
import { projectedRows } from "./projector.js";

/** Compound annual growth rate. `null` when undefined for the inputs. */
export const cagr = (first: number | null, last: number | null, years: number): number | null => {
  if (first === null || last === null || first <= 0 || last < 0 || years <= 0) return null;
  return (last / first) ** (1 / years) - 1;
};

export const averageOf = (rows: readonly MetricRow[], metric: MetricName): number | null => {
  const values = rows.map((row) => row.metrics[metric]).filter((v): v is number => v !== null);
  if (!values.length) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
};

export const summarize = (
  history: HistoricalMetricsTable,
  tables: Partial<Record<ScenarioName, ProjectedMetricsTable>>,
): SummaryStats => {
  const revenueCagr: Partial<Record<ScenarioName, number>> = {};

  for (const scenario of SCENARIOS) {
    const table = tables[scenario];
    if (!table) continue;
    const rows = projectedRows(table);
    if (rows.length < 2) continue;
    const growth = cagr(rows[0].metrics.revenue, rows[rows.length - 1].metrics.revenue, rows.length - 1);
    if (growth !== null) revenueCagr[scenario] = growth;
  }

  return {
    revenueCagr,
    historicalAvgNetMargin: averageOf(history.rows, "netMargin"),
    historicalAvgFcfMargin: averageOf(history.rows, "fcfMargin"),
  };
};
