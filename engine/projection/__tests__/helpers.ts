import {
  type MetricRecord,
  type MetricRow,
  type ProfitabilityPath,
  type ProjectedMetricsTable,
  type ScenarioName,
  emptyMetricRecord,
} from "../../types/financials.js";

export const record = (values: Partial<MetricRecord>): MetricRecord => ({ ...emptyMetricRecord(), ...values });

export const row = (year: number, kind: MetricRow["kind"], values: Partial<MetricRecord>): MetricRow => ({
  year,
  kind,
  metrics: record(values),
});

export const NOT_CONVERGING: ProfitabilityPath = {
  targetNetMargin: null,
  yearsToProfitability: 0,
  converging: false,
  source: "none",
};

export const tableOf = (
  rows: MetricRow[],
  scenario: ScenarioName = "base",
  profitability: ProfitabilityPath = NOT_CONVERGING,
): ProjectedMetricsTable => ({ scenario, growthRate: 0.05, profitability, rows });
