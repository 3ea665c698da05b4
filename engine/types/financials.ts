export type ScenarioName = "bear" | "base" | "bull";

export const SCENARIOS: readonly ScenarioName[] = ["bear", "base", "bull"];

export const BASE_METRICS = [
  "revenue",
  "cogs",
  "rdExpense",
  "sgaExpense",
  "operatingIncome",
  "netIncome",
  "eps",
  "sharesDiluted",
  "cfo",
  "capex",
  "totalDebt",
  "cash",
  "bookValue",
] as const;

export const DERIVED_METRICS = [
  "grossProfit",
  "grossMargin",
  "operatingMargin",
  "netMargin",
  "fcf",
  "fcfMargin",
  "roe",
  "debtToEquity",
] as const;

export type BaseMetricName = (typeof BASE_METRICS)[number];
export type DerivedMetricName = (typeof DERIVED_METRICS)[number];
export type MetricName = BaseMetricName | DerivedMetricName;

export const METRIC_NAMES: readonly MetricName[] = [...BASE_METRICS, ...DERIVED_METRICS];

/** One fiscal year of metrics. `null` means the value could not be resolved or derived. */
export type MetricRecord = Record<MetricName, number | null>;

export type BaseMetricRecord = Record<BaseMetricName, number | null>;

export type MetricRow = {
  year: number;
  kind: "historical" | "projected";
  metrics: MetricRecord;
};

export type HistoricalMetricsTable = {
  rows: readonly MetricRow[];
};

export type ProfitabilityPath = {
  targetNetMargin: number | null;
  yearsToProfitability: number;
  /** True when the entity was unprofitable in its last historical year. */
  converging: boolean;
  source: "inferred" | "explicit" | "none";
};

export type ProjectedMetricsTable = {
  scenario: ScenarioName;
  growthRate: number;
  profitability: ProfitabilityPath;
  /** Historical rows followed by the projected rows, ascending by year. */
  rows: readonly MetricRow[];
};

export type ValuationSummary = {
  scenario: ScenarioName;
  dcfValue: number;
  peValue: number | null;
  peMultiple: number;
  finalYearFcf: number;
  finalYearEps: number | null;
  finalYearNetIncome: number | null;
};

export type ValuationErrorCode = "INVALID_RATE" | "EMPTY_FCF_SERIES" | "DISCOUNT_NOT_ABOVE_GROWTH";

export type ValuationResult =
  | { ok: true; summary: ValuationSummary }
  | { ok: false; error: ValuationErrorCode; message: string };

export type SummaryStats = {
  revenueCagr: Partial<Record<ScenarioName, number>>;
  historicalAvgNetMargin: number | null;
  historicalAvgFcfMargin: number | null;
};

export const emptyMetricRecord = (): MetricRecord => ({
  revenue: null,
  cogs: null,
  rdExpense: null,
  sgaExpense: null,
  operatingIncome: null,
  netIncome: null,
  eps: null,
  sharesDiluted: null,
  cfo: null,
  capex: null,
  totalDebt: null,
  cash: null,
  bookValue: null,
  grossProfit: null,
  grossMargin: null,
  operatingMargin: null,
  netMargin: null,
  fcf: null,
  fcfMargin: null,
  roe: null,
  debtToEquity: null,
});
