import { mkdirSync, writeFileSync } from "node:fs";
import path from "node:path";

import { type Logger, silentLogger } from "../../engine/logger.js";
import type { PricePoint } from "../../engine/projection/priceProjector.js";
import {
  type HistoricalMetricsTable,
  METRIC_NAMES,
  type MetricRow,
  type ProjectedMetricsTable,
  SCENARIOS,
  type ScenarioName,
  type SummaryStats,
  type ValuationResult,
} from "../../engine/types/financials.js";

export type ModelResults = {
  history: HistoricalMetricsTable;
  tables: Record<ScenarioName, ProjectedMetricsTable>;
  valuations: Record<ScenarioName, ValuationResult>;
  summary: SummaryStats;
  prices?: Partial<Record<ScenarioName, PricePoint[]>>;
};

const formatCell = (value: number | null): string => (value === null ? "" : String(value));

/** One line per row: `year,kind,` then every metric in canonical order. Missing values are empty cells. */
export const toCsv = (rows: readonly MetricRow[]): string => {
  const header = ["year", "kind", ...METRIC_NAMES].join(",");
  const lines = rows.map((row) => [String(row.year), row.kind, ...METRIC_NAMES.map((name) => formatCell(row.metrics[name]))].join(","));
  return [header, ...lines].join("\n") + "\n";
};

const writeJson = (file: string, value: unknown): void => {
  writeFileSync(file, JSON.stringify(value, null, 2), "utf8");
};

/** Writes every result file under `<dir>/<TICKER>_analysis/` and returns that directory. */
export const writeResults = (dir: string, ticker: string, results: ModelResults, logger: Logger = silentLogger): string => {
  const symbol = ticker.toUpperCase();
  const outputPath = path.join(dir, `${symbol}_analysis`);
  mkdirSync(outputPath, { recursive: true });

  writeFileSync(path.join(outputPath, `${symbol}_history.csv`), toCsv(results.history.rows), "utf8");
  for (const scenario of SCENARIOS) {
    writeFileSync(path.join(outputPath, `${symbol}_${scenario}.csv`), toCsv(results.tables[scenario].rows), "utf8");
  }
  writeJson(path.join(outputPath, `${symbol}_valuations.json`), results.valuations);
  writeJson(path.join(outputPath, `${symbol}_summary.json`), results.summary);
  if (results.prices) {
    writeJson(path.join(outputPath, `${symbol}_prices.json`), results.prices);
  }

  logger.info(`Results saved to ${outputPath}`);
  return outputPath;
};
