#!/usr/bin/env node
/**
 * Runs the three-scenario model over the fact documents stored for a ticker
 * and writes the tables, valuations and summary under MODEL_OUTPUT_DIR.
 *
 * Run:
 *   tsx scripts/runModel.ts AAPL
 *   tsx scripts/runModel.ts AAPL --years 2019-2023 --params params.json --price 180
 */

import { readFileSync } from "node:fs";
import { parseArgs } from "node:util";

import {
  buildHistory,
  consoleLogger,
  DEFAULT_PE_MULTIPLES,
  parseProjectionParams,
  type PricePoint,
  projectPrices,
  projectScenarios,
  SCENARIOS,
  type ScenarioName,
  summarize,
  valuateScenarios,
} from "../engine/index.js";
import { loadRuntimeConfig } from "../src/config.js";
import { DocumentStore } from "../src/io/documentStore.js";
import { writeResults } from "../src/io/exporter.js";

const USAGE = "Usage: run-model <TICKER> [--years 2019-2023] [--params file.json] [--price N] [--pe N]";

const parseYearRange = (raw: string): number[] => {
  const match = /^(\d{4})(?:-(\d{4}))?$/.exec(raw.trim());
  if (!match) throw new Error(`--years expects YYYY or YYYY-YYYY, got ${raw}`);
  const from = Number(match[1]);
  const to = match[2] === undefined ? from : Number(match[2]);
  return Array.from({ length: Math.max(to - from + 1, 0) }, (_, i) => from + i);
};

const parseNumberOption = (raw: string | undefined, label: string): number | undefined => {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) throw new Error(`${label} must be a number, got ${raw}`);
  return value;
};

const formatMoney = (value: number | null): string =>
  value === null ? "n/a" : value.toLocaleString("en-US", { maximumFractionDigits: 0 });

async function main() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      years: { type: "string" },
      params: { type: "string" },
      price: { type: "string" },
      pe: { type: "string" },
    },
  });

  const [rawTicker] = positionals;
  if (!rawTicker) throw new Error(USAGE);
  const ticker = rawTicker.toUpperCase();

  const config = loadRuntimeConfig();
  const logger = consoleLogger({ debug: config.debug });
  const store = new DocumentStore(config.inputDir, logger);

  const years = values.years ? parseYearRange(values.years) : store.listAvailable().get(ticker) ?? [];
  if (!years.length) throw new Error(`No stored fiscal years for ${ticker} in ${config.inputDir}`);

  const rawParams: unknown = values.params ? JSON.parse(readFileSync(values.params, "utf8")) : {};
  const params = parseProjectionParams(rawParams);
  const currentPrice = parseNumberOption(values.price, "--price");
  const peOverride = parseNumberOption(values.pe, "--pe");

  const history = buildHistory(store.loadMany(ticker, years), { logger });
  logger.info(`Loaded ${history.rows.length} historical years for ${ticker}`);

  const tables = projectScenarios(history, params, { logger });
  const valuations = valuateScenarios(tables, params);
  const summary = summarize(history, tables);

  let prices: Partial<Record<ScenarioName, PricePoint[]>> | undefined;
  if (currentPrice !== undefined) {
    prices = {};
    for (const scenario of SCENARIOS) {
      prices[scenario] = projectPrices(tables[scenario], {
        peRatio: peOverride ?? DEFAULT_PE_MULTIPLES[scenario],
        currentPrice,
      });
    }
  }

  for (const scenario of SCENARIOS) {
    const result = valuations[scenario];
    if (result.ok) {
      logger.info(
        `${scenario}: DCF ${formatMoney(result.summary.dcfValue)}, PE value ${formatMoney(result.summary.peValue)} at ${result.summary.peMultiple}x`,
      );
    } else {
      logger.warn(`${scenario}: ${result.message}`);
    }
  }

  writeResults(config.outputDir, ticker, { history, tables, valuations, summary, prices }, logger);
}

main().catch((err) => {
  console.error("Model run failed:", err instanceof Error ? err.message : err);
  process.exit(1);
});
