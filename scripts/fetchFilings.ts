#!/usr/bin/env node
/**
 * Downloads SEC company facts for a ticker and stores one fact document per
 * fiscal year under MODEL_INPUT_DIR.
 *
 * Run:
 *   EDGAR_USER_AGENT="YourApp/1.0 (you@example.com)" tsx scripts/fetchFilings.ts AAPL 2019 2023
 *   tsx scripts/fetchFilings.ts AAPL 2023 --layout candidates
 */

import { parseArgs } from "node:util";

import { consoleLogger } from "../engine/logger.js";
import { loadRuntimeConfig } from "../src/config.js";
import { DocumentStore } from "../src/io/documentStore.js";
import { EdgarClient } from "../src/sec/index.js";

const USAGE = "Usage: fetch-filings <TICKER> <fromYear> [toYear] [--layout flat|candidates] [--form 10-K]";

const parseYear = (raw: string | undefined, label: string): number => {
  const year = Number(raw);
  if (!Number.isInteger(year)) throw new Error(`${label} must be a four-digit year, got ${raw ?? "nothing"}\n${USAGE}`);
  return year;
};

async function main() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      layout: { type: "string", default: "flat" },
      form: { type: "string", default: "10-K" },
    },
  });

  const [rawTicker, rawFrom, rawTo] = positionals;
  if (!rawTicker) throw new Error(USAGE);
  const ticker = rawTicker.toUpperCase();
  const from = parseYear(rawFrom, "fromYear");
  const to = rawTo === undefined ? from : parseYear(rawTo, "toYear");
  if (to < from) throw new Error(`toYear ${to} is before fromYear ${from}`);

  const layout = values.layout === "candidates" ? "candidates" : "flat";
  const config = loadRuntimeConfig();
  const logger = consoleLogger({ debug: config.debug });

  const client = new EdgarClient({
    userAgent: config.userAgent,
    baseDelayMs: config.baseDelayMs,
    maxRetries: config.maxRetries,
    logger,
  });
  const store = new DocumentStore(config.inputDir, logger);

  const company = await client.getCompanyDirectory().findByTicker(ticker);
  if (!company) throw new Error(`No company found for ticker ${ticker}`);
  logger.info(`Using CIK ${company.cik} for ${company.name}`);

  const years = Array.from({ length: to - from + 1 }, (_, i) => from + i);
  logger.info(`Fetching ${values.form ?? "10-K"} facts for ${ticker}, fiscal years ${from}-${to}`);
  const documents = await client.getAnnualDocuments(ticker, years, { form: values.form ?? "10-K", layout });

  for (const [year, document] of documents) {
    store.save(ticker, year, document);
  }
  logger.info(`Stored ${documents.size} of ${years.length} fiscal years in ${config.inputDir}`);
}

main().catch((err) => {
  console.error("Fetching filings failed:", err instanceof Error ? err.message : err);
  process.exit(1);
});
