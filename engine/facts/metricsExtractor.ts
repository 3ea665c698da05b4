import { ConfigurationError } from "../errors.js";
import { type Logger, silentLogger } from "../logger.js";
import { BASE_METRICS, type BaseMetricRecord, type HistoricalMetricsTable, type MetricRecord, type MetricRow } from "../types/financials.js";
import { type AliasTable, loadDefaultAliasTable } from "./aliases.js";
import { lookupFlat, resolveConcept } from "./conceptResolver.js";
import { deriveMetrics } from "./derivedMetrics.js";
import { type FactDocument, isFactMapping, isFlatDocument } from "./factTree.js";

export const MIN_FISCAL_YEAR = 1900;
export const MAX_FISCAL_YEAR = 2100;

export type ExtractOptions = {
  aliasTable?: AliasTable;
  logger?: Logger;
};

export const assertFiscalYear = (fiscalYear: number): void => {
  if (!Number.isInteger(fiscalYear) || fiscalYear < MIN_FISCAL_YEAR || fiscalYear > MAX_FISCAL_YEAR) {
    throw new ConfigurationError({
      code: "BAD_FISCAL_YEAR",
      message: `Fiscal year must be an integer between ${MIN_FISCAL_YEAR} and ${MAX_FISCAL_YEAR}, got ${fiscalYear}`,
    });
  }
};

const emptyBaseRecord = (): BaseMetricRecord => ({
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
});

/**
 * Resolves every canonical metric of one fiscal year, then derives ratios.
 * Metrics that cannot be found are `null`; only an invalid year throws.
 */
export const extractYear = (document: FactDocument, fiscalYear: number, options: ExtractOptions = {}): MetricRecord => {
  assertFiscalYear(fiscalYear);
  const table = options.aliasTable ?? loadDefaultAliasTable();
  const logger = options.logger ?? silentLogger;
  const flat = isFlatDocument(document);
  const base = emptyBaseRecord();

  for (const name of BASE_METRICS) {
    const entry = table.metrics.get(name);
    if (!entry) continue;

    base[name] = flat
      ? lookupFlat(document, entry.aliases)
      : resolveConcept(document, entry.aliases, fiscalYear, {
          prioritySections: entry.prioritySections,
          fallbackSectionPrefixes: table.fallbackSectionPrefixes,
        });

    if (base[name] === null) {
      logger.debug(`${fiscalYear}: no value for ${name} (${entry.aliases.length} aliases tried)`);
    }
  }

  return deriveMetrics(base);
};

/**
 * Builds the historical table from one document per fiscal year. A year that
 * fails to extract is logged and left out; the rest of the batch continues.
 * An invalid fiscal year is a usage error and throws before anything is extracted.
 */
export const buildHistory = (
  documents: ReadonlyMap<number, FactDocument>,
  options: ExtractOptions = {},
): HistoricalMetricsTable => {
  const logger = options.logger ?? silentLogger;
  const rows: MetricRow[] = [];

  for (const year of documents.keys()) assertFiscalYear(year);

  for (const [year, document] of documents) {
    try {
      if (!isFactMapping(document)) {
        throw new Error("fact document is not an object");
      }
      rows.push({ year, kind: "historical", metrics: extractYear(document, year, options) });
    } catch (err) {
      if (err instanceof ConfigurationError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      logger.warn(`Error processing fiscal year ${year}: ${message}`);
    }
  }

  rows.sort((a, b) => a.year - b.year);
  return { rows };
};
