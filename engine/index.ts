export { ConfigurationError, isConfigurationError, type ConfigurationErrorCode } from "./errors.js";
export { consoleLogger, silentLogger, type Logger } from "./logger.js";
export { normalizeValue } from "./facts/normalizeValue.js";
export { selectAnnualValue, readPeriod, readFilingDate } from "./facts/periodSelector.js";
export { classifyNode, findInTree, isFactMapping, isFlatDocument } from "./facts/factTree.js";
export { resolveConcept, lookupFlat, searchSection, DEFAULT_FALLBACK_PREFIXES } from "./facts/conceptResolver.js";
export { parseAliasTable, loadDefaultAliasTable, type AliasTable, type MetricAliases } from "./facts/aliases.js";
export { deriveMetrics } from "./facts/derivedMetrics.js";
export { extractYear, buildHistory, type ExtractOptions } from "./facts/metricsExtractor.js";
export {
  parseProjectionParams,
  ProjectionParamsSchema,
  type ProjectionParams,
  type ProjectionParamsInput,
  type ModelAssumptions,
} from "./projection/params.js";
export {
  inferProfitability,
  resolveProfitability,
  PROFITABILITY_BANDS,
  BREAKEVEN_ADJUSTMENTS,
  type ProfitabilityBand,
  type BreakevenAdjustment,
} from "./projection/profitability.js";
export { project, projectScenarios, projectNextYear, projectedRows } from "./projection/projector.js";
export { valuate, valuateScenarios, discountCashFlows, DEFAULT_PE_MULTIPLES } from "./projection/valuation.js";
export { summarize, cagr } from "./projection/summary.js";
export { projectPrices, type PricePoint, type PriceProjectionOptions } from "./projection/priceProjector.js";
export type {
  FactDocument,
  FactMapping,
  FactNode,
  FactScalar,
  FactValue,
} from "./facts/factTree.js";
export * from "./types/financials.js";
