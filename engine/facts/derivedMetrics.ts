import type { BaseMetricRecord, MetricRecord } from "../types/financials.js";

type Maybe = number | null;

export const subtract = (a: Maybe, b: Maybe): Maybe => (a === null || b === null ? null : a - b);

export const ratio = (numerator: Maybe, denominator: Maybe): Maybe => {
  if (numerator === null || denominator === null || denominator === 0) return null;
  const result = numerator / denominator;
  return Number.isFinite(result) ? result : null;
};

/**
 * Fills the derived columns of one year from its base metrics. Derivations run
 * in dependency order and propagate `null`: a missing input never becomes zero.
 */
export const deriveMetrics = (base: BaseMetricRecord): MetricRecord => {
  const grossProfit = subtract(base.revenue, base.cogs);
  const fcf = base.cfo === null || base.capex === null ? null : base.cfo - Math.abs(base.capex);

  return {
    ...base,
    grossProfit,
    grossMargin: ratio(grossProfit, base.revenue),
    operatingMargin: ratio(base.operatingIncome, base.revenue),
    netMargin: ratio(base.netIncome, base.revenue),
    eps: base.eps ?? ratio(base.netIncome, base.sharesDiluted),
    fcf,
    fcfMargin: ratio(fcf, base.revenue),
    roe: ratio(base.netIncome, base.bookValue),
    debtToEquity: ratio(base.totalDebt, base.bookValue),
  };
};
