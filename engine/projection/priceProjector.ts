import type { ProjectedMetricsTable } from "../types/financials.js";

export type PriceProjectionOptions = {
  peRatio: number;
  currentPrice: number;
  /** Year that shows `currentPrice`. Defaults to the last historical year. */
  currentYear?: number;
  /** Defaults to `peRatio`. */
  targetPe?: number;
  /** Defaults to the table's convergence horizon, or 3 when it has none. */
  yearsToProfitability?: number;
};

export type PricePoint = {
  year: number;
  price: number | null;
};

const DEFAULT_YEARS_TO_PROFITABILITY = 3;

const round2 = (value: number): number => Math.round(value * 100) / 100;

/**
 * Implied share price per row. Positive EPS is priced at `peRatio`; a loss year
 * after the current year moves linearly from the previous price toward a token
 * `targetPe × 0.01` over the profitability horizon.
 */
export const projectPrices = (table: ProjectedMetricsTable, options: PriceProjectionOptions): PricePoint[] => {
  const historical = table.rows.filter((row) => row.kind === "historical");
  const currentYear = options.currentYear ?? historical[historical.length - 1]?.year;
  const targetPe = options.targetPe ?? options.peRatio;
  const horizon =
    options.yearsToProfitability ??
    (table.profitability.yearsToProfitability > 0 ? table.profitability.yearsToProfitability : DEFAULT_YEARS_TO_PROFITABILITY);

  const currentIndex = table.rows.findIndex((row) => row.year === currentYear);
  const anchor = currentIndex === -1 ? 0 : currentIndex;
  const points: PricePoint[] = [];

  table.rows.forEach((row, i) => {
    if (row.year === currentYear) {
      points.push({ year: row.year, price: options.currentPrice });
      return;
    }

    const eps = row.metrics.eps;
    if (eps === null) {
      points.push({ year: row.year, price: null });
      return;
    }
    if (eps > 0) {
      points.push({ year: row.year, price: round2(eps * options.peRatio) });
      return;
    }

    const yearsFromCurrent = i - anchor;
    if (yearsFromCurrent <= 0) {
      points.push({ year: row.year, price: null });
      return;
    }

    const targetPrice = targetPe * 0.01;
    const prevPrice = points[points.length - 1]?.price ?? options.currentPrice;
    const progress = Math.min(yearsFromCurrent / horizon, 1);
    points.push({ year: row.year, price: round2(prevPrice + (targetPrice - prevPrice) * progress) });
  });

  return points;
};
