import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { averageOf, cagr, summarize } from "../summary.js";
import { row, tableOf } from "./helpers.js";

describe("cagr", () => {
  it("computes the compound growth rate", () => {
    const rate = cagr(100, 121, 2);
    assert.ok(rate !== null && Math.abs(rate - 0.1) < 1e-12);
    assert.equal(cagr(100, 100, 3), 0);
  });

  it("is undefined for non-positive starts, negative ends and empty spans", () => {
    assert.equal(cagr(0, 100, 2), null);
    assert.equal(cagr(-5, 100, 2), null);
    assert.equal(cagr(100, -1, 2), null);
    assert.equal(cagr(100, 120, 0), null);
    assert.equal(cagr(null, 120, 2), null);
  });
});

describe("averageOf", () => {
  it("averages the known values only", () => {
    const rows = [row(2021, "historical", { netMargin: 0.1 }), row(2022, "historical", {}), row(2023, "historical", { netMargin: 0.3 })];
    assert.equal(averageOf(rows, "netMargin"), 0.2);
    assert.equal(averageOf(rows, "fcfMargin"), null);
  });
});

describe("summarize", () => {
  const history = {
    rows: [row(2022, "historical", { netMargin: -0.5, fcfMargin: -0.25 }), row(2023, "historical", { netMargin: -0.1, fcfMargin: -0.75 })],
  };

  it("reports projected revenue growth and historical margins", () => {
    const base = tableOf([...history.rows, row(2024, "projected", { revenue: 100 }), row(2025, "projected", { revenue: 100 })]);
    const summary = summarize(history, { base });
    assert.deepEqual(summary, {
      revenueCagr: { base: 0 },
      historicalAvgNetMargin: -0.3,
      historicalAvgFcfMargin: -0.5,
    });
  });

  it("skips scenarios with fewer than two projected years", () => {
    const bear = tableOf([...history.rows, row(2024, "projected", { revenue: 100 })], "bear");
    assert.deepEqual(summarize(history, { bear }).revenueCagr, {});
  });

  it("reports null margins for an empty history", () => {
    const summary = summarize({ rows: [] }, {});
    assert.equal(summary.historicalAvgNetMargin, null);
    assert.equal(summary.historicalAvgFcfMargin, null);
  });
});
