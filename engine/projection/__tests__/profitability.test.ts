import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { inferProfitability, resolveProfitability } from "../profitability.js";

const losing = (operatingMargin: number | null = null) => ({ netIncome: -10, operatingMargin });

describe("inferProfitability", () => {
  it("maps growth rates to target margin bands", () => {
    const cases: Array<[number, number, number]> = [
      [0.25, 0.1, 7],
      [0.2, 0.1, 7],
      [0.15, 0.12, 6],
      [0.09, 0.15, 5],
      [0.08, 0.15, 5],
      [0.05, 0.18, 4],
      [0.02, 0.2, 3],
      [-0.1, 0.2, 3],
    ];
    for (const [growth, targetNetMargin, yearsToProfitability] of cases) {
      assert.deepEqual(
        inferProfitability(growth, losing()),
        { targetNetMargin, yearsToProfitability, converging: true, source: "inferred" },
        `growth ${growth}`,
      );
    }
  });

  it("shortens the horizon for entities near breakeven", () => {
    assert.equal(inferProfitability(0.25, losing(-0.03)).yearsToProfitability, 5);
    assert.equal(inferProfitability(0.02, losing(-0.03)).yearsToProfitability, 2);
    assert.equal(inferProfitability(0.05, losing(-0.07)).yearsToProfitability, 3);
    assert.equal(inferProfitability(0.25, losing(-0.07)).yearsToProfitability, 6);
    assert.equal(inferProfitability(0.02, losing(-0.07)).yearsToProfitability, 3);
  });

  it("keeps the band horizon for deep losses", () => {
    assert.equal(inferProfitability(0.25, losing(-0.2)).yearsToProfitability, 7);
    assert.equal(inferProfitability(0.25, losing(-0.05)).yearsToProfitability, 6);
  });

  it("does not converge a profitable entity", () => {
    assert.deepEqual(inferProfitability(0.25, { netIncome: 5, operatingMargin: 0.1 }), {
      targetNetMargin: null,
      yearsToProfitability: 0,
      converging: false,
      source: "none",
    });
  });

  it("converges when trailing net income is zero or unknown", () => {
    assert.equal(inferProfitability(0.05, { netIncome: 0, operatingMargin: null }).converging, true);
    assert.equal(inferProfitability(0.05, { netIncome: null, operatingMargin: null }).converging, true);
  });
});

describe("resolveProfitability", () => {
  it("prefers explicit values field by field", () => {
    assert.deepEqual(resolveProfitability({ targetNetMargin: 0.3 }, 0.05, losing()), {
      targetNetMargin: 0.3,
      yearsToProfitability: 4,
      converging: true,
      source: "explicit",
    });
    assert.deepEqual(resolveProfitability({ yearsToProfitability: 8 }, 0.05, losing()), {
      targetNetMargin: 0.18,
      yearsToProfitability: 8,
      converging: true,
      source: "explicit",
    });
  });

  it("falls back to the inferred path", () => {
    assert.equal(resolveProfitability({}, 0.05, losing()).source, "inferred");
  });

  it("ignores explicit values for a profitable entity", () => {
    assert.equal(resolveProfitability({ targetNetMargin: 0.3 }, 0.05, { netIncome: 1, operatingMargin: 0.2 }).source, "none");
  });
});
