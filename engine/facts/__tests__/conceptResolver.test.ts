import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { lookupFlat, resolveConcept, searchSection } from "../conceptResolver.js";

const REVENUE_ALIASES = ["Revenues", "SalesRevenueNet"];

describe("searchSection", () => {
  it("tries aliases in order within one mapping", () => {
    assert.equal(searchSection({ SalesRevenueNet: 20, Revenues: 10 }, REVENUE_ALIASES, 2022), 10);
  });

  it("falls through to the next alias when a value does not normalize", () => {
    assert.equal(searchSection({ Revenues: "n/a", SalesRevenueNet: 20 }, REVENUE_ALIASES, 2022), 20);
  });

  it("resolves a candidate list through the period selector", () => {
    const section = {
      Revenues: [
        { period: { startDate: "2021-01-01", endDate: "2021-12-31" }, value: 90 },
        { period: { startDate: "2022-01-01", endDate: "2022-12-31" }, value: 110 },
      ],
    };
    assert.equal(searchSection(section, REVENUE_ALIASES, 2022), 110);
  });

  it("applies the year filter to a single dated record", () => {
    const dated = { value: 500, period: { startDate: "2019-01-01", endDate: "2019-12-31" } };
    assert.equal(searchSection({ Revenues: dated }, REVENUE_ALIASES, 2022), null);
    assert.equal(searchSection({ Revenues: dated }, REVENUE_ALIASES, 2019), 500);
    assert.equal(searchSection({ Revenues: { val: 70, start: "2022-01-01", end: "2022-12-31" } }, REVENUE_ALIASES, 2022), 70);
  });

  it("moves on to the next alias when a dated record is for another year", () => {
    const section = {
      Revenues: { value: 1, period: { instant: "2020-12-31" } },
      SalesRevenueNet: { value: 2, period: { instant: "2022-12-31" } },
    };
    assert.equal(searchSection(section, REVENUE_ALIASES, 2022), 2);
  });

  it("normalizes undated records directly", () => {
    assert.equal(searchSection({ Revenues: { value: 5, decimals: 2 } }, REVENUE_ALIASES, 2022), 500);
  });

  it("finds nested concepts", () => {
    assert.equal(searchSection({ Table: { Detail: { SalesRevenueNet: "1,000" } } }, REVENUE_ALIASES, 2022), 1000);
  });
});

describe("resolveConcept", () => {
  it("searches priority sections before fallback sections", () => {
    const document = {
      StatementsOfOperations: { Revenues: 1 },
      StatementsOfIncome: { Revenues: 2 },
    };
    assert.equal(resolveConcept(document, REVENUE_ALIASES, 2022, { prioritySections: ["StatementsOfIncome"] }), 2);
  });

  it("falls back to prefixed sections in document order", () => {
    const document = {
      Notes: { Revenues: 1 },
      RevenueTables: { Revenues: 3 },
      StatementsOfOperations: { Revenues: 4 },
    };
    assert.equal(resolveConcept(document, REVENUE_ALIASES, 2022, { prioritySections: ["StatementsOfIncome"] }), 3);
  });

  it("returns null when the only dated record is for another year", () => {
    const document = { StatementsOfIncome: { Revenues: { value: 500, period: { startDate: "2019-01-01", endDate: "2019-12-31" } } } };
    assert.equal(resolveConcept(document, REVENUE_ALIASES, 2022), null);
  });

  it("ignores sections that match no fallback prefix", () => {
    assert.equal(resolveConcept({ Notes: { Revenues: 1 } }, REVENUE_ALIASES, 2022), null);
  });

  it("honours custom fallback prefixes", () => {
    assert.equal(resolveConcept({ Notes: { Revenues: 1 } }, REVENUE_ALIASES, 2022, { fallbackSectionPrefixes: ["Notes"] }), 1);
  });
});

describe("lookupFlat", () => {
  it("matches exact keys and namespaced keys", () => {
    assert.equal(lookupFlat({ Revenues: 5 }, REVENUE_ALIASES), 5);
    assert.equal(lookupFlat({ "us-gaap:SalesRevenueNet": 6 }, REVENUE_ALIASES), 6);
  });

  it("prefers earlier aliases", () => {
    assert.equal(lookupFlat({ SalesRevenueNet: 6, "us-gaap:Revenues": 5 }, REVENUE_ALIASES), 5);
  });

  it("returns null when no alias is present", () => {
    assert.equal(lookupFlat({ NetIncomeLoss: 1 }, REVENUE_ALIASES), null);
  });
});
