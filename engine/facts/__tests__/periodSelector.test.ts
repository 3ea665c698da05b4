import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { readFilingDate, readPeriod, selectAnnualValue } from "../periodSelector.js";

const duration = (startDate: string, endDate: string, value: number, extra: Record<string, string> = {}) => ({
  period: { startDate, endDate },
  value,
  ...extra,
});

describe("readPeriod", () => {
  it("reads nested durations and instants", () => {
    assert.deepEqual(readPeriod({ period: { startDate: "2022-01-01", endDate: "2022-12-31" } }), {
      startDate: "2022-01-01",
      endDate: "2022-12-31",
    });
    assert.deepEqual(readPeriod({ period: { instant: "2022-12-31" } }), { startDate: null, endDate: "2022-12-31" });
  });

  it("reads flat start/end fields", () => {
    assert.deepEqual(readPeriod({ start: "2021-10-01", end: "2022-09-30" }), { startDate: "2021-10-01", endDate: "2022-09-30" });
    assert.deepEqual(readPeriod({ val: 1 }), { startDate: null, endDate: null });
  });

  it("reads the filing date from filed or filedAt", () => {
    assert.equal(readFilingDate({ filed: "2023-02-01" }), "2023-02-01");
    assert.equal(readFilingDate({ filedAt: "2023-03-01" }), "2023-03-01");
    assert.equal(readFilingDate({}), null);
  });
});

describe("selectAnnualValue", () => {
  it("picks the candidate ending in the fiscal year", () => {
    const candidates = [duration("2021-01-01", "2021-12-31", 10), duration("2022-01-01", "2022-12-31", 20)];
    assert.equal(selectAnnualValue(candidates, 2022), 20);
    assert.equal(selectAnnualValue(candidates, 2021), 10);
    assert.equal(selectAnnualValue(candidates, 2020), null);
  });

  it("drops multi-year cumulative periods", () => {
    const candidates = [duration("2020-01-01", "2022-12-31", 999)];
    assert.equal(selectAnnualValue(candidates, 2022), null);
  });

  it("accepts an off-calendar fiscal year spanning one boundary", () => {
    const candidates = [duration("2021-10-01", "2022-09-30", 55)];
    assert.equal(selectAnnualValue(candidates, 2022), 55);
  });

  it("prefers the shortest duration, then the latest filing", () => {
    const candidates = [
      duration("2021-10-01", "2022-09-30", 1, { filed: "2022-11-01" }),
      duration("2022-01-01", "2022-12-31", 2, { filed: "2023-02-01" }),
      duration("2022-01-01", "2022-12-31", 3, { filed: "2023-05-01" }),
    ];
    assert.equal(selectAnnualValue(candidates, 2022), 3);
  });

  it("keeps input order when nothing else separates candidates", () => {
    const candidates = [duration("2022-01-01", "2022-12-31", 4), duration("2022-01-01", "2022-12-31", 5)];
    assert.equal(selectAnnualValue(candidates, 2022), 4);
  });

  it("ranks a filed candidate ahead of one without a filing date", () => {
    const candidates = [duration("2022-01-01", "2022-12-31", 6), duration("2022-01-01", "2022-12-31", 7, { filed: "2023-01-15" })];
    assert.equal(selectAnnualValue(candidates, 2022), 7);
  });

  it("treats instants as zero-length periods", () => {
    assert.equal(selectAnnualValue([{ period: { instant: "2022-12-31" }, value: "1,500" }], 2022), 1500);
  });

  it("skips malformed candidates", () => {
    const candidates = [null, 5, "x", { value: 1 }, { period: { endDate: "2022-12-31" }, value: "n/a" }, duration("2022-01-01", "2022-12-31", 8)];
    assert.equal(selectAnnualValue(candidates, 2022), 8);
    assert.equal(selectAnnualValue([], 2022), null);
  });

  it("normalizes scaled candidate values", () => {
    assert.equal(selectAnnualValue([{ start: "2022-01-01", end: "2022-12-31", val: 12, decimals: 3 }], 2022), 12000);
  });
});
