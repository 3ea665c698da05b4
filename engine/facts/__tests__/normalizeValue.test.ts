import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { normalizeValue } from "../normalizeValue.js";

describe("normalizeValue", () => {
  it("passes finite numbers through", () => {
    assert.equal(normalizeValue(42), 42);
    assert.equal(normalizeValue(-3.5), -3.5);
    assert.equal(normalizeValue(Number.NaN), null);
    assert.equal(normalizeValue(Number.POSITIVE_INFINITY), null);
  });

  it("parses formatted strings", () => {
    assert.equal(normalizeValue("1,234"), 1234);
    assert.equal(normalizeValue("$56"), 56);
    assert.equal(normalizeValue(" $ 1,000.5 "), 1000.5);
    assert.equal(normalizeValue("(78)"), -78);
    assert.equal(normalizeValue("($1,200)"), -1200);
    assert.equal(normalizeValue("1e3"), 1000);
  });

  it("rejects strings that are not numbers", () => {
    assert.equal(normalizeValue("n/a"), null);
    assert.equal(normalizeValue(""), null);
    assert.equal(normalizeValue("12abc"), null);
    assert.equal(normalizeValue("Infinity"), null);
  });

  it("scales value/decimals records", () => {
    assert.equal(normalizeValue({ value: 5, decimals: 3 }), 5000);
    assert.equal(normalizeValue({ value: 1234, decimals: -2 }), 12.34);
    assert.equal(normalizeValue({ val: "2,000", decimals: "0" }), 2000);
    assert.equal(normalizeValue({ value: 7 }), 7);
  });

  it("reads scaled string values and bracketed currency amounts", () => {
    assert.equal(normalizeValue({ value: "1234", decimals: "-2" }), 12.34);
    assert.equal(normalizeValue("$(1,234)"), -1234);
  });

  it("treats a non-integer exponent as zero", () => {
    assert.equal(normalizeValue({ value: 9, decimals: "INF" }), 9);
    assert.equal(normalizeValue({ value: 9, decimals: 1.5 }), 9);
  });

  it("returns null for records without a usable value and for other types", () => {
    assert.equal(normalizeValue({ decimals: 3 }), null);
    assert.equal(normalizeValue({ value: "abc", decimals: 0 }), null);
    assert.equal(normalizeValue(null), null);
    assert.equal(normalizeValue(undefined), null);
    assert.equal(normalizeValue(true), null);
    assert.equal(normalizeValue([1, 2]), null);
  });
});
