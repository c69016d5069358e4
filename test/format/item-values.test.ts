import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  formatItemTime,
  parseFlag,
  parseFloatStrict,
  parseHex,
  parseInteger,
  parseItemTime,
} from "../../src/format/item-values.js";

describe("parseInteger", () => {
  it("should parse signed integers", () => {
    assert.equal(parseInteger("42"), 42);
    assert.equal(parseInteger(" -7 "), -7);
    assert.equal(parseInteger("+3"), 3);
  });

  it("should reject fractions, words and out-of-range values", () => {
    assert.equal(parseInteger("4.2"), null);
    assert.equal(parseInteger("twelve"), null);
    assert.equal(parseInteger(""), null);
    assert.equal(parseInteger("2147483648"), null);
  });
});

describe("parseFloatStrict", () => {
  it("should parse decimal and exponent forms", () => {
    assert.equal(parseFloatStrict("1.5"), 1.5);
    assert.equal(parseFloatStrict("-0.25"), -0.25);
    assert.equal(parseFloatStrict("1e3"), 1000);
    assert.equal(parseFloatStrict(".5"), 0.5);
  });

  it("should reject anything else", () => {
    assert.equal(parseFloatStrict("north"), null);
    assert.equal(parseFloatStrict(""), null);
    assert.equal(parseFloatStrict("1.2.3"), null);
    assert.equal(parseFloatStrict("0x10"), null);
  });
});

describe("parseFlag", () => {
  it("should treat 1 as true and other integers as false", () => {
    assert.equal(parseFlag("1"), true);
    assert.equal(parseFlag("0"), false);
    assert.equal(parseFlag("2"), false);
  });

  it("should reject non-integers and values outside a byte", () => {
    assert.equal(parseFlag("yes"), null);
    assert.equal(parseFlag("300"), null);
  });
});

describe("parseHex", () => {
  it("should parse hex digits of either case", () => {
    assert.equal(parseHex("22"), 34);
    assert.equal(parseHex("000022"), 34);
    assert.equal(parseHex("Ff"), 255);
  });

  it("should reject signs, spaces and empty fields", () => {
    assert.equal(parseHex("+1"), null);
    assert.equal(parseHex(" 1"), null);
    assert.equal(parseHex("zz"), null);
    assert.equal(parseHex(""), null);
  });
});

describe("parseItemTime", () => {
  it("should parse UTC timestamps with milliseconds", () => {
    assert.equal(parseItemTime("2021-01-01T00:00:00.000Z")?.getTime(), Date.UTC(2021, 0, 1));
  });

  it("should accept a missing or longer fraction", () => {
    assert.equal(parseItemTime("2021-06-15T12:34:56Z")?.getTime(), Date.UTC(2021, 5, 15, 12, 34, 56));
    assert.equal(parseItemTime("2021-06-15T12:34:56.789123Z")?.getTime(), Date.UTC(2021, 5, 15, 12, 34, 56, 789));
    assert.equal(parseItemTime("2021-06-15T12:34:56.5Z")?.getTime(), Date.UTC(2021, 5, 15, 12, 34, 56, 500));
  });

  it("should reject other layouts and impossible dates", () => {
    assert.equal(parseItemTime("2021-01-01 00:00:00"), null);
    assert.equal(parseItemTime("2021-01-01T00:00:00+01:00"), null);
    assert.equal(parseItemTime("2021-02-30T00:00:00.000Z"), null);
    assert.equal(parseItemTime("2021-01-01T24:00:00.000Z"), null);
  });

  it("should format back to the same layout", () => {
    assert.equal(formatItemTime(new Date(Date.UTC(2021, 0, 1))), "2021-01-01T00:00:00.000Z");
  });
});
