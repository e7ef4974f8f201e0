import { describe, expect, it } from "vitest";
import {
  DEFAULT_ID_KEYWORDS,
  isIdentifierColumn,
  nameSuggestsIdentifier,
  tokenizeColumnName,
  valuesSuggestIdentifier,
  type IdentifierOptions
} from "../lib/profiling/identifier";

const nameOnly: IdentifierOptions = {
  nameKeywords: DEFAULT_ID_KEYWORDS,
  nameMatch: "substring",
  uniqueness: null
};

describe("identifier heuristic", () => {
  it("flags user_id regardless of uniqueness", () => {
    expect(isIdentifierColumn("user_id", [1, 1, 1, 2])).toBe(true);
    expect(isIdentifierColumn(" User_ID ", [5, 5, 5, 5], nameOnly)).toBe(true);
  });

  it("flags an all-distinct, fully populated column", () => {
    const values = Array.from({ length: 100 }, (_, index) => index);
    expect(isIdentifierColumn("record", values)).toBe(true);
  });

  it("keeps a repetitive measurement column", () => {
    expect(isIdentifierColumn("age", [10, 11, 10, 12, 11])).toBe(false);
  });

  it("ignores distinct values in a sparse column", () => {
    const values = [1, 2, 3, null, null, null, null, null, null, null];
    expect(isIdentifierColumn("score", values)).toBe(false);
  });

  it("skips the uniqueness signal when disabled", () => {
    expect(isIdentifierColumn("score", [1, 2, 3], nameOnly)).toBe(false);
  });

  it("can restrict the uniqueness signal to integers and a minimum sample", () => {
    const options = { minUniqueRatio: 0.9, minCoverage: 0, minSamples: 3, integersOnly: true };
    expect(valuesSuggestIdentifier([1, 2, 3], options)).toBe(true);
    expect(valuesSuggestIdentifier([1.5, 2.5, 3.5], options)).toBe(false);
    expect(valuesSuggestIdentifier([1, 2], options)).toBe(false);
  });
});

describe("identifier name matching", () => {
  it("matches keywords anywhere in substring mode", () => {
    expect(nameSuggestsIdentifier("paid", DEFAULT_ID_KEYWORDS, "substring")).toBe(true);
    expect(nameSuggestsIdentifier("valid_from", DEFAULT_ID_KEYWORDS, "substring")).toBe(true);
    expect(nameSuggestsIdentifier("amount", DEFAULT_ID_KEYWORDS, "substring")).toBe(false);
  });

  it("requires a whole token in token mode", () => {
    expect(nameSuggestsIdentifier("paid", DEFAULT_ID_KEYWORDS, "token")).toBe(false);
    expect(nameSuggestsIdentifier("valid_from", DEFAULT_ID_KEYWORDS, "token")).toBe(false);
    expect(nameSuggestsIdentifier("orderID", DEFAULT_ID_KEYWORDS, "token")).toBe(true);
    expect(nameSuggestsIdentifier("customerKey", DEFAULT_ID_KEYWORDS, "token")).toBe(true);
    expect(nameSuggestsIdentifier("user_id", DEFAULT_ID_KEYWORDS, "token")).toBe(true);
  });

  it("splits names on separators and camelCase", () => {
    expect(tokenizeColumnName("UserID")).toEqual(["user", "id"]);
    expect(tokenizeColumnName("HTTPStatusCode")).toEqual(["http", "status", "code"]);
    expect(tokenizeColumnName("order-line id")).toEqual(["order", "line", "id"]);
  });
});
