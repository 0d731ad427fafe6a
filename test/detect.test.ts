import { describe, expect, test } from "vitest";
import { classifyTally, detectColumnTypes, tallyColumn } from "../src/internal/analysis/detect";
import type { RawRow } from "../src/types";

const options = {
  numericThreshold: 0.8,
  listThreshold: 0.8,
  naValues: new Set([""]),
};

const sample: RawRow[] = [
  ["10", "a", '["x"]'],
  ["20", "b", "['y', 'z']"],
  ["30", "a", "[]"],
  ["bad", "", "{'k': 1}"],
  ["40", "c", "oops"],
];

describe("detectColumnTypes", () => {
  test("classifies by share of present values", () => {
    expect(detectColumnTypes(["price", "tag", "labels"], sample, options)).toEqual({
      price: "numeric",
      tag: "categorical",
      labels: "list",
    });
  });

  test("is deterministic across calls", () => {
    const header = ["price", "tag", "labels"];
    expect(detectColumnTypes(header, sample, options)).toEqual(detectColumnTypes(header, sample, options));
  });

  test("falls back to categorical without present values", () => {
    expect(detectColumnTypes(["a", "b"], [], options)).toEqual({ a: "categorical", b: "categorical" });
    expect(detectColumnTypes(["a"], [[""], [""]], options)).toEqual({ a: "categorical" });
  });

  test("treats a column missing from short rows as absent", () => {
    expect(detectColumnTypes(["a", "b"], [["1"], ["2"]], options)).toEqual({ a: "numeric", b: "categorical" });
  });

  test("honors explicit overrides", () => {
    const types = detectColumnTypes(["price", "tag", "labels"], sample, {
      ...options,
      overrides: { tag: "list", price: "categorical" },
    });
    expect(types).toEqual({ price: "categorical", tag: "list", labels: "list" });
  });

  test("uses the first occurrence of a repeated header name", () => {
    expect(detectColumnTypes(["a", "a"], [["1", "x"]], options)).toEqual({ a: "numeric" });
  });

  test("configured missing markers leave the denominator", () => {
    const rows: RawRow[] = [["1"], ["2"], ["NA"], ["NA"]];
    expect(detectColumnTypes(["v"], rows, options)).toEqual({ v: "categorical" });
    expect(detectColumnTypes(["v"], rows, { ...options, naValues: new Set(["", "NA"]) })).toEqual({ v: "numeric" });
  });
});

describe("tallyColumn and classifyTally", () => {
  test("counts numeric and list values separately", () => {
    expect(tallyColumn(sample, 0, options.naValues)).toEqual({ present: 5, numeric: 4, list: 0 });
    expect(tallyColumn(sample, 1, options.naValues)).toEqual({ present: 4, numeric: 0, list: 0 });
    expect(tallyColumn(sample, 2, options.naValues)).toEqual({ present: 5, numeric: 0, list: 4 });
  });

  test("applies thresholds inclusively", () => {
    const thresholds = { numericThreshold: 0.8, listThreshold: 0.5 };
    expect(classifyTally({ present: 10, numeric: 8, list: 0 }, thresholds)).toBe("numeric");
    expect(classifyTally({ present: 10, numeric: 7, list: 3 }, thresholds)).toBe("categorical");
    expect(classifyTally({ present: 10, numeric: 5, list: 5 }, thresholds)).toBe("list");
    expect(classifyTally({ present: 0, numeric: 0, list: 0 }, thresholds)).toBe("categorical");
  });
});
