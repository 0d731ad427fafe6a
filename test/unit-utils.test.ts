import { describe, expect, test } from "vitest";
import { cellToRaw, deepFreeze, isMissingRaw, isNumericText, parseNumber } from "../src/utils";

describe("utils.parseNumber", () => {
  test("parses plain and signed decimals", () => {
    expect(parseNumber("42")).toBe(42);
    expect(parseNumber(" -3.5e2 ")).toBe(-350);
    expect(parseNumber("+.5")).toBe(0.5);
    expect(parseNumber("5.")).toBe(5);
  });

  test("accepts underscores between digits only", () => {
    expect(parseNumber("1_000")).toBe(1000);
    expect(parseNumber("1__000")).toBeNull();
    expect(parseNumber("_1")).toBeNull();
  });

  test("accepts special words case-insensitively", () => {
    expect(parseNumber("inf")).toBe(Number.POSITIVE_INFINITY);
    expect(parseNumber("-Infinity")).toBe(Number.NEGATIVE_INFINITY);
    expect(parseNumber("NaN")).toBeNaN();
  });

  test("rejects everything else", () => {
    expect(parseNumber("")).toBeNull();
    expect(parseNumber("   ")).toBeNull();
    expect(parseNumber("abc")).toBeNull();
    expect(parseNumber("1e")).toBeNull();
    expect(parseNumber("0x10")).toBeNull();
    expect(parseNumber("1,000")).toBeNull();
  });

  test("isNumericText mirrors parseNumber", () => {
    expect(isNumericText("7")).toBe(true);
    expect(isNumericText("seven")).toBe(false);
  });
});

describe("utils.isMissingRaw", () => {
  test("matches configured markers exactly", () => {
    const markers = new Set(["", "NA"]);
    expect(isMissingRaw("", markers)).toBe(true);
    expect(isMissingRaw("NA", markers)).toBe(true);
    expect(isMissingRaw("na", markers)).toBe(false);
    expect(isMissingRaw(" ", markers)).toBe(false);
    expect(isMissingRaw(undefined, markers)).toBe(true);
  });
});

describe("utils.cellToRaw", () => {
  test("converts scalar cells", () => {
    expect(cellToRaw(null)).toBe("");
    expect(cellToRaw(undefined)).toBe("");
    expect(cellToRaw("x")).toBe("x");
    expect(cellToRaw(3.5)).toBe("3.5");
    expect(cellToRaw(false)).toBe("false");
    expect(cellToRaw(10n)).toBe("10");
  });

  test("converts dates, bytes and objects", () => {
    expect(cellToRaw(new Date(Date.UTC(2024, 0, 2)))).toBe("2024-01-02T00:00:00.000Z");
    expect(cellToRaw(new Uint8Array([104, 105]))).toBe("hi");
    expect(cellToRaw({ a: 1 })).toBe('{"a":1}');
    expect(cellToRaw([1, "b"])).toBe('[1,"b"]');
  });
});

describe("utils.deepFreeze", () => {
  test("freezes nested objects and arrays", () => {
    const value = deepFreeze({ outer: { inner: [1, 2] } });
    expect(Object.isFrozen(value)).toBe(true);
    expect(Object.isFrozen(value.outer)).toBe(true);
    expect(Object.isFrozen(value.outer.inner)).toBe(true);
  });
});
