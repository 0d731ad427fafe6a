import { describe, expect, test } from "vitest";
import { CsvRowParser } from "../src/internal/io/csv";
import { parse_csv } from "../src/io";

describe("parse_csv", () => {
  test("handles quoted separators and doubled quotes", () => {
    expect(parse_csv('a,b\n1,"x, y"\n2,"he said ""hi"""\n')).toEqual({
      header: ["a", "b"],
      rows: [
        ["1", "x, y"],
        ["2", 'he said "hi"'],
      ],
    });
  });

  test("keeps newlines inside quotes", () => {
    expect(parse_csv('a,b\n1,"line1\nline2"\n').rows).toEqual([["1", "line1\nline2"]]);
  });

  test("accepts CRLF and a missing final newline", () => {
    expect(parse_csv("a,b\r\n1,2\r\n3,4").rows).toEqual([
      ["1", "2"],
      ["3", "4"],
    ]);
  });

  test("strips a byte order mark and drops blank lines", () => {
    expect(parse_csv("\ufeffa\n\n1\n\n2\n")).toEqual({ header: ["a"], rows: [["1"], ["2"]] });
  });

  test("trims header names but not values", () => {
    expect(parse_csv(" a , b \n1, 2\n")).toEqual({ header: ["a", "b"], rows: [["1", " 2"]] });
  });

  test("keeps empty fields and quoted empty rows", () => {
    expect(parse_csv('a,b\n,\n""\n').rows).toEqual([["", ""], [""]]);
  });

  test("treats a quote inside an unquoted field literally", () => {
    expect(parse_csv('a\nx"y\n').rows).toEqual([['x"y']]);
  });

  test("supports other delimiters", () => {
    expect(parse_csv("a;b\n1;2,5\n", { sep: ";" }).rows).toEqual([["1", "2,5"]]);
    expect(parse_csv("a\tb\n1\t2\n", { sep: "\t" }).rows).toEqual([["1", "2"]]);
  });

  test("returns an empty header for empty input", () => {
    expect(parse_csv("")).toEqual({ header: [], rows: [] });
  });
});

describe("CsvRowParser", () => {
  test("carries state across chunk boundaries", () => {
    const parser = new CsvRowParser(",");
    expect(parser.push('a,"b')).toEqual([]);
    expect(parser.push('c"\r')).toEqual([["a", "bc"]]);
    expect(parser.push("\n1,2")).toEqual([]);
    expect(parser.flush()).toEqual([["1", "2"]]);
  });

  test("splits a doubled quote across chunks", () => {
    const parser = new CsvRowParser(",");
    parser.push('"x"');
    parser.push('"y"\n');
    expect(parser.flush()).toEqual([]);
    const again = new CsvRowParser(",");
    expect([...again.push('"x"'), ...again.push('"y"\n')]).toEqual([['x"y']]);
  });
});
