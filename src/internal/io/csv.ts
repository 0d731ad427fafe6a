import { createReadStream } from "node:fs";
import type { RawRow, TableSource } from "../../types";
import { sourceFromIterator, stripBom } from "./shared";

type QuoteState = "none" | "quoted" | "quote_in_quoted";

export class CsvRowParser {
  private readonly sep: string;
  private row: string[] = [];
  private cell = "";
  private quote: QuoteState = "none";
  private cellStarted = false;
  private skipLineFeed = false;

  constructor(sep = ",") {
    this.sep = sep;
  }

  push(text: string): RawRow[] {
    const rows: RawRow[] = [];

    for (const char of text) {
      if (this.skipLineFeed) {
        this.skipLineFeed = false;
        if (char === "\n") {
          continue;
        }
      }

      if (this.quote === "quoted") {
        if (char === '"') {
          this.quote = "quote_in_quoted";
        } else {
          this.cell += char;
        }
        continue;
      }

      if (this.quote === "quote_in_quoted") {
        if (char === '"') {
          this.cell += '"';
          this.quote = "quoted";
          continue;
        }
        this.quote = "none";
      }

      if (char === '"' && !this.cellStarted) {
        this.quote = "quoted";
        this.cellStarted = true;
        continue;
      }

      if (char === this.sep) {
        this.endCell();
        continue;
      }

      if (char === "\n" || char === "\r") {
        this.skipLineFeed = char === "\r";
        this.endRow(rows);
        continue;
      }

      this.cell += char;
      this.cellStarted = true;
    }

    return rows;
  }

  flush(): RawRow[] {
    const rows: RawRow[] = [];
    if (this.cellStarted || this.cell.length > 0 || this.row.length > 0) {
      this.endRow(rows);
    }
    this.quote = "none";
    this.skipLineFeed = false;
    return rows;
  }

  private endCell(): void {
    this.row.push(this.cell);
    this.cell = "";
    this.cellStarted = false;
    this.quote = "none";
  }

  private endRow(rows: RawRow[]): void {
    const isBlank = this.row.length === 0 && !this.cellStarted && this.cell.length === 0;
    this.endCell();
    if (!isBlank) {
      rows.push(this.row);
    }
    this.row = [];
  }
}

export function parseCsvText(text: string, sep = ","): { header: string[]; rows: RawRow[] } {
  const parser = new CsvRowParser(sep);
  const rows = [...parser.push(stripBom(text)), ...parser.flush()];
  const first = rows.shift();
  return {
    header: first ? first.map((value) => value.trim()) : [],
    rows,
  };
}

export async function openCsvSource(path: string, sep = ","): Promise<TableSource> {
  return sourceFromIterator(readCsvRows(path, sep), (row) => row.map((value) => value.trim()));
}

async function* readCsvRows(path: string, sep: string): AsyncGenerator<RawRow> {
  const parser = new CsvRowParser(sep);
  const stream = createReadStream(path, { encoding: "utf8" });
  let first = true;

  for await (const chunk of stream) {
    let text = String(chunk);
    if (first) {
      text = stripBom(text);
      first = false;
    }
    yield* parser.push(text);
  }
  yield* parser.flush();
}
