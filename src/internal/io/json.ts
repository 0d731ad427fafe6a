import { createReadStream } from "node:fs";
import { createInterface } from "node:readline";
import type { RawRow, TableSource } from "../../types";
import { cellToRaw } from "../../utils";
import { stripBom, tableSource } from "./shared";

type JsonRecord = Record<string, unknown>;

export async function openJsonLinesSource(path: string): Promise<TableSource> {
  const records = readJsonRecords(path);
  let first = await records.next();
  let leadingMalformed = 0;
  while (!first.done && first.value === null) {
    leadingMalformed += 1;
    first = await records.next();
  }

  if (first.done || first.value === null) {
    return tableSource([], noRows());
  }

  const header = Object.keys(first.value);
  return tableSource(header, recordsToRows(header, leadingMalformed, first.value, records));
}

export function parseJsonLine(line: string): JsonRecord | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (error) {
    if (error instanceof SyntaxError) {
      return null;
    }
    throw error;
  }
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    return null;
  }
  return Object.fromEntries(Object.entries(parsed));
}

async function* readJsonRecords(path: string): AsyncGenerator<JsonRecord | null> {
  const input = createReadStream(path, { encoding: "utf8" });
  const lines = createInterface({ input, crlfDelay: Infinity });

  let first = true;
  try {
    for await (const rawLine of lines) {
      const line = (first ? stripBom(rawLine) : rawLine).trim();
      first = false;
      if (line.length === 0) {
        continue;
      }
      yield parseJsonLine(line);
    }
  } finally {
    lines.close();
    input.destroy();
  }
}

async function* recordsToRows(
  header: string[],
  leadingMalformed: number,
  firstRecord: JsonRecord,
  records: AsyncGenerator<JsonRecord | null>
): AsyncGenerator<RawRow> {
  try {
    for (let line = 0; line < leadingMalformed; line += 1) {
      yield [];
    }
    yield header.map((column) => cellToRaw(firstRecord[column]));
    for await (const record of records) {
      if (record === null) {
        yield [];
        continue;
      }
      yield header.map((column) => cellToRaw(record[column]));
    }
  } finally {
    await records.return(undefined);
  }
}

async function* noRows(): AsyncGenerator<RawRow> {}
