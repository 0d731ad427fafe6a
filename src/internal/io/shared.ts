import { extname } from "node:path";
import type { RawRow, SourceFormat, TableSource } from "../../types";

export function stripBom(text: string): string {
  if (text.charCodeAt(0) === 0xfeff) {
    return text.slice(1);
  }
  return text;
}

const FORMAT_BY_EXTENSION: Record<string, SourceFormat> = {
  ".csv": "csv",
  ".txt": "csv",
  ".tsv": "tsv",
  ".tab": "tsv",
  ".jsonl": "jsonl",
  ".ndjson": "jsonl",
  ".xlsx": "xlsx",
  ".xls": "xlsx",
  ".parquet": "parquet",
};

export function inferFormat(path: string): SourceFormat {
  return FORMAT_BY_EXTENSION[extname(path).toLowerCase()] ?? "csv";
}

export function tableSource(
  header: string[],
  rows: AsyncGenerator<RawRow>,
  cleanup?: () => Promise<void>
): TableSource {
  let closed = false;
  const close = async (): Promise<void> => {
    if (closed) {
      return;
    }
    closed = true;
    try {
      await rows.return(undefined);
    } finally {
      await cleanup?.();
    }
  };

  return { header, rows: drain(rows, close), close };
}

export async function sourceFromIterator(
  rows: AsyncGenerator<RawRow>,
  toHeader: (row: RawRow) => string[] = (row) => row
): Promise<TableSource> {
  const first = await rows.next();
  const header = first.done ? [] : toHeader(first.value);
  return tableSource(header, rows);
}

async function* drain(rows: AsyncGenerator<RawRow>, close: () => Promise<void>): AsyncGenerator<RawRow> {
  try {
    while (true) {
      const next = await rows.next();
      if (next.done) {
        return;
      }
      yield next.value;
    }
  } finally {
    await close();
  }
}
