import type { ParquetReader } from "parquetjs-lite";
import type { RawRow, TableSource } from "../../types";
import { cellToRaw } from "../../utils";
import { tableSource } from "./shared";

export async function openParquetSource(path: string): Promise<TableSource> {
  const parquet = await import("parquetjs-lite");
  const reader = await parquet.ParquetReader.openFile(path);
  const header = reader
    .getSchema()
    .fieldList.filter((field) => field.path.length === 1)
    .map((field) => field.name);

  return tableSource(header, parquetRows(reader, header), () => reader.close());
}

async function* parquetRows(reader: ParquetReader, header: string[]): AsyncGenerator<RawRow> {
  const cursor = reader.getCursor();
  let next = await cursor.next();
  while (next) {
    const record = next;
    yield header.map((column) => cellToRaw(record[column]));
    next = await cursor.next();
  }
}
