import { readFile } from "node:fs/promises";
import * as XLSX from "xlsx";
import { AnalysisError, ErrorCode } from "../../errors";
import type { RawRow, TableSource } from "../../types";
import { cellToRaw } from "../../utils";
import { tableSource } from "./shared";

export async function openExcelSource(path: string, sheetName?: string | number): Promise<TableSource> {
  const bytes = await readFile(path);
  const workbook = XLSX.read(bytes, { type: "buffer", cellDates: true });
  const sheet = selectSheet(workbook, sheetName);
  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: true,
    defval: null,
    blankrows: false,
  });

  const [first, ...rest] = matrix;
  const header = (first ?? []).map((value) => cellToRaw(value).trim());
  return tableSource(header, matrixRows(rest));
}

async function* matrixRows(matrix: unknown[][]): AsyncGenerator<RawRow> {
  for (const source of matrix) {
    yield source.map(cellToRaw);
  }
}

function selectSheet(workbook: XLSX.WorkBook, sheetName?: string | number): XLSX.WorkSheet {
  const name = typeof sheetName === "number" || sheetName === undefined
    ? workbook.SheetNames[sheetName ?? 0]
    : sheetName;
  const sheet = name === undefined ? undefined : workbook.Sheets[name];

  if (!sheet) {
    const label = sheetName === undefined ? "any sheets" : `sheet '${String(sheetName)}'`;
    throw new AnalysisError(`Workbook does not contain ${label}.`, {
      code: ErrorCode.UNSUPPORTED_FORMAT,
      details: { available: workbook.SheetNames },
    });
  }
  return sheet;
}
