import type { ColumnType, ColumnTypes, RawRow } from "../../types";
import { isMissingRaw, isNumericText } from "../../utils";
import { explodeLiteral } from "./literal";

export interface DetectOptions {
  numericThreshold: number;
  listThreshold: number;
  naValues: ReadonlySet<string>;
  overrides?: Readonly<ColumnTypes>;
}

export interface ColumnTally {
  present: number;
  numeric: number;
  list: number;
}

export function tallyColumn(sample: readonly RawRow[], position: number, naValues: ReadonlySet<string>): ColumnTally {
  const tally: ColumnTally = { present: 0, numeric: 0, list: 0 };

  for (const row of sample) {
    const value = row[position];
    if (value === undefined || isMissingRaw(value, naValues)) {
      continue;
    }
    tally.present += 1;

    if (isNumericText(value)) {
      tally.numeric += 1;
    } else if (explodeLiteral(value) !== null) {
      tally.list += 1;
    }
  }

  return tally;
}

export function classifyTally(tally: ColumnTally, options: Pick<DetectOptions, "numericThreshold" | "listThreshold">): ColumnType {
  if (tally.present === 0) {
    return "categorical";
  }
  if (tally.numeric / tally.present >= options.numericThreshold) {
    return "numeric";
  }
  if (tally.list / tally.present >= options.listThreshold) {
    return "list";
  }
  return "categorical";
}

export function detectColumnTypes(
  header: readonly string[],
  sample: readonly RawRow[],
  options: DetectOptions
): ColumnTypes {
  const types: ColumnTypes = {};

  header.forEach((column, position) => {
    if (Object.prototype.hasOwnProperty.call(types, column)) {
      return;
    }
    const override = options.overrides?.[column];
    types[column] = override ?? classifyTally(tallyColumn(sample, position, options.naValues), options);
  });

  return types;
}
