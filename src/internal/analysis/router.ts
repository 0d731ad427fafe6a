import type { ColumnTypes, RawRow } from "../../types";
import { createAccumulator, type ColumnAccumulator } from "./accumulators";
import { keyForValues } from "./keys";

export interface MeasuredColumn {
  name: string;
  position: number;
}

export interface GroupState {
  keyValues: string[];
  accumulators: Map<string, ColumnAccumulator>;
}

export class GroupRouter {
  private readonly groups = new Map<string, GroupState>();
  private readonly keyPositions: number[];
  private readonly types: Readonly<ColumnTypes>;
  private readonly measuredNames: string[];

  constructor(types: Readonly<ColumnTypes>, keyPositions: number[], measured: readonly MeasuredColumn[]) {
    this.types = types;
    this.keyPositions = keyPositions;
    this.measuredNames = [...new Set(measured.map((column) => column.name))];
  }

  get size(): number {
    return this.groups.size;
  }

  keyValuesFor(row: RawRow): string[] {
    return this.keyPositions.map((position) => row[position] ?? "");
  }

  route(row: RawRow): GroupState {
    const keyValues = this.keyValuesFor(row);
    const key = keyForValues(keyValues);
    const existing = this.groups.get(key);
    if (existing) {
      return existing;
    }

    const created: GroupState = { keyValues, accumulators: this.createAccumulators() };
    this.groups.set(key, created);
    return created;
  }

  merge(other: GroupRouter): void {
    for (const [key, incoming] of other.groups) {
      const existing = this.groups.get(key);
      if (!existing) {
        const adopted: GroupState = { keyValues: [...incoming.keyValues], accumulators: this.createAccumulators() };
        mergeAccumulators(adopted, incoming);
        this.groups.set(key, adopted);
        continue;
      }
      mergeAccumulators(existing, incoming);
    }
  }

  groupStates(): IterableIterator<GroupState> {
    return this.groups.values();
  }

  private createAccumulators(): Map<string, ColumnAccumulator> {
    const accumulators = new Map<string, ColumnAccumulator>();
    for (const name of this.measuredNames) {
      accumulators.set(name, createAccumulator(this.types[name] ?? "categorical"));
    }
    return accumulators;
  }
}

function mergeAccumulators(target: GroupState, source: GroupState): void {
  for (const [name, accumulator] of source.accumulators) {
    const existing = target.accumulators.get(name);
    if (existing) {
      existing.merge(accumulator);
    } else {
      target.accumulators.set(name, accumulator);
    }
  }
}
