import type { FrequencyPair } from "../../types";

export class FrequencyTable {
  private readonly counts = new Map<string, number>();
  private totalCount = 0;

  get total(): number {
    return this.totalCount;
  }

  get size(): number {
    return this.counts.size;
  }

  increment(token: string, by = 1): void {
    this.counts.set(token, (this.counts.get(token) ?? 0) + by);
    this.totalCount += by;
  }

  absorb(other: FrequencyTable): void {
    for (const [token, count] of other.counts) {
      this.increment(token, count);
    }
  }

  entries(): IterableIterator<[string, number]> {
    return this.counts.entries();
  }

  top(limit: number): FrequencyPair[] {
    return selectTopKCountEntries(this.counts.entries(), limit);
  }
}

function selectTopKCountEntries(entries: Iterable<[string, number]>, limit: number): FrequencyPair[] {
  if (limit <= 0) {
    return [];
  }

  const selected: FrequencyPair[] = [];
  for (const [token, count] of entries) {
    let lo = 0;
    let hi = selected.length;
    while (lo < hi) {
      const mid = (lo + hi) >> 1;
      const current = selected[mid];
      if (current !== undefined && count > current[1]) {
        hi = mid;
      } else {
        lo = mid + 1;
      }
    }

    if (selected.length < limit) {
      selected.splice(lo, 0, [token, count]);
      continue;
    }
    if (lo < limit) {
      selected.splice(lo, 0, [token, count]);
      selected.pop();
    }
  }
  return selected;
}
