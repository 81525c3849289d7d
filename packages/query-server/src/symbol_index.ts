import type { Location, SymbolRecord } from '@tagstream/shared';
import { compareLocations, FileTable } from './location';

/** Position of an entry in a {@link SymbolIndex}. */
export type Cursor = number;

export class SymbolIndex {
  private constructor(private readonly records: readonly SymbolRecord[]) {}

  static fromRecords(records: Iterable<SymbolRecord>): SymbolIndex {
    const sorted = Array.from(records).sort((a, b) => compareLocations(a.location, b.location));
    const unique: SymbolRecord[] = [];
    for (const rec of sorted) {
      const last = unique[unique.length - 1];
      if (last && compareLocations(last.location, rec.location) === 0) unique[unique.length - 1] = rec;
      else unique.push(rec);
    }
    return new SymbolIndex(unique);
  }

  static empty(): SymbolIndex {
    return new SymbolIndex([]);
  }

  get size() {
    return this.records.length;
  }

  /** First cursor whose key is not less than `location`; `size` when none. */
  lowerBound(location: Location): Cursor {
    let lo = 0;
    let hi = this.records.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (compareLocations(this.records[mid].location, location) < 0) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }

  find(location: Location): Cursor | undefined {
    const cursor = this.lowerBound(location);
    if (cursor < this.records.length && compareLocations(this.records[cursor].location, location) === 0) return cursor;
    return undefined;
  }

  /** Undefined once the beginning of the index is passed. */
  previous(cursor: Cursor): Cursor | undefined {
    return cursor > 0 && cursor <= this.records.length ? cursor - 1 : undefined;
  }

  at(cursor: Cursor): SymbolRecord {
    if (!Number.isInteger(cursor) || cursor < 0 || cursor >= this.records.length) {
      throw new RangeError(`Cursor ${cursor} out of range (size ${this.records.length})`);
    }
    return this.records[cursor];
  }

  get(location: Location): SymbolRecord | undefined {
    const cursor = this.find(location);
    return cursor === undefined ? undefined : this.records[cursor];
  }

  /** Half-open cursor range covering every entry of `fileId`. */
  fileRange(fileId: number): [Cursor, Cursor] {
    const start = this.lowerBound({ fileId, line: 0, column: 0 });
    const end = this.lowerBound({ fileId: fileId + 1, line: 0, column: 0 });
    return [start, end];
  }

  *entries(from: Cursor = 0, to: Cursor = this.records.length): IterableIterator<SymbolRecord> {
    for (let i = Math.max(0, from); i < Math.min(to, this.records.length); i++) yield this.records[i];
  }

  [Symbol.iterator](): IterableIterator<SymbolRecord> {
    return this.entries();
  }
}

/** What a query runs against: one loaded index plus the file table its keys use. */
export interface IndexSnapshot {
  files: FileTable;
  symbols: SymbolIndex;
  root?: string;
}
