import type { Location, SymbolRecord } from '@tagstream/shared';
import { ContractViolation } from './errors';
import { comparePosition, formatLocationKey, isNullLocation, KeyOptions } from './location';
import { Logger, silentLogger } from './logger';
import { ResultWriter, WriteOptions } from './result_writer';
import { isContainerKind } from './symbol_kinds';
import type { Cursor, IndexSnapshot, SymbolIndex } from './symbol_index';

export interface Annotations {
  containingFunction?: boolean;
  cursorKind?: boolean;
  displayName?: boolean;
}

export interface LocationWriterOptions {
  /** -1 means unrestricted; a restricted range always carries both bounds. */
  minLine?: number;
  maxLine?: number;
  annotations?: Annotations;
  keyOptions?: KeyOptions;
  logger?: Logger;
}

/**
 * Walks backwards from `cursor` (the entry for `location`) looking for the
 * nearest container definition whose range covers the location. Never
 * leaves the location's file.
 */
export function findContainingFunction(index: SymbolIndex, cursor: Cursor, location: Location): SymbolRecord | undefined {
  const { fileId, line, column } = location;
  for (let it = index.previous(cursor); it !== undefined; it = index.previous(it)) {
    const candidate = index.at(it);
    if (candidate.location.fileId !== fileId) break;
    if (
      candidate.isDefinition &&
      isContainerKind(candidate.kind) &&
      comparePosition(line, column, candidate.startLine, candidate.startColumn) >= 0 &&
      comparePosition(line, column, candidate.endLine, candidate.endColumn) <= 0
    ) {
      return candidate;
    }
  }
  return undefined;
}

export class LocationWriter {
  private readonly minLine: number;
  private readonly maxLine: number;
  private readonly annotations: Annotations;
  private readonly keyOptions: KeyOptions;
  private readonly logger: Logger;

  constructor(
    private readonly results: ResultWriter,
    private readonly snapshot: IndexSnapshot,
    options: LocationWriterOptions = {},
  ) {
    this.minLine = options.minLine ?? -1;
    this.maxLine = options.maxLine ?? -1;
    this.annotations = options.annotations ?? {};
    this.keyOptions = options.keyOptions ?? {};
    this.logger = options.logger ?? silentLogger;
  }

  inRange(line: number): boolean {
    if (this.minLine === -1) return true;
    if (this.maxLine === -1) throw new ContractViolation(`Line range starting at ${this.minLine} has no upper bound`);
    return line >= this.minLine && line <= this.maxLine;
  }

  write(location: Location, options: WriteOptions = {}): boolean {
    if (isNullLocation(location)) return false;
    if (!this.inRange(location.line)) return false;
    const key = formatLocationKey(location, this.snapshot.files, this.keyOptions);
    const annotation = this.annotate(location, key);
    // path filters name absolute paths, whatever root the key is rendered against
    const filterKey = this.keyOptions.absolute ? key : formatLocationKey(location, this.snapshot.files, { absolute: true });
    if (!this.results.admits(filterKey + annotation, options)) return true;
    return this.results.write(key + annotation, { ...options, unfiltered: true });
  }

  private annotate(location: Location, key: string): string {
    const { containingFunction, cursorKind, displayName } = this.annotations;
    if (!containingFunction && !cursorKind && !displayName) return '';
    const symbols = this.snapshot.symbols;
    const cursor = symbols.find(location);
    if (cursor === undefined) {
      this.logger.warn(`Can't find ${key} in symbols`);
      return '';
    }
    const rec = symbols.at(cursor);
    let out = '';
    if (displayName) out += '\t' + rec.displayName;
    if (cursorKind) out += '\t' + rec.kindSpelling;
    if (containingFunction) {
      const container = findContainingFunction(symbols, cursor, location);
      if (container) out += '\tfunction: ' + container.symbolName;
    }
    return out;
  }
}
