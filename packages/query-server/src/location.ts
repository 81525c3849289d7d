import path from 'path';
import type { Location } from '@tagstream/shared';

export const NULL_LOCATION: Location = Object.freeze({ fileId: 0, line: 0, column: 0 });

export function makeLocation(fileId: number, line: number, column: number): Location {
  return Object.freeze({ fileId, line, column });
}

export function isNullLocation(location: Location): boolean {
  return location.fileId === 0;
}

export function comparePosition(line: number, column: number, refLine: number, refColumn: number): number {
  if (line !== refLine) return line < refLine ? -1 : 1;
  if (column !== refColumn) return column < refColumn ? -1 : 1;
  return 0;
}

export function compareLocations(a: Location, b: Location): number {
  if (a.fileId !== b.fileId) return a.fileId < b.fileId ? -1 : 1;
  return comparePosition(a.line, a.column, b.line, b.column);
}

/** Maps file ids to paths and back. Id 0 is reserved for the null location. */
export class FileTable {
  private byId = new Map<number, string>();
  private byPath = new Map<string, number>();
  private nextId = 1;

  register(filePath: string, id?: number): number {
    const existing = this.byPath.get(filePath);
    if (existing !== undefined) return existing;
    const assigned = id ?? this.nextId;
    if (assigned <= 0) throw new RangeError(`File id must be positive, got ${assigned} for ${filePath}`);
    this.byId.set(assigned, filePath);
    this.byPath.set(filePath, assigned);
    this.nextId = Math.max(this.nextId, assigned + 1);
    return assigned;
  }

  /** 0 when the path is unknown. */
  idOf(filePath: string): number {
    return this.byPath.get(filePath) ?? 0;
  }

  pathOf(fileId: number): string | undefined {
    return this.byId.get(fileId);
  }

  get size() {
    return this.byId.size;
  }
}

export interface KeyOptions {
  /** Project root stripped from rendered paths unless `absolute` is set. */
  root?: string;
  absolute?: boolean;
}

export function formatLocationKey(location: Location, files: FileTable, options: KeyOptions = {}): string {
  if (isNullLocation(location)) return '';
  let file = files.pathOf(location.fileId) ?? `<file ${location.fileId}>`;
  if (options.root && !options.absolute) {
    const root = options.root.endsWith(path.sep) ? options.root : options.root + path.sep;
    if (file.startsWith(root)) file = file.slice(root.length);
  }
  return `${file}:${location.line}:${location.column}:`;
}

export function parseLocationKey(key: string, files: FileTable, options: KeyOptions = {}): Location {
  const match = /^(.*):(\d+):(\d+):?$/.exec(key.trim());
  if (!match) return NULL_LOCATION;
  const [, file, line, column] = match;
  let fileId = files.idOf(file);
  if (!fileId && options.root && !path.isAbsolute(file)) fileId = files.idOf(path.join(options.root, file));
  if (!fileId) return NULL_LOCATION;
  return makeLocation(fileId, Number(line), Number(column));
}
