export interface Location {
  readonly fileId: number;
  readonly line: number;
  readonly column: number;
}

export type SymbolKind =
  | 'function'
  | 'method'
  | 'constructor'
  | 'destructor'
  | 'class'
  | 'struct'
  | 'namespace'
  | 'lambda'
  | 'variable'
  | 'field'
  | 'parameter'
  | 'enum'
  | 'enumConstant'
  | 'typedef'
  | 'macro'
  | 'call'
  | 'reference'
  | 'unknown';

export interface SymbolRecord {
  location: Location;
  symbolName: string;
  displayName: string;
  kind: SymbolKind;
  /** Kind as the indexer spelled it, e.g. `FunctionDecl`. */
  kindSpelling: string;
  isDefinition: boolean;
  startLine: number;
  startColumn: number;
  endLine: number;
  endColumn: number;
}

export type QueryType = 'find-symbols' | 'list-symbols' | 'symbol-info';

export type QueryFlag =
  | 'silent'
  | 'match-regex'
  | 'filter-system-includes'
  | 'containing-function'
  | 'cursor-kind'
  | 'display-name'
  | 'absolute-path';

export interface QueryDescriptor {
  type: QueryType;
  query: string;
  /** -1 means unbounded. */
  max: number;
  minLine: number;
  maxLine: number;
  pathFilters: string[];
  flags: QueryFlag[];
}

export type RequestId = string | number | null;

export interface QueryRequest {
  id: RequestId;
  query: unknown;
}

export interface JobResult {
  code: number;
  linesWritten: number;
  aborted: boolean;
}

export type QueryResponse =
  | { id: RequestId; line: string }
  | { id: RequestId; result: JobResult }
  | { id: RequestId; error: { code: number; message: string } };
