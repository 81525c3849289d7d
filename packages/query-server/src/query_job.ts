import type { JobResult, Location, SymbolRecord } from '@tagstream/shared';
import { FilterPredicate } from './filter';
import { formatLocationKey, isNullLocation, KeyOptions } from './location';
import { LocationWriter } from './location_writer';
import { Logger, silentLogger } from './logger';
import { buildPathFilterSet } from './path_filter';
import type { QueryMessage } from './query_message';
import { ResultWriter, WriteOptions } from './result_writer';
import type { IndexSnapshot } from './symbol_index';
import { isSystemPath, SystemPathClassifier } from './system_path';
import { startTimer } from './telemetry';
import type { Transport } from './transport';

export interface JobOptions {
  /** Bypass the filter predicate for every write. */
  writeUnfiltered?: boolean;
  quoteOutput?: boolean;
  quiet?: boolean;
  logger?: Logger;
  isSystemPath?: SystemPathClassifier;
}

/**
 * One query's execution context. Subclasses enumerate results in
 * `execute()` and hand them to the write methods, which filter, annotate,
 * quote and cap them before they reach the bound transport.
 */
export abstract class QueryJob {
  protected readonly logger: Logger;
  private readonly results: ResultWriter;
  private readonly locations: LocationWriter;

  /** Throws PatternError when a regex path filter does not compile. */
  constructor(protected readonly query: QueryMessage, protected readonly snapshot: IndexSnapshot, options: JobOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    const predicate = new FilterPredicate({
      pathFilters: buildPathFilterSet(query.pathFilters, query.hasFlag('match-regex')),
      filterSystemIncludes: query.hasFlag('filter-system-includes'),
      isSystemPath: options.isSystemPath ?? isSystemPath,
    });
    this.results = new ResultWriter({
      maxLines: query.max,
      writeUnfiltered: options.writeUnfiltered,
      quoteOutput: options.quoteOutput,
      quiet: options.quiet || query.hasFlag('silent'),
      predicate,
      logger: this.logger,
    });
    this.locations = new LocationWriter(this.results, snapshot, {
      minLine: query.minLine,
      maxLine: query.maxLine,
      annotations: {
        containingFunction: query.hasFlag('containing-function'),
        cursorKind: query.hasFlag('cursor-kind'),
        displayName: query.hasFlag('display-name'),
      },
      keyOptions: query.keyOptions(snapshot.root),
      logger: this.logger,
    });
  }

  get aborted() { return this.results.aborted; }
  get linesWritten() { return this.results.linesWritten; }
  /** True once the job can no longer emit counted lines. */
  get finished() { return this.results.aborted || this.results.limitReached; }

  /** File id of the single literal path filter, or 0. */
  fileFilter(): number {
    const filters = this.results.pathFilters;
    if (filters.mode === 'literal' && filters.prefixes.length === 1) return this.snapshot.files.idOf(filters.prefixes[0]);
    return 0;
  }

  filter(text: string): boolean {
    return this.results.accepts(text);
  }

  write(text: string, options?: WriteOptions): boolean {
    return this.results.write(text, options);
  }

  writeRaw(text: string, options?: Pick<WriteOptions, 'ignoreMax'>): boolean {
    return this.results.writeRaw(text, options);
  }

  writeLocation(location: Location, options?: WriteOptions): boolean {
    return this.locations.write(location, options);
  }

  writeSymbolInfo(record: SymbolRecord | undefined): boolean {
    if (!record || isNullLocation(record.location)) return false;
    if (!this.results.admits(formatSymbolInfo(record, this.snapshot, { absolute: true }))) return true;
    return this.results.write(formatSymbolInfo(record, this.snapshot, this.query.keyOptions(this.snapshot.root)), { unfiltered: true });
  }

  run(transport: Transport): JobResult {
    const done = startTimer('query_job', { source: this.query.type });
    this.results.bind(transport);
    let code = 1;
    try {
      code = this.execute();
    } finally {
      this.results.unbind();
      done({ lines: this.results.linesWritten, aborted: this.results.aborted });
    }
    return { code: this.results.aborted ? 1 : code, linesWritten: this.results.linesWritten, aborted: this.results.aborted };
  }

  /** 0 on success. */
  protected abstract execute(): number;
}

export function formatSymbolInfo(record: SymbolRecord, snapshot: IndexSnapshot, keyOptions: KeyOptions = {}): string {
  const lines = [
    formatLocationKey(record.location, snapshot.files, keyOptions),
    `SymbolName: ${record.symbolName}`,
    `Kind: ${record.kindSpelling}`,
  ];
  if (record.displayName && record.displayName !== record.symbolName) lines.push(`DisplayName: ${record.displayName}`);
  lines.push(`Range: ${record.startLine}:${record.startColumn}-${record.endLine}:${record.endColumn}`);
  if (record.isDefinition) lines.push('Definition');
  return lines.join('\n');
}
