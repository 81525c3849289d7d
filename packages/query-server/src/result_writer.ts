import { ContractViolation } from './errors';
import { FilterPredicate } from './filter';
import { Logger, silentLogger } from './logger';
import type { PathFilterSet } from './path_filter';
import type { Transport } from './transport';

export interface WriteOptions {
  /** Skip the filter predicate for this line. */
  unfiltered?: boolean;
  /** Neither checked against nor counted towards the result cap. */
  ignoreMax?: boolean;
  dontQuote?: boolean;
}

export interface ResultWriterOptions {
  /** -1 means unbounded. */
  maxLines?: number;
  writeUnfiltered?: boolean;
  quoteOutput?: boolean;
  quiet?: boolean;
  predicate?: FilterPredicate;
  logger?: Logger;
}

export function quoteResult(text: string): string {
  return `"${text.replace(/"/g, '\\"')}"`;
}

export class ResultWriter {
  readonly maxLines: number;
  private readonly writeUnfiltered: boolean;
  private readonly quoteOutput: boolean;
  private readonly quiet: boolean;
  private readonly predicate: FilterPredicate;
  private readonly logger: Logger;
  private transport: Transport | null = null;
  private _aborted = false;
  private _linesWritten = 0;

  constructor(options: ResultWriterOptions = {}) {
    this.maxLines = options.maxLines ?? -1;
    this.writeUnfiltered = options.writeUnfiltered ?? false;
    this.quoteOutput = options.quoteOutput ?? false;
    this.quiet = options.quiet ?? false;
    this.predicate = options.predicate ?? new FilterPredicate();
    this.logger = options.logger ?? silentLogger;
  }

  get aborted() { return this._aborted; }
  get linesWritten() { return this._linesWritten; }
  get bound() { return this.transport !== null; }

  get limitReached(): boolean {
    return this.maxLines !== -1 && this._linesWritten >= this.maxLines;
  }

  bind(transport: Transport) {
    if (this.transport) throw new ContractViolation('A transport is already bound to this job');
    this.transport = transport;
  }

  unbind() {
    this.transport = null;
  }

  abort() {
    this._aborted = true;
  }

  get pathFilters(): PathFilterSet {
    return this.predicate.pathFilters;
  }

  accepts(text: string): boolean {
    return this.predicate.accept(text);
  }

  /** Whether `write(text, options)` would get past the filters. */
  admits(text: string, options: WriteOptions = {}): boolean {
    return !!options.unfiltered || this.writeUnfiltered || this.predicate.accept(text);
  }

  /** Filtered-out text counts as success and is not written. */
  write(text: string, options: WriteOptions = {}): boolean {
    if (!this.admits(text, options)) return true;
    const out = this.quoteOutput && !options.dontQuote ? quoteResult(text) : text;
    return this.writeRaw(out, options);
  }

  writeRaw(text: string, options: Pick<WriteOptions, 'ignoreMax'> = {}): boolean {
    const transport = this.transport;
    if (!transport) throw new ContractViolation('writeRaw called without a bound transport');
    if (this._aborted) return false;
    if (!options.ignoreMax) {
      if (this.maxLines !== -1 && this._linesWritten === this.maxLines) return false;
      ++this._linesWritten;
    }
    if (!this.quiet) this.logger.debug(`=> ${text}`);
    if (!transport.write(text)) {
      this.abort();
      return false;
    }
    return true;
  }
}
