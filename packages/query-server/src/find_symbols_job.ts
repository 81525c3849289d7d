import { QueryJob } from './query_job';

/** Every occurrence of a symbol name, in index order. */
export class FindSymbolsJob extends QueryJob {
  protected execute(): number {
    const symbols = this.snapshot.symbols;
    const fileId = this.fileFilter();
    const [from, to] = fileId ? symbols.fileRange(fileId) : [0, symbols.size];
    let found = false;
    for (const rec of symbols.entries(from, to)) {
      if (rec.symbolName !== this.query.query) continue;
      const before = this.linesWritten;
      this.writeLocation(rec.location);
      if (this.linesWritten > before) found = true;
      if (this.finished) break;
    }
    return found ? 0 : 1;
  }
}
