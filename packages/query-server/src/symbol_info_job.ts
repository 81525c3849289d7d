import { parseLocationKey } from './location';
import { QueryJob } from './query_job';

export class SymbolInfoJob extends QueryJob {
  protected execute(): number {
    const location = parseLocationKey(this.query.query, this.snapshot.files, { root: this.snapshot.root });
    const record = this.snapshot.symbols.get(location);
    if (!record) {
      this.logger.info(`No symbol at ${this.query.query}`);
      return 1;
    }
    return this.writeSymbolInfo(record) ? 0 : 1;
  }
}
