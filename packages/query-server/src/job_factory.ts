import { FindSymbolsJob } from './find_symbols_job';
import { ListSymbolsJob } from './list_symbols_job';
import type { JobOptions, QueryJob } from './query_job';
import type { QueryMessage } from './query_message';
import type { IndexSnapshot } from './symbol_index';
import { SymbolInfoJob } from './symbol_info_job';

export function createJob(query: QueryMessage, snapshot: IndexSnapshot, options?: JobOptions): QueryJob {
  switch (query.type) {
    case 'find-symbols':
      return new FindSymbolsJob(query, snapshot, options);
    case 'list-symbols':
      return new ListSymbolsJob(query, snapshot, options);
    case 'symbol-info':
      return new SymbolInfoJob(query, snapshot, options);
  }
}
