import fs from 'fs';
import path from 'path';
import type { Writable } from 'stream';
import type { AppConfig } from './config';
import { QueryError, PatternError } from './errors';
import { createJob } from './job_factory';
import type { Logger } from './logger';
import { QueryMessage } from './query_message';
import { SymbolStore } from './symbol_store';
import { createSystemPathClassifier } from './system_path';
import { StreamTransport } from './transport';

/** Runs one JSON-encoded query against the configured database. Returns the process exit code. */
export function runQuery(arg: string | undefined, config: AppConfig, out: Writable, logger: Logger): number {
  if (!arg) {
    logger.error('usage: tagstream-query \'{"type":"find-symbols","query":"main"}\'');
    return 2;
  }
  const dbPath = path.resolve(config.index.sqlite);
  if (!fs.existsSync(dbPath)) {
    logger.error(`No symbol database at ${dbPath}`);
    return 2;
  }
  let store: SymbolStore;
  try {
    store = new SymbolStore(dbPath);
  } catch (err) {
    logger.error(`Cannot open ${dbPath}`, err);
    return 2;
  }
  try {
    const query = QueryMessage.parse(JSON.parse(arg));
    const job = createJob(query, store.load(config.index.root), {
      logger,
      quoteOutput: config.query.quoteOutput,
      writeUnfiltered: config.query.writeUnfiltered,
      isSystemPath: createSystemPathClassifier(config.query.systemPrefixes, config.query.systemExceptions),
    });
    return job.run(new StreamTransport(out)).code;
  } catch (err) {
    if (err instanceof QueryError || err instanceof PatternError || err instanceof SyntaxError) {
      logger.error(err.message);
      return 2;
    }
    throw err;
  } finally {
    store.close();
  }
}
