import fs from 'fs';
import path from 'path';
import type { FSWatcher } from 'chokidar';
import { loadConfig } from './config';
import { createConsoleLogger } from './logger';
import { startServer } from './server';
import type { IndexSnapshot } from './symbol_index';
import { SymbolStore } from './symbol_store';
import { createSystemPathClassifier } from './system_path';
import { configureTelemetry } from './telemetry';
import { startIndexWatcher } from './watcher';

function main() {
  const logger = createConsoleLogger('tagstream');
  const config = loadConfig(process.argv[2]);
  configureTelemetry(config.telemetry);

  const dbPath = path.resolve(config.index.sqlite);
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  const store = new SymbolStore(dbPath);
  let snapshot: IndexSnapshot = store.load(config.index.root);
  logger.info(`loaded ${snapshot.symbols.size} symbols in ${snapshot.files.size} files from ${dbPath}`);

  let watcher: FSWatcher | null = null;
  if (config.index.watch) {
    watcher = startIndexWatcher(dbPath, () => { snapshot = store.load(config.index.root); }, logger, config.index.debounceMs);
  }

  const server = startServer(
    {
      snapshot: () => snapshot,
      jobOptions: {
        quoteOutput: config.query.quoteOutput,
        writeUnfiltered: config.query.writeUnfiltered,
        isSystemPath: createSystemPathClassifier(config.query.systemPrefixes, config.query.systemExceptions),
      },
      logger,
      maxBufferedBytes: config.server.maxBufferedBytes,
    },
    config.server.port,
    config.server.host,
  );

  const shutdown = () => {
    server.close();
    const closing = watcher ? watcher.close() : Promise.resolve();
    closing.then(
      () => { store.close(); process.exit(0); },
      err => { logger.error('shutdown failed', err); process.exit(1); },
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

if (require.main === module) {
  main();
}
