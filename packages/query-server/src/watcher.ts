import chokidar from 'chokidar';
import path from 'path';
import type { Logger } from './logger';

/** Calls `reload` once the symbol database has been quiet for `debounceMs`. */
export function startIndexWatcher(dbPath: string, reload: () => void, logger: Logger, debounceMs = 500) {
  const watcher = chokidar.watch(path.resolve(dbPath), { ignoreInitial: true });
  const schedule = debounce(() => {
    try {
      reload();
      logger.info(`reloaded symbols from ${dbPath}`);
    } catch (err) {
      logger.error(`failed to reload ${dbPath}`, err);
    }
  }, debounceMs);
  watcher.on('add', schedule).on('change', schedule);
  return watcher;
}

function debounce(fn: () => void, ms: number) {
  let t: ReturnType<typeof setTimeout> | undefined;
  return () => {
    clearTimeout(t);
    t = setTimeout(fn, ms);
  };
}
