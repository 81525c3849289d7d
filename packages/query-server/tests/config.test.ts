import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { defaultConfig, loadConfig } from '../src/config';

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tagstream-config-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeConfig(content: string) {
    const file = path.join(tempDir, 'tagstream.json');
    fs.writeFileSync(file, content, 'utf8');
    return file;
  }

  it('has defaults for every section', () => {
    expect(defaultConfig()).toEqual({
      server: { host: '127.0.0.1', port: 7719, maxBufferedBytes: 16 * 1024 * 1024 },
      index: { sqlite: 'data/symbols.db', watch: true, debounceMs: 500 },
      query: { systemPrefixes: ['/usr/', '/System/'], systemExceptions: ['/usr/home/'], quoteOutput: false, writeUnfiltered: false },
      telemetry: { enabled: true },
    });
  });

  it('merges a partial file over the defaults', () => {
    const file = writeConfig(JSON.stringify({ server: { port: 9000 }, query: { quoteOutput: true } }));
    const cfg = loadConfig(file, {});
    expect(cfg.server).toEqual({ host: '127.0.0.1', port: 9000, maxBufferedBytes: 16 * 1024 * 1024 });
    expect(cfg.query.quoteOutput).toBe(true);
    expect(cfg.query.systemPrefixes).toEqual(['/usr/', '/System/']);
  });

  it('falls back to defaults for invalid files', () => {
    expect(loadConfig(writeConfig('{ nope'), {})).toEqual(defaultConfig());
    expect(loadConfig(writeConfig(JSON.stringify({ server: { port: 'x' } })), {})).toEqual(defaultConfig());
  });

  it('lets the environment override the file', () => {
    const file = writeConfig(JSON.stringify({ index: { sqlite: 'a.db' } }));
    const cfg = loadConfig(file, { PORT: '4100', SQLITE_DB: 'b.db', INDEX_ROOT: tempDir });
    expect(cfg.server.port).toBe(4100);
    expect(cfg.index.sqlite).toBe('b.db');
    expect(cfg.index.root).toBe(path.resolve(tempDir));
  });

  it('ignores a non-numeric port', () => {
    const cfg = loadConfig(writeConfig('{}'), { PORT: 'eighty' });
    expect(cfg.server.port).toBe(7719);
  });

  it('does not share default lists between loads', () => {
    const first = loadConfig(writeConfig('{}'), {});
    first.query.systemPrefixes.push('/opt/');
    expect(loadConfig(writeConfig('{}'), {}).query.systemPrefixes).toEqual(['/usr/', '/System/']);
  });
});
