import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { DEFAULT_SYSTEM_EXCEPTIONS, DEFAULT_SYSTEM_PREFIXES } from './system_path';
import { DEFAULT_MAX_BUFFERED_BYTES } from './transport';

const configSchema = z.object({
  server: z
    .object({
      host: z.string().default('127.0.0.1'),
      port: z.number().int().min(0).max(65535).default(7719),
      maxBufferedBytes: z.number().int().positive().default(DEFAULT_MAX_BUFFERED_BYTES),
    })
    .default({}),
  index: z
    .object({
      sqlite: z.string().default('data/symbols.db'),
      root: z.string().optional(),
      watch: z.boolean().default(true),
      debounceMs: z.number().int().nonnegative().default(500),
    })
    .default({}),
  query: z
    .object({
      systemPrefixes: z.array(z.string()).default(() => [...DEFAULT_SYSTEM_PREFIXES]),
      systemExceptions: z.array(z.string()).default(() => [...DEFAULT_SYSTEM_EXCEPTIONS]),
      quoteOutput: z.boolean().default(false),
      writeUnfiltered: z.boolean().default(false),
    })
    .default({}),
  telemetry: z
    .object({
      enabled: z.boolean().default(true),
      promFile: z.string().optional(),
      jsonSnapshotFile: z.string().optional(),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof configSchema>;

function resolveConfigPath(custom?: string): string | undefined {
  if (custom && fs.existsSync(custom)) return custom;
  const envPath = process.env.TAGSTREAM_CONFIG_PATH;
  if (envPath && fs.existsSync(envPath)) return envPath;
  const defaultPath = path.join(process.cwd(), 'config', 'tagstream.json');
  if (fs.existsSync(defaultPath)) return defaultPath;
  const moduleRelative = path.resolve(__dirname, '..', '..', '..', 'config', 'tagstream.json');
  if (fs.existsSync(moduleRelative)) return moduleRelative;
  return undefined;
}

function applyEnv(cfg: AppConfig, env: NodeJS.ProcessEnv): AppConfig {
  const port = parseInt(env.PORT || '', 10);
  if (Number.isInteger(port) && port >= 0 && port <= 65535) cfg.server.port = port;
  if (env.SQLITE_DB) cfg.index.sqlite = env.SQLITE_DB;
  if (env.INDEX_ROOT) cfg.index.root = env.INDEX_ROOT;
  if (cfg.index.root) cfg.index.root = path.resolve(cfg.index.root);
  return cfg;
}

export function defaultConfig(): AppConfig {
  return configSchema.parse({});
}

/** Unreadable or invalid files fall back to the defaults. */
export function loadConfig(customPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cfgPath = resolveConfigPath(customPath);
  if (!cfgPath) return applyEnv(defaultConfig(), env);
  try {
    const parsed = configSchema.safeParse(JSON.parse(fs.readFileSync(cfgPath, 'utf8')));
    return applyEnv(parsed.success ? parsed.data : defaultConfig(), env);
  } catch {
    return applyEnv(defaultConfig(), env);
  }
}
