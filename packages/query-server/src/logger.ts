export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

// stdout carries results for the CLI, so everything goes to stderr
export function createConsoleLogger(tag: string, debugEnabled = process.env.TAGSTREAM_DEBUG === '1'): Logger {
  const prefix = `[${tag}]`;
  return {
    debug: message => { if (debugEnabled) console.error(prefix, message); },
    info: message => console.error(prefix, message),
    warn: message => console.error(prefix, 'warn:', message),
    error: (message, err) => {
      if (err === undefined) console.error(prefix, 'error:', message);
      else console.error(prefix, 'error:', message, err instanceof Error ? err.message : err);
    },
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
