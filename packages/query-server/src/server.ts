import net from 'net';
import readline from 'readline';
import type { Readable, Writable } from 'stream';
import type { QueryRequest, QueryResponse, RequestId } from '@tagstream/shared';
import { PatternError, QueryError } from './errors';
import { createJob } from './job_factory';
import { Logger, silentLogger } from './logger';
import type { JobOptions } from './query_job';
import { QueryMessage } from './query_message';
import type { IndexSnapshot } from './symbol_index';
import { StreamTransport } from './transport';

export interface ServerContext {
  /** Current snapshot; read once per request so reloads apply to the next query. */
  snapshot: () => IndexSnapshot;
  jobOptions?: Omit<JobOptions, 'logger'>;
  logger?: Logger;
  /** Queued output bytes past which a slow connection's job is aborted. */
  maxBufferedBytes?: number;
}

const INVALID_PARAMS = -32602;
const PARSE_ERROR = -32700;
const INTERNAL_ERROR = -32000;

function send(out: Writable, msg: QueryResponse) {
  if (!out.destroyed && !out.writableEnded) out.write(JSON.stringify(msg) + '\n');
}

function parseRequest(line: string): QueryRequest | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  if (typeof raw !== 'object' || raw === null || !('query' in raw)) return null;
  const id = 'id' in raw && (typeof raw.id === 'string' || typeof raw.id === 'number') ? raw.id : null;
  return { id, query: raw.query };
}

export function handleRequest(line: string, out: Writable, ctx: ServerContext) {
  const logger = ctx.logger ?? silentLogger;
  const req = parseRequest(line);
  if (!req) return send(out, { id: null, error: { code: PARSE_ERROR, message: 'Expected {"id", "query"} JSON' } });
  const id: RequestId = req.id;
  try {
    const query = QueryMessage.parse(req.query);
    const job = createJob(query, ctx.snapshot(), { ...ctx.jobOptions, logger });
    const frame = (text: string) => JSON.stringify({ id, line: text } satisfies QueryResponse) + '\n';
    const transport = new StreamTransport(out, frame, ctx.maxBufferedBytes);
    const result = job.run(transport);
    if (result.aborted) {
      logger.warn(`query ${String(id)} aborted after ${result.linesWritten} lines`);
      return;
    }
    send(out, { id, result });
  } catch (e) {
    if (e instanceof QueryError || e instanceof PatternError) {
      return send(out, { id, error: { code: INVALID_PARAMS, message: e.message } });
    }
    logger.error(`query ${String(id)} failed`, e);
    send(out, { id, error: { code: INTERNAL_ERROR, message: e instanceof Error ? e.message : 'Internal error' } });
  }
}

/** Serves line-delimited requests until `input` closes. Requests run one at a time. */
export function serveConnection(input: Readable, out: Writable, ctx: ServerContext): Promise<void> {
  const rl = readline.createInterface({ input, terminal: false, crlfDelay: Infinity });
  rl.on('line', line => {
    const s = line.trim();
    if (s) handleRequest(s, out, ctx);
  });
  return new Promise(resolve => rl.once('close', () => resolve()));
}

export function startServer(ctx: ServerContext, port: number, host = '127.0.0.1'): net.Server {
  const logger = ctx.logger ?? silentLogger;
  const server = net.createServer(socket => {
    socket.on('error', err => logger.warn(`connection error: ${err.message}`));
    serveConnection(socket, socket, ctx).then(() => socket.end(), err => logger.error('connection failed', err));
  });
  server.listen(port, host, () => logger.info(`listening on ${host}:${port}`));
  return server;
}
