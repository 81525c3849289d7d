import fs from 'fs';
import path from 'path';

type MetricPayload = Record<string, unknown> & {
  name: string;
  duration_ms: number;
  ts: string;
};

type AggregateKey = string;

export interface MetricAggregate {
  name: string;
  source: string;
  count: number;
  total: number;
  avg: number;
  max: number;
  min: number;
}

const aggregates = new Map<AggregateKey, { count: number; total: number; max: number; min: number }>();
let promFile: string | undefined;
let jsonSnapshotFile: string | undefined;
let enabled = true;

export function configureTelemetry(options: { enabled?: boolean; promFile?: string; jsonSnapshotFile?: string } = {}) {
  if (typeof options.enabled === 'boolean') enabled = options.enabled;
  promFile = options.promFile ? path.resolve(process.cwd(), options.promFile) : undefined;
  jsonSnapshotFile = options.jsonSnapshotFile ? path.resolve(process.cwd(), options.jsonSnapshotFile) : undefined;
}

export function resetTelemetry() {
  aggregates.clear();
}

export function startTimer(name: string, attributes: Record<string, unknown> = {}) {
  const start = Date.now();
  return (extra: Record<string, unknown> = {}) => {
    if (!enabled) return;
    const payload: MetricPayload = {
      name,
      duration_ms: Date.now() - start,
      ts: new Date().toISOString(),
      ...attributes,
      ...extra,
    };
    updateAggregates(payload);
    if (promFile) emitPrometheus(promFile);
    if (jsonSnapshotFile) emitJsonSnapshot(jsonSnapshotFile);
  };
}

function aggregateKey(m: MetricPayload): AggregateKey {
  return `${m.name}:${String(m.source ?? 'unknown')}`;
}

function updateAggregates(m: MetricPayload) {
  const key = aggregateKey(m);
  const entry = aggregates.get(key) ?? { count: 0, total: 0, max: Number.MIN_SAFE_INTEGER, min: Number.MAX_SAFE_INTEGER };
  entry.count += 1;
  entry.total += m.duration_ms;
  entry.max = Math.max(entry.max, m.duration_ms);
  entry.min = Math.min(entry.min, m.duration_ms);
  aggregates.set(key, entry);
}

export function telemetrySnapshot(): MetricAggregate[] {
  return Array.from(aggregates.entries()).map(([key, stats]) => {
    const [name, source] = key.split(':');
    const avg = stats.count ? stats.total / stats.count : 0;
    return { name, source, count: stats.count, total: stats.total, avg, max: stats.max, min: stats.min };
  });
}

function ensureDir(filePath: string) {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
}

function emitPrometheus(file: string) {
  try {
    ensureDir(file);
    const lines: string[] = [
      '# HELP tagstream_query_duration_ms Query job durations in milliseconds.',
      '# TYPE tagstream_query_duration_ms summary',
    ];
    for (const s of telemetrySnapshot()) {
      lines.push(`tagstream_query_duration_ms_count{name="${s.name}",source="${s.source}"} ${s.count}`);
      lines.push(`tagstream_query_duration_ms_sum{name="${s.name}",source="${s.source}"} ${s.total}`);
      lines.push(`tagstream_query_duration_ms_avg{name="${s.name}",source="${s.source}"} ${s.avg.toFixed(2)}`);
      lines.push(`tagstream_query_duration_ms_max{name="${s.name}",source="${s.source}"} ${s.max}`);
      lines.push(`tagstream_query_duration_ms_min{name="${s.name}",source="${s.source}"} ${s.min}`);
    }
    fs.writeFileSync(file, lines.join('\n') + '\n', 'utf8');
  } catch (err) {
    if (process.env.DEBUG_TELEMETRY) {
      // eslint-disable-next-line no-console
      console.warn('[telemetry] failed to write Prometheus output', err);
    }
  }
}

function emitJsonSnapshot(file: string) {
  try {
    ensureDir(file);
    fs.writeFileSync(file, JSON.stringify(telemetrySnapshot(), null, 2), 'utf8');
  } catch (err) {
    if (process.env.DEBUG_TELEMETRY) {
      // eslint-disable-next-line no-console
      console.warn('[telemetry] failed to write JSON snapshot', err);
    }
  }
}
