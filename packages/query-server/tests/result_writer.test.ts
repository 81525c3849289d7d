import { describe, it, expect, vi } from 'vitest';
import { ContractViolation } from '../src/errors';
import { FilterPredicate } from '../src/filter';
import { buildPathFilterSet } from '../src/path_filter';
import { quoteResult, ResultWriter } from '../src/result_writer';
import type { Transport } from '../src/transport';

function recorder(ok = true) {
  const lines: string[] = [];
  const write = vi.fn((text: string) => {
    lines.push(text);
    return ok;
  });
  const transport: Transport = { write };
  return { lines, write, transport };
}

function fakeLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const onlySrc = new FilterPredicate({ pathFilters: buildPathFilterSet(['/src'], false) });

describe('quoteResult', () => {
  it('escapes embedded quotes and wraps the text', () => {
    expect(quoteResult('foo "bar" baz')).toBe('"foo \\"bar\\" baz"');
  });

  it('leaves every other character alone', () => {
    expect(quoteResult('a\\b\tc')).toBe('"a\\b\tc"');
    expect(quoteResult('')).toBe('""');
  });
});

describe('ResultWriter', () => {
  it('treats filtered-out text as success without writing or counting it', () => {
    const { write, transport } = recorder();
    const writer = new ResultWriter({ predicate: onlySrc, maxLines: 1 });
    writer.bind(transport);
    expect(writer.write('/lib/a.c:1:1:')).toBe(true);
    expect(write).not.toHaveBeenCalled();
    expect(writer.linesWritten).toBe(0);
    expect(writer.write('/src/a.c:1:1:')).toBe(true);
    expect(write).toHaveBeenCalledTimes(1);
  });

  it('bypasses the predicate per call or for the whole job', () => {
    const perCall = recorder();
    const writer = new ResultWriter({ predicate: onlySrc });
    writer.bind(perCall.transport);
    expect(writer.write('/lib/a.c', { unfiltered: true })).toBe(true);
    expect(perCall.lines).toEqual(['/lib/a.c']);

    const global = recorder();
    const unfiltered = new ResultWriter({ predicate: onlySrc, writeUnfiltered: true });
    unfiltered.bind(global.transport);
    unfiltered.write('/lib/b.c');
    expect(global.lines).toEqual(['/lib/b.c']);
  });

  it('stops at the result cap without touching the transport', () => {
    const { write, transport } = recorder();
    const writer = new ResultWriter({ maxLines: 2 });
    writer.bind(transport);
    expect(writer.write('one')).toBe(true);
    expect(writer.write('two')).toBe(true);
    expect(writer.limitReached).toBe(true);
    expect(writer.writeRaw('three')).toBe(false);
    expect(writer.write('four')).toBe(false);
    expect(write).toHaveBeenCalledTimes(2);
    expect(writer.linesWritten).toBe(2);
  });

  it('lets ignoreMax writes through without counting them', () => {
    const { lines, transport } = recorder();
    const writer = new ResultWriter({ maxLines: 1 });
    writer.bind(transport);
    writer.write('counted');
    expect(writer.writeRaw('extra', { ignoreMax: true })).toBe(true);
    expect(writer.write('also extra', { ignoreMax: true })).toBe(true);
    expect(lines).toEqual(['counted', 'extra', 'also extra']);
    expect(writer.linesWritten).toBe(1);
  });

  it('counts lines when unbounded', () => {
    const { transport } = recorder();
    const writer = new ResultWriter();
    writer.bind(transport);
    for (let i = 0; i < 5; i++) writer.write(`line ${i}`);
    expect(writer.linesWritten).toBe(5);
    expect(writer.limitReached).toBe(false);
  });

  it('quotes output unless the call opts out', () => {
    const { lines, transport } = recorder();
    const writer = new ResultWriter({ quoteOutput: true });
    writer.bind(transport);
    writer.write('say "hi"');
    writer.write('say "hi"', { dontQuote: true });
    writer.writeRaw('raw "text"');
    expect(lines).toEqual(['"say \\"hi\\""', 'say "hi"', 'raw "text"']);
  });

  it('filters on the unquoted text', () => {
    const { lines, transport } = recorder();
    const writer = new ResultWriter({ quoteOutput: true, predicate: onlySrc });
    writer.bind(transport);
    writer.write('/src/a.c');
    expect(lines).toEqual(['"/src/a.c"']);
  });

  it('aborts on transport failure and stops writing', () => {
    const { write, transport } = recorder(false);
    const writer = new ResultWriter();
    writer.bind(transport);
    expect(writer.write('first')).toBe(false);
    expect(writer.aborted).toBe(true);
    expect(writer.write('second')).toBe(false);
    expect(writer.writeRaw('third', { ignoreMax: true })).toBe(false);
    expect(write).toHaveBeenCalledTimes(1);
    expect(writer.linesWritten).toBe(1);
  });

  it('requires a bound transport', () => {
    const writer = new ResultWriter();
    expect(() => writer.writeRaw('x')).toThrow(ContractViolation);
    expect(() => writer.write('x')).toThrow(ContractViolation);
  });

  it('refuses a second transport while bound', () => {
    const writer = new ResultWriter();
    writer.bind(recorder().transport);
    expect(() => writer.bind(recorder().transport)).toThrow(ContractViolation);
    writer.unbind();
    expect(writer.bound).toBe(false);
    expect(() => writer.bind(recorder().transport)).not.toThrow();
  });

  it('logs each line unless quiet', () => {
    const logger = fakeLogger();
    const loud = new ResultWriter({ logger });
    loud.bind(recorder().transport);
    loud.write('hello');
    expect(logger.debug).toHaveBeenCalledWith('=> hello');

    const quietLogger = fakeLogger();
    const quiet = new ResultWriter({ logger: quietLogger, quiet: true });
    quiet.bind(recorder().transport);
    quiet.write('hello');
    expect(quietLogger.debug).not.toHaveBeenCalled();
  });
});
