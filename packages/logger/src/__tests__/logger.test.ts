/* eslint-disable @typescript-eslint/no-empty-function -- acceptable in tests */
import { Writable } from 'node:stream';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { BufferedSink } from '../buffered-sink.js';
import { initLoggerFromEnv, validateLoggerEnv } from '../env.schema.js';
import { flushLoggers, getLogger, initLogger, isLogLevel, type LogEntry, type Sink } from '../logger.js';
import { ConsoleSink, formatConsoleLine } from '../sinks/console.js';
import { PinoSink } from '../sinks/pino.js';

function collectingSink(): { entries: LogEntry[]; sink: Sink } {
  const entries: LogEntry[] = [];
  return {
    entries,
    sink: {
      write: (entry: LogEntry) => entries.push(entry),
      flush: () => {},
    },
  };
}

describe('Logger', () => {
  beforeEach(() => {
    initLogger({ sinks: [] });
  });

  it('is silent until sinks are installed', () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = getLogger('silent');

    logger.info('nobody listens');

    expect(logger.isLevelEnabled('error')).toBe(false);
    expect(consoleSpy).not.toHaveBeenCalled();
    consoleSpy.mockRestore();
  });

  it('writes entries with category and message', () => {
    const { entries, sink } = collectingSink();
    initLogger({ level: 'info', sinks: [sink] });

    getLogger('CircuitBreaker:crm').info('circuit closed');

    expect(entries).toHaveLength(1);
    expect(entries[0]?.level).toBe('info');
    expect(entries[0]?.category).toBe('CircuitBreaker:crm');
    expect(entries[0]?.msg).toBe('circuit closed');
    expect(entries[0]?.context).toBeUndefined();
  });

  it('drops entries below the configured level', () => {
    const { entries, sink } = collectingSink();
    initLogger({ level: 'warn', sinks: [sink] });
    const logger = getLogger('levels');

    logger.trace('t');
    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');

    expect(entries.map((entry) => entry.level)).toEqual(['warn', 'error']);
  });

  it('serializes context, errors, bigints and circular references', () => {
    const { entries, sink } = collectingSink();
    initLogger({ level: 'debug', sinks: [sink] });

    const payload: Record<string, unknown> = { id: 'batch-7' };
    payload['self'] = payload;
    const failure = new Error('upstream refused', { cause: new TypeError('socket hang up') });

    getLogger('ctx').debug({ payload, failure, bytes: 12n }, 'send failed');

    const context = entries[0]?.context;
    expect(context?.['payload']).toEqual({ id: 'batch-7', self: '[Circular]' });
    expect(context?.['bytes']).toBe('12');
    expect(context?.['failure']).toMatchObject({
      name: 'Error',
      message: 'upstream refused',
      cause: { name: 'TypeError', message: 'socket hang up' },
    });
  });

  it('merges bound context into every entry', () => {
    const { entries, sink } = collectingSink();
    initLogger({ level: 'info', sinks: [sink] });

    const logger = getLogger('bound').withContext({ circuit: 'platform' });
    logger.info('plain');
    logger.warn({ attempt: 2 }, 'with extra');

    expect(entries[0]?.context).toEqual({ circuit: 'platform' });
    expect(entries[1]?.context).toEqual({ circuit: 'platform', attempt: 2 });
  });

  it('caches loggers per category and keeps them working across re-initialization', () => {
    const before = getLogger('cached');
    expect(getLogger('cached')).toBe(before);

    const { entries, sink } = collectingSink();
    initLogger({ level: 'info', sinks: [sink] });
    before.info('after init');

    expect(entries).toHaveLength(1);
    expect(getLogger('cached')).not.toBe(before);
  });

  it('flushes every sink', () => {
    const flushA = vi.fn();
    const flushB = vi.fn();
    initLogger({ sinks: [{ write: () => {}, flush: flushA }, { write: () => {}, flush: flushB }] });

    flushLoggers();

    expect(flushA).toHaveBeenCalledOnce();
    expect(flushB).toHaveBeenCalledOnce();
  });

  it('recognizes log level names', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('fatal')).toBe(false);
  });
});

describe('ConsoleSink', () => {
  const entry: LogEntry = {
    level: 'warn',
    category: 'RetryPolicy',
    timestamp: new Date(2024, 0, 1, 9, 5, 7),
    msg: 'Retry 1/3 in 1000ms',
    context: { attempt: 1, operation: 'sendBatch' },
  };

  it('formats time, level, category, message and context', () => {
    expect(formatConsoleLine(entry)).toBe(
      '[09:05:07] WARN  [RetryPolicy] Retry 1/3 in 1000ms {attempt=1, operation="sendBatch"}'
    );
  });

  it('wraps the level label in ANSI color when enabled', () => {
    expect(formatConsoleLine({ ...entry, context: undefined }, true)).toBe(
      '[09:05:07] \x1b[33mWARN \x1b[0m [RetryPolicy] Retry 1/3 in 1000ms'
    );
  });

  it('routes error and warn to the matching console methods', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const sink = new ConsoleSink();

    sink.write({ ...entry, level: 'error', context: undefined, msg: 'boom' });
    sink.write({ ...entry, level: 'warn', context: undefined, msg: 'careful' });
    sink.write({ ...entry, level: 'info', context: undefined, msg: 'fine' });
    sink.flush();

    expect(errorSpy).toHaveBeenCalledWith('[09:05:07] ERROR [RetryPolicy] boom');
    expect(warnSpy).toHaveBeenCalledWith('[09:05:07] WARN  [RetryPolicy] careful');
    expect(logSpy).toHaveBeenCalledWith('[09:05:07] INFO  [RetryPolicy] fine');
    errorSpy.mockRestore();
    warnSpy.mockRestore();
    logSpy.mockRestore();
  });
});

describe('BufferedSink', () => {
  class RecordingSink extends BufferedSink {
    readonly written: LogEntry[] = [];
    protected writeEntry(entry: LogEntry): void {
      this.written.push(entry);
    }
  }

  const make = (msg: string, category = 'buf'): LogEntry => ({ level: 'info', category, timestamp: new Date(), msg });

  it('defers writes to the next macrotask', async () => {
    const sink = new RecordingSink();

    sink.write(make('one'));
    sink.write(make('two'));
    expect(sink.written).toHaveLength(0);

    await new Promise((resolve) => setImmediate(resolve));

    expect(sink.written.map((e) => e.msg)).toEqual(['one', 'two']);
  });

  it('drops the oldest entries on overflow and reports the count', () => {
    const sink = new RecordingSink({ maxBuffer: 2 });

    sink.write(make('a'));
    sink.write(make('b'));
    sink.write(make('c'));
    sink.write(make('d'));
    sink.flush();

    expect(sink.written.map((e) => e.msg)).toEqual(['Dropped 2 log entries (buffer overflow)', 'c', 'd']);
    expect(sink.written[0]).toMatchObject({ level: 'warn', category: 'buf', context: { dropped: 2 } });
  });

  it('reports overflow under the category that lost entries', () => {
    const sink = new RecordingSink({ maxBuffer: 1 });

    sink.write(make('a', 'CircuitBreaker:crm'));
    sink.write(make('b', 'RetryPolicy'));
    sink.write(make('c', 'CircuitBreaker:crm'));
    sink.flush();

    expect(sink.written.map((e) => [e.level, e.category, e.msg])).toEqual([
      ['warn', 'CircuitBreaker:crm', 'Dropped 1 log entries (buffer overflow)'],
      ['warn', 'RetryPolicy', 'Dropped 1 log entries (buffer overflow)'],
      ['info', 'CircuitBreaker:crm', 'c'],
    ]);
  });
});

describe('PinoSink', () => {
  it('writes one JSON line per entry with category and context', () => {
    const lines: string[] = [];
    const destination = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        lines.push(chunk.toString());
        callback();
      },
    });
    const sink = new PinoSink({ destination, serviceName: 'publisher' });

    sink.write({
      level: 'error',
      category: 'TimeoutHandler',
      timestamp: new Date(),
      msg: 'Timed out after 200ms',
      context: { timeoutMs: 200 },
    });

    expect(lines).toHaveLength(1);
    const parsed: unknown = JSON.parse(lines[0] ?? '');
    expect(parsed).toMatchObject({
      level: 50,
      service: 'publisher',
      category: 'TimeoutHandler',
      timeoutMs: 200,
      msg: 'Timed out after 200ms',
    });
  });
});

describe('logger environment', () => {
  afterEach(() => {
    initLogger({ sinks: [] });
  });

  it('applies defaults', () => {
    const result = validateLoggerEnv({});

    expect(result.isOk()).toBe(true);
    expect(result._unsafeUnwrap()).toEqual({
      LOGGER_LOG_LEVEL: 'info',
      LOGGER_SERVICE_NAME: 'relaypress',
      LOGGER_SINK: 'none',
      LOGGER_CONSOLE_COLOR: false,
    });
  });

  it('rejects unknown levels', () => {
    const result = validateLoggerEnv({ LOGGER_LOG_LEVEL: 'loud' });

    expect(result.isErr()).toBe(true);
    expect(result._unsafeUnwrapErr().message).toContain('LOGGER_LOG_LEVEL: Invalid log level');
  });

  it('installs a console sink at the requested level', () => {
    const result = initLoggerFromEnv({ LOGGER_SINK: 'console', LOGGER_LOG_LEVEL: 'WARN' });

    expect(result.isOk()).toBe(true);
    const logger = getLogger('env');
    expect(logger.isLevelEnabled('warn')).toBe(true);
    expect(logger.isLevelEnabled('info')).toBe(false);
  });
});
