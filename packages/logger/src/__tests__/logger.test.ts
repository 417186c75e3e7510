import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { BufferedSink } from '../buffered-sink.js';
import { flushLoggers, getLogger, initLogger, isLogLevel, type LogEntry, type Sink } from '../logger.js';
import { ConsoleSink } from '../sinks/console.js';
import { FileSink } from '../sinks/file.js';

function collectingSink(entries: LogEntry[]): Sink {
  return {
    write: (entry) => {
      entries.push(entry);
    },
    flush: () => {},
  };
}

describe('Logger', () => {
  beforeEach(() => {
    initLogger({ sinks: [] });
  });

  it('should be silent when no sink is configured', () => {
    const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const logger = getLogger('ledger');

    logger.error('nothing to see');

    expect(stderrSpy).not.toHaveBeenCalled();
    expect(logger.isLevelEnabled('error')).toBe(false);
    stderrSpy.mockRestore();
  });

  it('should write entries with level, category and message', () => {
    const entries: LogEntry[] = [];
    initLogger({ level: 'info', sinks: [collectingSink(entries)] });

    getLogger('ingestion').info('reading file');

    expect(entries).toHaveLength(1);
    expect(entries[0]?.level).toBe('info');
    expect(entries[0]?.category).toBe('ingestion');
    expect(entries[0]?.msg).toBe('reading file');
    expect(entries[0]?.context).toBeUndefined();
  });

  it('should drop entries below the configured level', () => {
    const entries: LogEntry[] = [];
    initLogger({ level: 'warn', sinks: [collectingSink(entries)] });
    const logger = getLogger('ledger');

    logger.trace('trace');
    logger.debug('debug');
    logger.info('info');
    logger.warn('warn');
    logger.error('error');

    expect(entries.map((entry) => entry.level)).toEqual(['warn', 'error']);
    expect(logger.isLevelEnabled('info')).toBe(false);
    expect(logger.isLevelEnabled('warn')).toBe(true);
  });

  it('should serialize bigint amounts, errors and circular references in context', () => {
    const entries: LogEntry[] = [];
    initLogger({ level: 'trace', sinks: [collectingSink(entries)] });

    const cycle: Record<string, unknown> = { name: 'node' };
    cycle['self'] = cycle;

    getLogger('ledger').warn(
      { amount: 1_000_000n, error: new Error('Insufficient funds'), cycle },
      'Ignoring transaction with error'
    );

    const context = entries[0]?.context;
    expect(context?.['amount']).toBe('1000000');
    expect(context?.['error']).toMatchObject({ name: 'Error', message: 'Insufficient funds' });
    expect(context?.['cycle']).toEqual({ name: 'node', self: '[Circular]' });
  });

  it('should apply a later initLogger to loggers created before it', () => {
    const entries: LogEntry[] = [];
    const early = getLogger('early');

    early.info('before init');
    initLogger({ level: 'debug', sinks: [collectingSink(entries)] });
    early.debug('after init');

    expect(entries.map((entry) => entry.msg)).toEqual(['after init']);
  });

  it('should cache loggers per category until re-initialized', () => {
    const first = getLogger('cli');
    expect(getLogger('cli')).toBe(first);
    expect(getLogger('other')).not.toBe(first);

    initLogger({ sinks: [] });
    expect(getLogger('cli')).not.toBe(first);
  });

  it('should flush every sink', () => {
    const flushA = vi.fn();
    const flushB = vi.fn();
    initLogger({ sinks: [{ write: () => {}, flush: flushA }, { write: () => {}, flush: flushB }] });

    flushLoggers();

    expect(flushA).toHaveBeenCalledOnce();
    expect(flushB).toHaveBeenCalledOnce();
  });

  it('should recognise valid level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});

describe('BufferedSink', () => {
  class MemorySink extends BufferedSink {
    readonly written: LogEntry[] = [];

    protected writeEntry(entry: LogEntry): void {
      this.written.push(entry);
    }
  }

  const entry = (msg: string): LogEntry => ({ level: 'info', category: 'test', timestamp: new Date(), msg });

  it('should defer writes until the next macrotask', async () => {
    const sink = new MemorySink();

    sink.write(entry('first'));
    expect(sink.written).toHaveLength(0);

    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(sink.written.map((e) => e.msg)).toEqual(['first']);
  });

  it('should write queued entries synchronously on flush', () => {
    const sink = new MemorySink();

    sink.write(entry('a'));
    sink.write(entry('b'));
    sink.flush();

    expect(sink.written.map((e) => e.msg)).toEqual(['a', 'b']);
  });

  it('should write a full batch straight away without losing entries', () => {
    const sink = new MemorySink({ highWaterMark: 2 });

    sink.write(entry('1'));
    expect(sink.written).toHaveLength(0);

    sink.write(entry('2'));
    expect(sink.written.map((e) => e.msg)).toEqual(['1', '2']);

    for (const msg of ['3', '4', '5']) {
      sink.write(entry(msg));
    }
    sink.flush();

    expect(sink.written.map((e) => e.msg)).toEqual(['1', '2', '3', '4', '5']);
  });

  it('should keep every entry written within one macrotask', async () => {
    const sink = new MemorySink();

    for (let i = 0; i < 2500; i++) {
      sink.write(entry(String(i)));
    }
    await new Promise((resolve) => setTimeout(resolve, 10));

    expect(sink.written).toHaveLength(2500);
    expect(sink.written[2499]?.msg).toBe('2499');
  });
});

describe('ConsoleSink', () => {
  it('should write a formatted line to the configured stream', () => {
    const lines: string[] = [];
    const sink = new ConsoleSink({ stream: { write: (chunk: string) => lines.push(chunk) } });
    const timestamp = new Date(2024, 0, 1, 9, 5, 7);

    sink.write({
      level: 'warn',
      category: 'cli',
      timestamp,
      msg: 'Ignoring transaction with error',
      context: { tx: 7, code: 'INSUFFICIENT_FUNDS' },
    });
    sink.flush();

    expect(lines).toEqual(['[09:05:07] WARN  [cli] Ignoring transaction with error {tx=7, code="INSUFFICIENT_FUNDS"}\n']);
  });

  it('should default to stderr', () => {
    const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const sink = new ConsoleSink();

    sink.write({ level: 'info', category: 'cli', timestamp: new Date(), msg: 'hello' });
    sink.flush();

    expect(stderrSpy).toHaveBeenCalledWith(expect.stringContaining('INFO  [cli] hello'));
    expect(stdoutSpy).not.toHaveBeenCalled();
    stderrSpy.mockRestore();
    stdoutSpy.mockRestore();
  });
});

describe('FileSink', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'clearledger-logger-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should append one JSON line per entry, creating the directory', () => {
    const logPath = path.join(tmpDir, 'nested', 'run.log');
    const sink = new FileSink({ path: logPath });

    sink.write({
      level: 'error',
      category: 'ingestion',
      timestamp: new Date('2024-03-01T10:00:00.000Z'),
      msg: 'Cannot read file',
      context: { file: 'tx.csv' },
    });
    sink.write({ level: 'info', category: 'cli', timestamp: new Date('2024-03-01T10:00:01.000Z'), msg: 'done' });
    sink.flush();

    const lines = fs.readFileSync(logPath, 'utf8').trim().split('\n');
    expect(lines.map((line) => JSON.parse(line) as unknown)).toEqual([
      {
        timestamp: '2024-03-01T10:00:00.000Z',
        level: 'error',
        category: 'ingestion',
        msg: 'Cannot read file',
        context: { file: 'tx.csv' },
      },
      { timestamp: '2024-03-01T10:00:01.000Z', level: 'info', category: 'cli', msg: 'done' },
    ]);
  });
});
