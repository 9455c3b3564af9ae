import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  createConsoleLogger,
  createLogger,
  createNoopLogger,
  createTestLogger,
  formatLogEntry,
  isLogLevel,
  LogLevels,
  withContext,
  type LogEntry,
} from '../logging.js';

describe('createLogger', () => {
  it('drops entries below the minimum level', () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({ minLevel: 'warn', output: (entry) => entries.push(entry) });

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e', new Error('boom'));

    expect(entries.map(entry => entry.level)).toEqual(['warn', 'error']);
    expect(entries[1].error?.message).toBe('boom');
  });

  it('attaches context only when given', () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({ output: (entry) => entries.push(entry) });
    logger.info('plain');
    logger.info('with', { table: 't', rowsRead: 3 });

    expect('context' in entries[0]).toBe(false);
    expect(entries[1].context).toEqual({ table: 't', rowsRead: 3 });
  });
});

describe('formatLogEntry', () => {
  const entry: LogEntry = { level: 'info', message: 'Rows read', timestamp: 0, context: { rowsRead: 2 } };

  it('formats JSON lines', () => {
    expect(formatLogEntry(entry, 'json')).toBe(
      '{"level":"info","message":"Rows read","timestamp":0,"context":{"rowsRead":2}}'
    );
  });

  it('formats pretty lines', () => {
    expect(formatLogEntry(entry, 'pretty')).toBe('[1970-01-01T00:00:00.000Z] INFO  Rows read {"rowsRead":2}');
  });
});

describe('createConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes warnings to stderr and info to stdout', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createConsoleLogger({ minLevel: 'info' });

    logger.debug('hidden');
    logger.info('shown');
    logger.warn('careful');

    expect(log).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledTimes(1);
    expect(String(error.mock.calls[0][0])).toContain('"message":"careful"');
  });
});

describe('createTestLogger', () => {
  it('captures, filters and clears', () => {
    const logger = createTestLogger();
    logger.info('a');
    logger.warn('b');

    expect(logger.getLogs().map(entry => entry.message)).toEqual(['a', 'b']);
    expect(logger.getLogsByLevel('warn').map(entry => entry.message)).toEqual(['b']);
    logger.clear();
    expect(logger.getLogs()).toEqual([]);
  });
});

describe('withContext', () => {
  it('merges context, local values winning', () => {
    const logger = createTestLogger();
    const child = withContext(logger, { service: 'client', table: 't1' });
    child.info('x', { table: 't2', rowsRead: 1 });
    child.error('y', new Error('boom'));

    expect(logger.getLogs().map(entry => entry.context)).toEqual([
      { service: 'client', table: 't2', rowsRead: 1 },
      { service: 'client', table: 't1' },
    ]);
  });
});

describe('levels', () => {
  it('orders levels', () => {
    expect(LogLevels.isAtLeast('error', 'warn')).toBe(true);
    expect(LogLevels.isAtLeast('debug', 'info')).toBe(false);
  });

  it('recognizes level names', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });

  it('noop logger ignores everything', () => {
    const logger = createNoopLogger();
    expect(() => logger.error('x', new Error('y'))).not.toThrow();
  });
});
