import { afterEach, describe, expect, it, vi } from 'vitest';
import { formatLogEntry, Logger, LogLevel, getLogger, toLogLevel } from '../logging.js';

const TIMESTAMP = new Date('2024-01-02T03:04:05.000Z');

describe('formatLogEntry', () => {
  it('formats level, context and message', () => {
    expect(formatLogEntry(LogLevel.INFO, 'ready', 'Server', undefined, TIMESTAMP))
      .toBe('2024-01-02T03:04:05.000Z [INFO] [Server] ready');
  });

  it('appends object metadata as JSON', () => {
    expect(formatLogEntry(LogLevel.WARN, 'slow', 'Fetch', { ms: 1200 }, TIMESTAMP))
      .toBe('2024-01-02T03:04:05.000Z [WARN] [Fetch] slow {"ms":1200}');
  });

  it('reduces errors to their name and message', () => {
    expect(formatLogEntry(LogLevel.ERROR, 'failed', 'Fetch', new TypeError('boom'), TIMESTAMP))
      .toBe('2024-01-02T03:04:05.000Z [ERROR] [Fetch] failed {"name":"TypeError","message":"boom"}');
  });
});

describe('toLogLevel', () => {
  it('maps configured names onto levels', () => {
    expect(toLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(toLogLevel('warn')).toBe(LogLevel.WARN);
    expect(toLogLevel('error')).toBe(LogLevel.ERROR);
    expect(toLogLevel('info')).toBe(LogLevel.INFO);
  });
});

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    Logger.configure({ minLevel: LogLevel.ERROR, toFile: false, toStderr: true });
  });

  it('writes to stderr only at or above the minimum level', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    Logger.configure({ minLevel: LogLevel.WARN, toFile: false, toStderr: true });

    const logger = getLogger();
    logger.info('not shown', 'Test');
    logger.debug('not shown either', 'Test');
    logger.warn('careful', 'Test');

    expect(write).toHaveBeenCalledTimes(1);
    expect(String(write.mock.calls[0][0])).toMatch(/ \[WARN\] \[Test\] careful\n$/);
  });
});
