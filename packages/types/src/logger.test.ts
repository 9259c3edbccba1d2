import { describe, it, expect, vi, afterEach } from 'vitest';
import { Logger, createLogger, parseLogLevel, LogLevel } from './logger';
import type { LogEntry, LogOutput } from './logger';

// ─── Helpers ────────────────────────────────────────────────────────────────────

/** Create a logger whose output is captured into an array for inspection. */
function captureLogger(
  level: LogLevel = LogLevel.DEBUG,
  component?: string,
): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const output: LogOutput = (entry) => entries.push(entry);
  const logger = new Logger({ level, component, output });
  return { logger, entries };
}

afterEach(() => {
  vi.restoreAllMocks();
});

// ─── Tests ──────────────────────────────────────────────────────────────────────

describe('LogLevel', () => {
  it('levels are ordered from least to most severe', () => {
    expect(LogLevel.DEBUG).toBeLessThan(LogLevel.INFO);
    expect(LogLevel.INFO).toBeLessThan(LogLevel.WARN);
    expect(LogLevel.WARN).toBeLessThan(LogLevel.ERROR);
    expect(LogLevel.ERROR).toBeLessThan(LogLevel.SILENT);
  });
});

describe('parseLogLevel', () => {
  it('maps names case-insensitively', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('INFO')).toBe(LogLevel.INFO);
    expect(parseLogLevel('Warn')).toBe(LogLevel.WARN);
    expect(parseLogLevel('error')).toBe(LogLevel.ERROR);
    expect(parseLogLevel('silent')).toBe(LogLevel.SILENT);
  });

  it('returns undefined for unknown names', () => {
    expect(parseLogLevel('verbose')).toBeUndefined();
    expect(parseLogLevel('')).toBeUndefined();
  });
});

describe('Logger', () => {
  it('defaults to INFO level', () => {
    expect(new Logger().getLevel()).toBe(LogLevel.INFO);
  });

  it('emits entries with level, message and timestamp', () => {
    const { logger, entries } = captureLogger();
    logger.info('key pair generated');
    expect(entries).toHaveLength(1);
    expect(entries[0]?.level).toBe('INFO');
    expect(entries[0]?.message).toBe('key pair generated');
    expect(Number.isNaN(Date.parse(entries[0]?.timestamp ?? ''))).toBe(false);
  });

  it('merges contextual fields into the entry', () => {
    const { logger, entries } = captureLogger();
    logger.warn('retrying', { attempt: 2 });
    expect(entries[0]).toMatchObject({ level: 'WARN', message: 'retrying', attempt: 2 });
  });

  it('drops entries below the threshold', () => {
    const { logger, entries } = captureLogger(LogLevel.WARN);
    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');
    expect(entries.map((e) => e.level)).toEqual(['WARN', 'ERROR']);
  });

  it('emits nothing at SILENT', () => {
    const { logger, entries } = captureLogger(LogLevel.SILENT);
    logger.error('e');
    expect(entries).toHaveLength(0);
  });

  it('omits component when none is set', () => {
    const { logger, entries } = captureLogger();
    logger.info('x');
    expect('component' in (entries[0] ?? {})).toBe(false);
  });

  it('setLevel changes the threshold at runtime', () => {
    const { logger, entries } = captureLogger(LogLevel.ERROR);
    logger.info('hidden');
    logger.setLevel(LogLevel.INFO);
    logger.info('shown');
    expect(entries.map((e) => e.message)).toEqual(['shown']);
  });

  it('writes JSON to stderr by default', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    new Logger().info('hello');
    expect(spy).toHaveBeenCalledTimes(1);
    const line = spy.mock.calls[0]?.[0];
    expect(typeof line).toBe('string');
    expect(JSON.parse(String(line))).toMatchObject({ level: 'INFO', message: 'hello' });
  });
});

describe('Logger.child', () => {
  it('uses the child name at the root', () => {
    const { logger, entries } = captureLogger();
    logger.child('cli').info('x');
    expect(entries[0]?.component).toBe('cli');
  });

  it('joins component names with dots', () => {
    const { logger, entries } = captureLogger(LogLevel.DEBUG, 'cli');
    logger.child('generate').child('write').debug('x');
    expect(entries[0]?.component).toBe('cli.generate.write');
  });

  it('inherits level and output', () => {
    const { logger, entries } = captureLogger(LogLevel.WARN);
    const child = logger.child('c');
    child.info('dropped');
    child.warn('kept');
    expect(child.getLevel()).toBe(LogLevel.WARN);
    expect(entries.map((e) => e.message)).toEqual(['kept']);
  });
});

describe('createLogger', () => {
  it('returns a Logger with the given options', () => {
    const logger = createLogger({ level: LogLevel.ERROR });
    expect(logger).toBeInstanceOf(Logger);
    expect(logger.getLevel()).toBe(LogLevel.ERROR);
  });
});
