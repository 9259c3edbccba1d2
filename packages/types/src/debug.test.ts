import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { isDebugEnabled, createDebugLogger } from './debug';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Save and restore the original DEBUG env var around each test. */
let originalDebug: string | undefined;

beforeEach(() => {
  originalDebug = process.env.DEBUG;
});

afterEach(() => {
  if (originalDebug === undefined) {
    delete process.env.DEBUG;
  } else {
    process.env.DEBUG = originalDebug;
  }
  vi.restoreAllMocks();
});

// ---------------------------------------------------------------------------
// isDebugEnabled
// ---------------------------------------------------------------------------
describe('isDebugEnabled', () => {
  it('returns false when DEBUG is not set or empty', () => {
    delete process.env.DEBUG;
    expect(isDebugEnabled()).toBe(false);
    process.env.DEBUG = '';
    expect(isDebugEnabled('sigil:keys')).toBe(false);
  });

  it('enables every sigil namespace for DEBUG=sigil and DEBUG=sigil:*', () => {
    for (const value of ['sigil', 'sigil:*']) {
      process.env.DEBUG = value;
      expect(isDebugEnabled()).toBe(true);
      expect(isDebugEnabled('sigil')).toBe(true);
      expect(isDebugEnabled('sigil:keys')).toBe(true);
      expect(isDebugEnabled('other:keys')).toBe(false);
    }
  });

  it('enables everything for DEBUG=*', () => {
    process.env.DEBUG = '*';
    expect(isDebugEnabled('sigil:keys')).toBe(true);
    expect(isDebugEnabled('anything')).toBe(true);
  });

  it('matches a single namespace exactly', () => {
    process.env.DEBUG = 'sigil:keys';
    expect(isDebugEnabled('sigil:keys')).toBe(true);
    expect(isDebugEnabled('sigil:cli')).toBe(false);
  });

  it('supports suffix wildcards', () => {
    process.env.DEBUG = 'sigil:keys:*';
    expect(isDebugEnabled('sigil:keys')).toBe(true);
    expect(isDebugEnabled('sigil:keys:parse')).toBe(true);
    expect(isDebugEnabled('sigil:keysmith')).toBe(false);
  });

  it('accepts comma-separated patterns with whitespace', () => {
    process.env.DEBUG = 'other, sigil:cli';
    expect(isDebugEnabled('sigil:cli')).toBe(true);
    expect(isDebugEnabled('sigil:keys')).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// createDebugLogger
// ---------------------------------------------------------------------------
describe('createDebugLogger', () => {
  it('returns no-op methods when disabled', () => {
    delete process.env.DEBUG;
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const dbg = createDebugLogger('sigil:keys');
    dbg.log('x');
    dbg.warn('y');
    dbg.time('t')();
    expect(spy).not.toHaveBeenCalled();
  });

  it('writes prefixed lines to stderr when enabled', () => {
    process.env.DEBUG = 'sigil:keys';
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const dbg = createDebugLogger('sigil:keys');
    dbg.log('generated', 1);
    expect(spy).toHaveBeenCalledTimes(1);
    const args = spy.mock.calls[0] ?? [];
    expect(args[1]).toBe('[sigil:keys]');
    expect(args.slice(2)).toEqual(['generated', 1]);
  });

  it('marks warnings', () => {
    process.env.DEBUG = 'sigil';
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    createDebugLogger('sigil:cli').warn('careful');
    expect(spy.mock.calls[0]?.slice(1)).toEqual(['[sigil:cli]', 'WARN', 'careful']);
  });

  it('time() logs the elapsed milliseconds with the label', () => {
    process.env.DEBUG = 'sigil';
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const stop = createDebugLogger('sigil:keys').time('generate');
    stop();
    const message = spy.mock.calls[0]?.[2];
    expect(String(message)).toMatch(/^generate: \d+\.\d{2}ms$/);
  });
});
