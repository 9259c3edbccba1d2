/**
 * Namespaced debug logging, switched on by the `DEBUG` environment variable.
 *
 * Patterns (comma separated): `sigil`, `sigil:*`, `sigil:keys`,
 * `sigil:keys:*`, `*`. When a namespace is disabled every method is a no-op.
 *
 * @packageDocumentation
 */

/** Root namespace shared by every Sigil debug logger. */
export const DEBUG_ROOT = 'sigil';

/**
 * Check whether debug output is enabled for a namespace.
 *
 * @param namespace - e.g. `'sigil:keys'`. If omitted, checks whether any
 *   Sigil namespace is enabled.
 */
export function isDebugEnabled(namespace?: string): boolean {
  const debugEnv = (typeof process !== 'undefined' && process.env.DEBUG) || '';
  if (!debugEnv) {
    return false;
  }

  const patterns = debugEnv.split(',').map((p) => p.trim()).filter(Boolean);
  const underRoot = !namespace || namespace === DEBUG_ROOT || namespace.startsWith(`${DEBUG_ROOT}:`);

  for (const pattern of patterns) {
    if (pattern === '*') {
      return true;
    }
    if ((pattern === DEBUG_ROOT || pattern === `${DEBUG_ROOT}:*`) && underRoot) {
      return true;
    }
    if (namespace && pattern === namespace) {
      return true;
    }
    if (namespace && pattern.endsWith(':*')) {
      const prefix = pattern.slice(0, -2);
      if (namespace === prefix || namespace.startsWith(prefix + ':')) {
        return true;
      }
    }
  }

  return false;
}

/** The shape of a debug logger returned by {@link createDebugLogger}. */
export interface DebugLogger {
  log: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  /** Start a timer. The returned function logs the elapsed milliseconds. */
  time: (label: string) => () => void;
}

const noop = (): void => {};

const noopTimer = (): (() => void) => noop;

/**
 * Create a debug logger for the given namespace. The `DEBUG` variable is
 * read once, when the logger is created.
 *
 * @example
 * ```typescript
 * const dbg = createDebugLogger('sigil:keys');
 * const stop = dbg.time('generate');
 * // ...
 * stop(); // [sigil:keys] generate: 0.42ms
 * ```
 */
export function createDebugLogger(namespace: string): DebugLogger {
  if (!isDebugEnabled(namespace)) {
    return { log: noop, warn: noop, time: noopTimer };
  }

  const prefix = `[${namespace}]`;

  return {
    log: (...args: unknown[]): void => {
      console.error(new Date().toISOString(), prefix, ...args);
    },
    warn: (...args: unknown[]): void => {
      console.error(new Date().toISOString(), prefix, 'WARN', ...args);
    },
    time: (label: string): (() => void) => {
      const start = performance.now();
      return (): void => {
        const elapsed = performance.now() - start;
        console.error(new Date().toISOString(), prefix, `${label}: ${elapsed.toFixed(2)}ms`);
      };
    },
  };
}
