/**
 * @sigil/types: shared building blocks for the Sigil packages.
 *
 * Error codes and classes, the structured logger, namespaced debug
 * logging, runtime guards, and a Result type.
 *
 * @packageDocumentation
 */

// ─── Protocol constants ─────────────────────────────────────────────────────────

/** Current Sigil version string. */
export const SIGIL_VERSION = '0.1.0';

// ─── Result type ────────────────────────────────────────────────────────────────

/**
 * A discriminated union holding either a successful value or an error.
 *
 *   - `{ ok: true, value: T }`
 *   - `{ ok: false, error: E }`
 */
export type Result<T, E = Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

/**
 * Construct a successful Result.
 *
 * @example
 * ```typescript
 * const result = ok(42);
 * if (result.ok) console.log(result.value); // 42
 * ```
 */
export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

/**
 * Construct a failed Result.
 *
 * @example
 * ```typescript
 * const result = err(new Error('not found'));
 * if (!result.ok) console.log(result.error.message); // 'not found'
 * ```
 */
export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

// ─── Errors ─────────────────────────────────────────────────────────────────────

export {
  SigilErrorCode,
  SigilError,
  InvalidFormatError,
  InvalidChecksumError,
  InvalidScalarError,
  InvalidPointError,
  PublicKeyOnlyError,
  EntropyUnavailableError,
  ConfigError,
  UsageError,
  isSigilError,
  isKeyError,
  formatError,
} from './errors';
export type { SigilErrorOptions, KeyError } from './errors';

// ─── Guards ─────────────────────────────────────────────────────────────────────

export { isHexString, isPlainObject, isOneOf, assertNever } from './guards';

// ─── Structured logging ─────────────────────────────────────────────────────────

export { Logger, createLogger, parseLogLevel, LogLevel } from './logger';
export type { LogEntry, LogOutput, LoggerOptions } from './logger';

// ─── Debug logging ──────────────────────────────────────────────────────────────

export { isDebugEnabled, createDebugLogger, DEBUG_ROOT } from './debug';
export type { DebugLogger } from './debug';
