/**
 * Documented error code system for Sigil.
 *
 * Every error has a unique code (SIGIL_Exxx) that maps to one failure
 * mode, so callers can branch on `code` and print targeted diagnostics
 * without parsing messages.
 *
 * @packageDocumentation
 */

// ─── Error codes ────────────────────────────────────────────────────────────────

/** All Sigil error codes. */
export enum SigilErrorCode {
  // Key parsing (1xx)
  /** Wrong length, wrong prefix, bad characters or mixed case. */
  INVALID_FORMAT = 'SIGIL_E100',
  /** A bech32 string decoded but its checksum did not match. */
  INVALID_CHECKSUM = 'SIGIL_E101',
  /** A secret key was zero or not below the curve order. */
  INVALID_SCALAR = 'SIGIL_E102',
  /** A public key does not encode a point on the curve. */
  INVALID_POINT = 'SIGIL_E103',
  /** A key pair was requested but only a public key was supplied. */
  PUBLIC_KEY_ONLY = 'SIGIL_E104',

  // Randomness (2xx)
  /** The entropy source failed or produced unusable output. */
  ENTROPY_UNAVAILABLE = 'SIGIL_E200',

  // Configuration (3xx)
  /** The configuration file could not be read or has invalid fields. */
  CONFIG_INVALID = 'SIGIL_E300',

  // CLI (4xx)
  /** A command was invoked with missing or invalid arguments. */
  USAGE = 'SIGIL_E400',
}

// ─── Error classes ──────────────────────────────────────────────────────────────

/** Options for constructing a SigilError. */
export interface SigilErrorOptions {
  /** Additional structured context for diagnostics and logging. */
  context?: Record<string, unknown>;
  /** A human-readable hint suggesting how to resolve the error. */
  hint?: string;
  /** The underlying cause of this error, for error chaining. */
  cause?: unknown;
}

/**
 * Base error class for all Sigil errors.
 *
 * @example
 * ```typescript
 * throw new SigilError(
 *   SigilErrorCode.INVALID_FORMAT,
 *   'Expected 64 hex characters, got 66',
 *   { hint: 'A secret key is exactly 32 bytes.' }
 * );
 * ```
 */
export class SigilError extends Error {
  readonly code: SigilErrorCode;
  readonly context?: Record<string, unknown>;
  readonly hint?: string;

  constructor(code: SigilErrorCode, message: string, options?: SigilErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'SigilError';
    this.code = code;
    this.context = options?.context;
    this.hint = options?.hint;
  }

  /**
   * Return a structured JSON representation suitable for logging.
   *
   * Includes the error code, message, and optionally the hint and context.
   */
  toJSON(): { code: string; message: string; hint?: string; context?: Record<string, unknown> } {
    const result: { code: string; message: string; hint?: string; context?: Record<string, unknown> } = {
      code: this.code,
      message: this.message,
    };
    if (this.hint !== undefined) {
      result.hint = this.hint;
    }
    if (this.context !== undefined) {
      result.context = this.context;
    }
    return result;
  }
}

/** Input has the wrong length, prefix, case or character set. */
export class InvalidFormatError extends SigilError {
  constructor(message: string, options?: SigilErrorOptions) {
    super(SigilErrorCode.INVALID_FORMAT, message, options);
    this.name = 'InvalidFormatError';
  }
}

/** A bech32 checksum did not match its data. */
export class InvalidChecksumError extends SigilError {
  constructor(message: string, options?: SigilErrorOptions) {
    super(SigilErrorCode.INVALID_CHECKSUM, message, options);
    this.name = 'InvalidChecksumError';
  }
}

/** A secret key scalar was zero or not below the curve order. */
export class InvalidScalarError extends SigilError {
  constructor(message: string, options?: SigilErrorOptions) {
    super(SigilErrorCode.INVALID_SCALAR, message, options);
    this.name = 'InvalidScalarError';
  }
}

/** A public key was well-formed but is not a curve point. */
export class InvalidPointError extends SigilError {
  constructor(message: string, options?: SigilErrorOptions) {
    super(SigilErrorCode.INVALID_POINT, message, options);
    this.name = 'InvalidPointError';
  }
}

/** A key pair was requested from a public key encoding. */
export class PublicKeyOnlyError extends SigilError {
  constructor(message: string, options?: SigilErrorOptions) {
    super(SigilErrorCode.PUBLIC_KEY_ONLY, message, options);
    this.name = 'PublicKeyOnlyError';
  }
}

/**
 * The entropy source failed. Retrying in-process will not help; the host
 * environment has to be fixed.
 */
export class EntropyUnavailableError extends SigilError {
  constructor(message: string, options?: SigilErrorOptions) {
    super(SigilErrorCode.ENTROPY_UNAVAILABLE, message, options);
    this.name = 'EntropyUnavailableError';
  }
}

/** Thrown when `sigil.config.json` is unreadable or malformed. */
export class ConfigError extends SigilError {
  constructor(message: string, options?: SigilErrorOptions) {
    super(SigilErrorCode.CONFIG_INVALID, message, options);
    this.name = 'ConfigError';
  }
}

/** Thrown by the CLI for missing or invalid arguments. */
export class UsageError extends SigilError {
  constructor(message: string, options?: SigilErrorOptions) {
    super(SigilErrorCode.USAGE, message, options);
    this.name = 'UsageError';
  }
}

/** Every error a key parser can raise. */
export type KeyError =
  | InvalidFormatError
  | InvalidChecksumError
  | InvalidScalarError
  | InvalidPointError
  | PublicKeyOnlyError;

// ─── Utility functions ──────────────────────────────────────────────────────────

/**
 * Narrow an unknown thrown value to a SigilError, optionally of one code.
 *
 * @example
 * ```typescript
 * if (isSigilError(err, SigilErrorCode.INVALID_CHECKSUM)) {
 *   console.error('checksum mismatch');
 * }
 * ```
 */
export function isSigilError(value: unknown, code?: SigilErrorCode): value is SigilError {
  if (!(value instanceof SigilError)) return false;
  return code === undefined || value.code === code;
}

/**
 * Narrow an unknown thrown value to one of the key parsing errors.
 */
export function isKeyError(value: unknown): value is KeyError {
  return (
    value instanceof InvalidFormatError ||
    value instanceof InvalidChecksumError ||
    value instanceof InvalidScalarError ||
    value instanceof InvalidPointError ||
    value instanceof PublicKeyOnlyError
  );
}

/**
 * Format an error for terminal display.
 *
 * @example
 * ```typescript
 * formatError(new InvalidChecksumError('Checksum mismatch', { hint: 'Check for typos.' }));
 * // [SIGIL_E101] Checksum mismatch
 * // Hint: Check for typos.
 * ```
 */
export function formatError(error: SigilError): string {
  const lines: string[] = [];
  lines.push(`[${error.code}] ${error.message}`);
  if (error.hint) {
    lines.push(`Hint: ${error.hint}`);
  }
  return lines.join('\n');
}
