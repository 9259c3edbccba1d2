/**
 * Runtime type guards for values crossing a system boundary (CLI
 * arguments, config files, key strings typed by a user).
 */

/**
 * Check whether `value` is a hexadecimal string, in either case.
 *
 * @param value - The value to check.
 * @param length - Exact number of characters required. Without it, any
 *   non-empty even length is accepted.
 */
export function isHexString(value: unknown, length?: number): value is string {
  if (typeof value !== 'string' || value.length === 0) {
    return false;
  }
  if (length !== undefined ? value.length !== length : value.length % 2 !== 0) {
    return false;
  }
  return /^[0-9a-fA-F]+$/.test(value);
}

/**
 * Check whether `value` is a plain object (not an array, null, or an object
 * with a non-Object prototype).
 *
 * @returns `true` if `value` was created by `{}`, `JSON.parse` or `Object.create(null)`.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Check whether `value` is one of the given string literals.
 *
 * @example
 * ```typescript
 * const ENCODINGS = ['hex', 'bech32', 'both'] as const;
 * if (isOneOf(flag, ENCODINGS)) {
 *   // flag: 'hex' | 'bech32' | 'both'
 * }
 * ```
 */
export function isOneOf<T extends string>(value: unknown, options: readonly T[]): value is T {
  return typeof value === 'string' && options.some((option) => option === value);
}

/**
 * Exhaustiveness check for switch statements over a union.
 *
 * @example
 * ```typescript
 * switch (key.kind) {
 *   case 'secret-key': ...
 *   case 'public-key': ...
 *   default: assertNever(key);
 * }
 * ```
 */
export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${String(value)}`);
}
