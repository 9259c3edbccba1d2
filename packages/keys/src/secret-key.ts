import { secp256k1 } from '@noble/curves/secp256k1';
import { bytesToNumberBE } from '@noble/curves/abstract/utils';
import { InvalidFormatError, InvalidScalarError } from '@sigil/types';

import {
  KEY_LENGTH,
  NOSTR_URI_SCHEME,
  PUBLIC_KEY_PREFIX,
  SECRET_KEY_PREFIX,
  decodeBech32,
  decodeHex,
  hasBech32Prefix,
} from './encoding';
import { readKeyBytes, storeSecretKey } from './key-store';
import type { SecretKey } from './types';

/** Order of the secp256k1 group. Valid secret scalars are `1 … n-1`. */
export const CURVE_ORDER: bigint = secp256k1.CURVE.n;

/**
 * Check whether 32 bytes, read big-endian, are a usable secret scalar.
 */
export function isValidScalar(bytes: Uint8Array): boolean {
  if (bytes.length !== KEY_LENGTH) {
    return false;
  }
  const d = bytesToNumberBE(bytes);
  return d > 0n && d < CURVE_ORDER;
}

/**
 * Build a SecretKey from raw bytes. The input is copied, so later writes to
 * it do not affect the key.
 *
 * @throws {InvalidFormatError} When `bytes` is not a 32-byte Uint8Array.
 * @throws {InvalidScalarError} When the scalar is zero or not below the curve order.
 */
export function secretKeyFromBytes(bytes: Uint8Array): SecretKey {
  if (!(bytes instanceof Uint8Array) || bytes.length !== KEY_LENGTH) {
    throw new InvalidFormatError(
      `Secret key must be a ${KEY_LENGTH}-byte Uint8Array, got ${bytes instanceof Uint8Array ? `${bytes.length} bytes` : typeof bytes}`,
    );
  }
  if (!isValidScalar(bytes)) {
    throw new InvalidScalarError('Secret key is out of range: it must be non-zero and less than the curve order', {
      hint: 'The key was not produced by a secp256k1 key generator, or it was corrupted.',
    });
  }
  return storeSecretKey(bytes);
}

/**
 * Parse a secret key from 64 hex characters or an `nsec1…` bech32 string.
 *
 * @throws {InvalidFormatError} On wrong length, prefix, case or characters.
 * @throws {InvalidChecksumError} When an `nsec` checksum does not match.
 * @throws {InvalidScalarError} When the decoded scalar is zero or `>= n`.
 *
 * @example
 * ```typescript
 * const sk = parseSecretKey('nsec1j4c6269y9w0q2er2xjw8sv2ehyrtfxq3jwgdlxj6qfn8z4gjsq5qfvfk99');
 * ```
 */
export function parseSecretKey(input: string): SecretKey {
  if (typeof input !== 'string') {
    throw new InvalidFormatError(`Secret key must be a string, got ${typeof input}`);
  }
  if (input.toLowerCase().startsWith(NOSTR_URI_SCHEME)) {
    throw new InvalidFormatError('Secret keys are never encoded as nostr: URIs', {
      hint: `Remove the "${NOSTR_URI_SCHEME}" prefix, and make sure you meant to share a secret key.`,
    });
  }
  if (hasBech32Prefix(input, PUBLIC_KEY_PREFIX)) {
    throw new InvalidFormatError(`Expected a secret key, got a public key ("${PUBLIC_KEY_PREFIX}1…")`, {
      hint: `Secret keys start with "${SECRET_KEY_PREFIX}1" or are 64 hex characters.`,
    });
  }

  const bytes = hasBech32Prefix(input, SECRET_KEY_PREFIX)
    ? decodeBech32(input, SECRET_KEY_PREFIX, 'secret key')
    : decodeHex(input, KEY_LENGTH, 'secret key');
  return secretKeyFromBytes(bytes);
}

/** Copy of the 32 secret bytes. */
export function secretKeyToBytes(secretKey: SecretKey): Uint8Array {
  return new Uint8Array(readKeyBytes(secretKey));
}
