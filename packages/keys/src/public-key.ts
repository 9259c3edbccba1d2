import { schnorr, secp256k1 } from '@noble/curves/secp256k1';
import { bytesToNumberBE } from '@noble/curves/abstract/utils';
import { InvalidFormatError, InvalidPointError } from '@sigil/types';

import {
  COMPRESSED_HEX_LENGTH,
  HEX_KEY_LENGTH,
  KEY_LENGTH,
  NOSTR_URI_SCHEME,
  PUBLIC_KEY_PREFIX,
  SECRET_KEY_PREFIX,
  decodeBech32,
  decodeHex,
  hasBech32Prefix,
} from './encoding';
import { readKeyBytes, storePublicKey } from './key-store';
import type { PublicKey, SecretKey } from './types';

/**
 * Derive the BIP-340 x-only public key of a secret key.
 *
 * @example
 * ```typescript
 * toHex(derivePublicKey(parseSecretKey('00…03')));
 * // 'f9308a019258c31049344f85f89d5229b531c845836f99b08601f113bce036f9'
 * ```
 */
export function derivePublicKey(secretKey: SecretKey): PublicKey {
  return storePublicKey(schnorr.getPublicKey(readKeyBytes(secretKey)));
}

/**
 * Build a PublicKey from 32 x-only bytes or 33 SEC1 compressed bytes. A
 * compressed key is checked and reduced to its x coordinate.
 *
 * @throws {InvalidFormatError} On any other length, or a bad SEC1 prefix byte.
 * @throws {InvalidPointError} When the bytes do not encode a curve point.
 */
export function publicKeyFromBytes(bytes: Uint8Array): PublicKey {
  if (!(bytes instanceof Uint8Array)) {
    throw new InvalidFormatError(`Public key must be a Uint8Array, got ${typeof bytes}`);
  }

  if (bytes.length === KEY_LENGTH) {
    try {
      schnorr.utils.lift_x(bytesToNumberBE(bytes));
    } catch (cause) {
      throw new InvalidPointError('Public key is not the x coordinate of a secp256k1 point', { cause });
    }
    return storePublicKey(bytes);
  }

  if (bytes.length === KEY_LENGTH + 1) {
    if (bytes[0] !== 0x02 && bytes[0] !== 0x03) {
      throw new InvalidFormatError('Compressed public key must start with 0x02 or 0x03', {
        context: { prefixByte: bytes[0] },
      });
    }
    try {
      secp256k1.ProjectivePoint.fromHex(bytes);
    } catch (cause) {
      throw new InvalidPointError('Compressed public key is not a secp256k1 point', { cause });
    }
    return storePublicKey(bytes.subarray(1));
  }

  throw new InvalidFormatError(
    `Public key must be ${KEY_LENGTH} (x-only) or ${KEY_LENGTH + 1} (compressed) bytes, got ${bytes.length}`,
  );
}

/**
 * Whether `input` is written in one of the public-key-only encodings:
 * `npub1…`, a `nostr:` URI, or 66-character compressed hex.
 *
 * Only the shape is checked; use {@link parsePublicKey} to validate.
 */
export function isPublicKeyEncoding(input: string): boolean {
  if (input.toLowerCase().startsWith(NOSTR_URI_SCHEME) || hasBech32Prefix(input, PUBLIC_KEY_PREFIX)) {
    return true;
  }
  return input.length === COMPRESSED_HEX_LENGTH && (input.startsWith('02') || input.startsWith('03'));
}

/**
 * Parse a public key from 64 hex characters (x-only), 66 hex characters
 * (compressed), `npub1…`, or `nostr:npub1…`.
 *
 * @throws {InvalidFormatError} On wrong length, prefix, case or characters.
 * @throws {InvalidChecksumError} When an `npub` checksum does not match.
 * @throws {InvalidPointError} When the key is not a point on the curve.
 */
export function parsePublicKey(input: string): PublicKey {
  if (typeof input !== 'string') {
    throw new InvalidFormatError(`Public key must be a string, got ${typeof input}`);
  }

  if (input.toLowerCase().startsWith(NOSTR_URI_SCHEME)) {
    const identifier = input.slice(NOSTR_URI_SCHEME.length);
    if (!hasBech32Prefix(identifier, PUBLIC_KEY_PREFIX)) {
      throw new InvalidFormatError(`A nostr: URI must carry an "${PUBLIC_KEY_PREFIX}1…" identifier`);
    }
    return publicKeyFromBytes(decodeBech32(identifier, PUBLIC_KEY_PREFIX, 'public key'));
  }
  if (hasBech32Prefix(input, PUBLIC_KEY_PREFIX)) {
    return publicKeyFromBytes(decodeBech32(input, PUBLIC_KEY_PREFIX, 'public key'));
  }
  if (hasBech32Prefix(input, SECRET_KEY_PREFIX)) {
    throw new InvalidFormatError(`Expected a public key, got a secret key ("${SECRET_KEY_PREFIX}1…")`, {
      hint: 'Never paste a secret key where a public key is expected.',
    });
  }
  if (input.length === COMPRESSED_HEX_LENGTH) {
    return publicKeyFromBytes(decodeHex(input, KEY_LENGTH + 1, 'public key'));
  }
  if (input.length !== HEX_KEY_LENGTH) {
    throw new InvalidFormatError(
      `Invalid public key: expected ${HEX_KEY_LENGTH} or ${COMPRESSED_HEX_LENGTH} hex characters, got ${input.length}`,
    );
  }
  return publicKeyFromBytes(decodeHex(input, KEY_LENGTH, 'public key'));
}

/** Copy of the 32 x-only public key bytes. */
export function publicKeyToBytes(publicKey: PublicKey): Uint8Array {
  return new Uint8Array(readKeyBytes(publicKey));
}
