/**
 * Hex and bech32 codecs for 32-byte keys.
 *
 * Both decoders classify failures precisely: anything wrong with length,
 * prefix, case or alphabet is an {@link InvalidFormatError}; a well-formed
 * bech32 string whose checksum does not match is an
 * {@link InvalidChecksumError}.
 *
 * @packageDocumentation
 */

import { bech32 } from '@scure/base';
import { bytesToHex, hexToBytes } from '@noble/hashes/utils';
import { InvalidChecksumError, InvalidFormatError, isHexString } from '@sigil/types';

import type { Bech32String, HexString } from './types';

// ─── Constants ──────────────────────────────────────────────────────────────────

/** Byte length of secret keys and x-only public keys. */
export const KEY_LENGTH = 32;

/** Hex length of a 32-byte key. */
export const HEX_KEY_LENGTH = KEY_LENGTH * 2;

/** Hex length of a 33-byte SEC1 compressed public key. */
export const COMPRESSED_HEX_LENGTH = (KEY_LENGTH + 1) * 2;

/** Human-readable prefix of bech32 secret keys. */
export const SECRET_KEY_PREFIX = 'nsec';

/** Human-readable prefix of bech32 public keys. */
export const PUBLIC_KEY_PREFIX = 'npub';

/** URI scheme for shareable public identifiers (NIP-21). */
export const NOSTR_URI_SCHEME = 'nostr:';

const BECH32_ALPHABET = 'qpzry9x8gf2tvdw0s3jn54khce6mua7l';
const BECH32_CHECKSUM_LENGTH = 6;

/** Characters after the `1` separator: 52 data words plus the checksum. */
export const BECH32_DATA_LENGTH = Math.ceil((KEY_LENGTH * 8) / 5) + BECH32_CHECKSUM_LENGTH;

// ─── Hex ────────────────────────────────────────────────────────────────────────

/**
 * Encode bytes as lowercase hex.
 *
 * @example
 * ```typescript
 * encodeHex(new Uint8Array([255, 0])); // 'ff00'
 * ```
 */
export function encodeHex(bytes: Uint8Array): HexString {
  return bytesToHex(bytes);
}

/**
 * Decode a hex string of exactly `byteLength` bytes. Upper and lower case
 * are both accepted.
 *
 * @param label - What is being decoded, for error messages (e.g. `'secret key'`).
 * @throws {InvalidFormatError} On wrong length or non-hex characters.
 */
export function decodeHex(input: string, byteLength: number, label: string): Uint8Array {
  const expected = byteLength * 2;
  if (input.length !== expected) {
    throw new InvalidFormatError(
      `Invalid ${label}: expected ${expected} hex characters, got ${input.length}`,
      {
        hint: `A ${label} in hex is exactly ${byteLength} bytes (${expected} characters).`,
        context: { expected, actual: input.length },
      },
    );
  }
  if (!isHexString(input, expected)) {
    throw new InvalidFormatError(`Invalid ${label}: contains non-hexadecimal characters`, {
      hint: 'Hex keys may only contain 0-9 and a-f.',
    });
  }
  return hexToBytes(input);
}

// ─── Bech32 ─────────────────────────────────────────────────────────────────────

/**
 * Encode a 32-byte key as bech32 under the given prefix.
 *
 * @example
 * ```typescript
 * encodeBech32('npub', publicKeyBytes); // 'npub1…'
 * ```
 */
export function encodeBech32(prefix: string, bytes: Uint8Array): Bech32String {
  return bech32.encode(prefix, bech32.toWords(bytes));
}

/**
 * Check whether `input` starts with `<prefix>1`, ignoring case. Says nothing
 * about whether the rest is valid.
 */
export function hasBech32Prefix(input: string, prefix: string): boolean {
  return input.toLowerCase().startsWith(`${prefix}1`);
}

/**
 * Decode a bech32 string carrying a 32-byte key under `prefix`.
 *
 * @param label - What is being decoded, for error messages.
 * @throws {InvalidFormatError} On mixed case, wrong prefix, wrong length,
 *   characters outside the bech32 alphabet, or non-zero padding bits.
 * @throws {InvalidChecksumError} When the checksum does not match.
 */
export function decodeBech32(input: string, prefix: string, label: string): Uint8Array {
  if (input !== input.toLowerCase() && input !== input.toUpperCase()) {
    throw new InvalidFormatError(`Invalid ${label}: bech32 strings must not mix upper and lower case`);
  }

  const lowered = input.toLowerCase();
  const separator = lowered.lastIndexOf('1');
  if (separator === -1 || lowered.slice(0, separator) !== prefix) {
    throw new InvalidFormatError(`Invalid ${label}: expected a "${prefix}1" prefix`, {
      context: { expectedPrefix: prefix },
    });
  }

  const data = lowered.slice(separator + 1);
  if (data.length !== BECH32_DATA_LENGTH) {
    throw new InvalidFormatError(
      `Invalid ${label}: expected ${BECH32_DATA_LENGTH} characters after "${prefix}1", got ${data.length}`,
      { context: { expected: BECH32_DATA_LENGTH, actual: data.length } },
    );
  }

  for (let i = 0; i < data.length; i++) {
    const ch = data.charAt(i);
    if (!BECH32_ALPHABET.includes(ch)) {
      throw new InvalidFormatError(
        `Invalid ${label}: "${ch}" at position ${separator + 1 + i} is not a bech32 character`,
        { hint: 'bech32 never uses the characters 1, b, i or o in the data part.' },
      );
    }
  }

  // Every structural check has passed, so the only remaining failure is the checksum.
  let words: number[];
  try {
    words = bech32.decode(lowered, false).words;
  } catch (cause) {
    throw new InvalidChecksumError(`Invalid ${label}: bech32 checksum mismatch`, {
      cause,
      hint: 'The string was probably mistyped or truncated. Copy it again from the source.',
    });
  }

  const bytes = bech32.fromWordsUnsafe(words);
  if (!(bytes instanceof Uint8Array) || bytes.length !== KEY_LENGTH) {
    throw new InvalidFormatError(`Invalid ${label}: bech32 payload is not a ${KEY_LENGTH}-byte key`);
  }
  return bytes;
}
