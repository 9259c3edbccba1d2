import { assertNever } from '@sigil/types';

import { NOSTR_URI_SCHEME, PUBLIC_KEY_PREFIX, SECRET_KEY_PREFIX, encodeBech32, encodeHex } from './encoding';
import { readKeyBytes } from './key-store';
import type { Bech32String, HexString, Key, PublicKey } from './types';

/**
 * Lowercase, 64-character hex encoding of a secret or public key.
 *
 * @example
 * ```typescript
 * toHex(keyPair.publicKey); // 'f9308a01…e036f9'
 * ```
 */
export function toHex(key: Key): HexString {
  return encodeHex(readKeyBytes(key));
}

/**
 * bech32 encoding of a key. The prefix follows from the key's kind:
 * `nsec` for secret keys, `npub` for public keys.
 *
 * @example
 * ```typescript
 * toBech32(keyPair.secretKey); // 'nsec1…'
 * toBech32(keyPair.publicKey); // 'npub1…'
 * ```
 */
export function toBech32(key: Key): Bech32String {
  switch (key.kind) {
    case 'secret-key':
      return encodeBech32(SECRET_KEY_PREFIX, readKeyBytes(key));
    case 'public-key':
      return encodeBech32(PUBLIC_KEY_PREFIX, readKeyBytes(key));
    default:
      return assertNever(key);
  }
}

/** `nostr:npub1…` URI for sharing a public key. */
export function toNostrUri(publicKey: PublicKey): string {
  return `${NOSTR_URI_SCHEME}${toBech32(publicKey)}`;
}

/**
 * Constant-time comparison of two byte arrays. Every byte is examined even
 * after a mismatch.
 */
export function constantTimeEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  let diff = 0;
  for (let i = 0; i < a.length; i++) {
    diff |= (a[i] ?? 0) ^ (b[i] ?? 0);
  }
  return diff === 0;
}

/**
 * Whether two keys are the same kind and hold the same bytes.
 */
export function keysEqual(a: Key, b: Key): boolean {
  return a.kind === b.kind && constantTimeEqual(readKeyBytes(a), readKeyBytes(b));
}
