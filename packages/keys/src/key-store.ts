/**
 * Private byte storage for key handles.
 *
 * A {@link SecretKey} or {@link PublicKey} is a frozen handle carrying only
 * its `kind`. The 32 key bytes live here, keyed by handle, and never leave
 * this module except as copies, so no caller can write into a key.
 *
 * @packageDocumentation
 */

import { InvalidFormatError } from '@sigil/types';

import type { Key, PublicKey, SecretKey } from './types';

const secretBytes = new WeakMap<SecretKey, Uint8Array>();
const publicBytes = new WeakMap<PublicKey, Uint8Array>();

/** Store a copy of already validated secret bytes behind a new handle. */
export function storeSecretKey(bytes: Uint8Array): SecretKey {
  const secretKey: SecretKey = { kind: 'secret-key' };
  Object.freeze(secretKey);
  secretBytes.set(secretKey, new Uint8Array(bytes));
  return secretKey;
}

/** Store a copy of already validated x-only bytes behind a new handle. */
export function storePublicKey(bytes: Uint8Array): PublicKey {
  const publicKey: PublicKey = { kind: 'public-key' };
  Object.freeze(publicKey);
  publicBytes.set(publicKey, new Uint8Array(bytes));
  return publicKey;
}

/**
 * The stored bytes of a key. Callers inside this package must not write to
 * the result.
 *
 * @throws {InvalidFormatError} When `key` was not created by this package.
 */
export function readKeyBytes(key: Key): Uint8Array {
  const bytes = key.kind === 'secret-key' ? secretBytes.get(key) : publicBytes.get(key);
  if (bytes === undefined) {
    throw new InvalidFormatError(`Not a ${key.kind === 'secret-key' ? 'secret' : 'public'} key created by @sigil/keys`, {
      hint: 'Build keys with parseSecretKey, parsePublicKey, generateKeyPair or the *FromBytes functions.',
    });
  }
  return bytes;
}
