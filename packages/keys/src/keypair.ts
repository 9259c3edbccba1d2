/**
 * Key pair generation and parsing.
 *
 * A {@link KeyPair} can only come from a secret key: the public half is
 * always derived, never supplied.
 *
 * @packageDocumentation
 */

import { EntropyUnavailableError, PublicKeyOnlyError, createDebugLogger } from '@sigil/types';

import { KEY_LENGTH, SECRET_KEY_PREFIX } from './encoding';
import { drawBytes, systemEntropy } from './entropy';
import { derivePublicKey, isPublicKeyEncoding, parsePublicKey } from './public-key';
import { isValidScalar, parseSecretKey, secretKeyFromBytes } from './secret-key';
import { toBech32, toHex } from './serialize';
import type { EntropySource, KeyPair, KeyPairDescription, SecretKey } from './types';

const dbg = createDebugLogger('sigil:keys');

/**
 * Draws allowed before `generateKeyPair` gives up. A healthy CSPRNG yields
 * an out-of-range scalar with probability below 2^-127 per draw.
 */
export const MAX_GENERATION_ATTEMPTS = 64;

/**
 * Pair a secret key with its derived public key.
 */
export function keyPairFromSecretKey(secretKey: SecretKey): KeyPair {
  const keyPair: KeyPair = {
    kind: 'key-pair',
    secretKey,
    publicKey: derivePublicKey(secretKey),
  };
  return Object.freeze(keyPair);
}

/**
 * Generate a new key pair from secure randomness.
 *
 * Out-of-range draws (zero, or `>= n`) are discarded and redrawn.
 *
 * @param entropy - Random byte source. Defaults to the platform CSPRNG.
 * @throws {EntropyUnavailableError} When the source fails, returns the
 *   wrong number of bytes, or yields no valid scalar in
 *   {@link MAX_GENERATION_ATTEMPTS} draws.
 *
 * @example
 * ```typescript
 * const kp = generateKeyPair();
 * console.log(toBech32(kp.publicKey)); // npub1…
 * ```
 */
export function generateKeyPair(entropy: EntropySource = systemEntropy): KeyPair {
  const stop = dbg.time('generate');
  for (let attempt = 1; attempt <= MAX_GENERATION_ATTEMPTS; attempt++) {
    const candidate = drawBytes(entropy, KEY_LENGTH);
    if (isValidScalar(candidate)) {
      const keyPair = keyPairFromSecretKey(secretKeyFromBytes(candidate));
      stop();
      dbg.log('generated key pair', { publicKey: toHex(keyPair.publicKey), attempts: attempt });
      return keyPair;
    }
    dbg.warn('discarded out-of-range scalar', { attempt });
  }
  throw new EntropyUnavailableError(
    `Entropy source produced no valid secret key in ${MAX_GENERATION_ATTEMPTS} attempts`,
    {
      hint: 'The random source is broken or not random. Do not retry; fix the source.',
      context: { attempts: MAX_GENERATION_ATTEMPTS },
    },
  );
}

/**
 * Parse a key pair from a secret key encoding (64 hex characters or
 * `nsec1…`). The public key is derived.
 *
 * @throws {PublicKeyOnlyError} When `input` is a valid public key encoding
 *   (`npub1…`, `nostr:npub1…`, or compressed hex).
 * @throws {InvalidFormatError | InvalidChecksumError | InvalidScalarError | InvalidPointError}
 *   When `input` is not a valid key encoding at all.
 *
 * @example
 * ```typescript
 * const kp = parseKeyPair('nsec1j4c6269y9w0q2er2xjw8sv2ehyrtfxq3jwgdlxj6qfn8z4gjsq5qfvfk99');
 * ```
 */
export function parseKeyPair(input: string): KeyPair {
  if (typeof input === 'string' && isPublicKeyEncoding(input)) {
    const publicKey = parsePublicKey(input);
    throw new PublicKeyOnlyError('A key pair needs a secret key, but only a public key was supplied', {
      hint: `Pass the matching "${SECRET_KEY_PREFIX}1…" or 64-character hex secret key instead.`,
      context: { publicKey: toHex(publicKey) },
    });
  }
  return keyPairFromSecretKey(parseSecretKey(input));
}

/**
 * Public, JSON-safe view of a key pair, for logs and display. Never
 * includes the secret key.
 */
export function describeKeyPair(keyPair: KeyPair): KeyPairDescription {
  return {
    publicKey: toHex(keyPair.publicKey),
    npub: toBech32(keyPair.publicKey),
  };
}
