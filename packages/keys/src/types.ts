/** Lowercase, fixed-width hex string. */
export type HexString = string;

/** A bech32 string such as `nsec1…` or `npub1…`. */
export type Bech32String = string;

/**
 * A 32-byte secp256k1 secret scalar `d` with `0 < d < n`.
 *
 * An opaque frozen handle. The bytes are held privately; `secretKeyToBytes()`
 * returns a copy.
 */
export interface SecretKey {
  readonly kind: 'secret-key';
}

/** A 32-byte BIP-340 x-only public key. Opaque like {@link SecretKey}. */
export interface PublicKey {
  readonly kind: 'public-key';
}

/** A secret key together with the public key derived from it. */
export interface KeyPair {
  readonly kind: 'key-pair';
  readonly secretKey: SecretKey;
  readonly publicKey: PublicKey;
}

/** Either kind of single key. */
export type Key = SecretKey | PublicKey;

/** JSON-safe public view of a key pair. Holds no secret material. */
export interface KeyPairDescription {
  publicKey: HexString;
  npub: Bech32String;
}

/**
 * Source of cryptographically secure random bytes.
 *
 * Passed explicitly to `generateKeyPair` so tests can substitute a
 * deterministic source.
 */
export interface EntropySource {
  /** Return exactly `length` random bytes, or throw. */
  randomBytes(length: number): Uint8Array;
}
