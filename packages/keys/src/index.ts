/**
 * @sigil/keys: secp256k1 / BIP-340 key pairs.
 *
 * Generation from an injectable entropy source, parsing from hex and
 * bech32 (`nsec` / `npub`), and serialization back to both.
 *
 * @packageDocumentation
 */

export type {
  SecretKey,
  PublicKey,
  KeyPair,
  Key,
  KeyPairDescription,
  EntropySource,
  HexString,
  Bech32String,
} from './types';

export {
  KEY_LENGTH,
  HEX_KEY_LENGTH,
  COMPRESSED_HEX_LENGTH,
  SECRET_KEY_PREFIX,
  PUBLIC_KEY_PREFIX,
  NOSTR_URI_SCHEME,
  BECH32_DATA_LENGTH,
  encodeHex,
  decodeHex,
  encodeBech32,
  decodeBech32,
} from './encoding';

export { systemEntropy, drawBytes } from './entropy';

export { CURVE_ORDER, isValidScalar, secretKeyFromBytes, parseSecretKey, secretKeyToBytes } from './secret-key';

export {
  derivePublicKey,
  publicKeyFromBytes,
  parsePublicKey,
  publicKeyToBytes,
  isPublicKeyEncoding,
} from './public-key';

export {
  MAX_GENERATION_ATTEMPTS,
  generateKeyPair,
  keyPairFromSecretKey,
  parseKeyPair,
  describeKeyPair,
} from './keypair';

export { toHex, toBech32, toNostrUri, keysEqual, constantTimeEqual } from './serialize';

export { safeParseSecretKey, safeParsePublicKey, safeParseKeyPair } from './safe-parse';
