import { createDebugLogger, err, isKeyError, ok } from '@sigil/types';
import type { KeyError, Result } from '@sigil/types';

import { parseKeyPair } from './keypair';
import { parsePublicKey } from './public-key';
import { parseSecretKey } from './secret-key';
import type { KeyPair, PublicKey, SecretKey } from './types';

const dbg = createDebugLogger('sigil:keys');

function attempt<T>(what: string, parse: () => T): Result<T, KeyError> {
  try {
    return ok(parse());
  } catch (error) {
    if (isKeyError(error)) {
      dbg.log(`${what} rejected`, error.code);
      return err(error);
    }
    throw error;
  }
}

/**
 * Non-throwing {@link parseSecretKey}. Errors other than key parsing
 * errors still propagate.
 *
 * @example
 * ```typescript
 * const result = safeParseSecretKey(userInput);
 * if (!result.ok && result.error.code === SigilErrorCode.INVALID_CHECKSUM) {
 *   warn('typo in key');
 * }
 * ```
 */
export function safeParseSecretKey(input: string): Result<SecretKey, KeyError> {
  return attempt('secret key', () => parseSecretKey(input));
}

/** Non-throwing {@link parsePublicKey}. */
export function safeParsePublicKey(input: string): Result<PublicKey, KeyError> {
  return attempt('public key', () => parsePublicKey(input));
}

/** Non-throwing {@link parseKeyPair}. */
export function safeParseKeyPair(input: string): Result<KeyPair, KeyError> {
  return attempt('key pair', () => parseKeyPair(input));
}
