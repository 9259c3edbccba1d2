import { randomBytes } from '@noble/hashes/utils';
import { EntropyUnavailableError } from '@sigil/types';

import type { EntropySource } from './types';

/**
 * Platform CSPRNG (`crypto.getRandomValues`), the default source for
 * `generateKeyPair`. Safe to share between concurrent callers.
 */
export const systemEntropy: EntropySource = {
  randomBytes: (length: number): Uint8Array => randomBytes(length),
};

/**
 * Read `length` bytes from a source, turning every failure into an
 * {@link EntropyUnavailableError}.
 *
 * @throws {EntropyUnavailableError} When the source throws, or returns
 *   something other than `length` bytes.
 */
export function drawBytes(source: EntropySource, length: number): Uint8Array {
  let bytes: Uint8Array;
  try {
    bytes = source.randomBytes(length);
  } catch (cause) {
    throw new EntropyUnavailableError(
      `Entropy source failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      {
        cause,
        hint: 'Ensure the runtime provides crypto.getRandomValues(). Node.js 20 and later always do.',
      },
    );
  }
  if (!(bytes instanceof Uint8Array) || bytes.length !== length) {
    throw new EntropyUnavailableError(
      `Entropy source returned ${bytes instanceof Uint8Array ? `${bytes.length} bytes` : typeof bytes}, expected ${length} bytes`,
      { context: { expected: length } },
    );
  }
  return bytes;
}
