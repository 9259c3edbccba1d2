/**
 * sigil doctor command.
 *
 * Checks that this installation can generate and read keys: Node.js
 * version, the entropy source, a known test vector, a generate/encode/parse
 * round trip, and config file readability.
 *
 * @packageDocumentation
 */

import {
  constantTimeEqual,
  derivePublicKey,
  generateKeyPair,
  keysEqual,
  parseKeyPair,
  parsePublicKey,
  parseSecretKey,
  systemEntropy,
  toBech32,
  toHex,
} from '@sigil/keys';
import type { EntropySource } from '@sigil/keys';

import { loadConfig, findConfigFile } from './config';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Result of a single doctor health check. */
export interface DoctorCheck {
  /** Human-readable name of the check. */
  name: string;
  /** Outcome of the check. */
  status: 'ok' | 'warn' | 'fail';
  /** Human-readable description of the result. */
  message: string;
}

/** Inputs the checks run against. */
export interface DoctorOptions {
  /** Directory to search for sigil.config.json. */
  configDir?: string;
  entropy?: EntropySource;
  /** Overrides `process.version`. */
  nodeVersion?: string;
}

const MIN_NODE_MAJOR = 20;

// Secret key 3 and its x-only public key.
const VECTOR_SECRET = '0000000000000000000000000000000000000000000000000000000000000003';
const VECTOR_PUBLIC = 'f9308a019258c31049344f85f89d5229b531c845836f99b08601f113bce036f9';

function failure(name: string, err: unknown): DoctorCheck {
  const msg = err instanceof Error ? err.message : String(err);
  return { name, status: 'fail', message: msg };
}

// ─── Checks ───────────────────────────────────────────────────────────────────

function checkNodeVersion(version: string): DoctorCheck {
  const major = parseInt(version.replace(/^v/, '').split('.')[0] ?? '', 10);

  if (major >= MIN_NODE_MAJOR) {
    return {
      name: 'Node.js version',
      status: 'ok',
      message: `Node.js ${version} (>= ${MIN_NODE_MAJOR} required)`,
    };
  }

  return {
    name: 'Node.js version',
    status: 'fail',
    message: `Node.js ${version} is below minimum version ${MIN_NODE_MAJOR}`,
  };
}

function checkEntropy(entropy: EntropySource): DoctorCheck {
  try {
    const a = entropy.randomBytes(32);
    const b = entropy.randomBytes(32);
    if (a.length !== 32 || b.length !== 32) {
      return { name: 'Entropy', status: 'fail', message: 'Entropy source returned the wrong number of bytes' };
    }
    if (constantTimeEqual(a, b)) {
      return { name: 'Entropy', status: 'fail', message: 'Entropy source returned the same bytes twice' };
    }
    return { name: 'Entropy', status: 'ok', message: 'Entropy source returns fresh random bytes' };
  } catch (err) {
    return failure('Entropy', err);
  }
}

function checkTestVector(): DoctorCheck {
  try {
    const derived = toHex(derivePublicKey(parseSecretKey(VECTOR_SECRET)));
    if (derived === VECTOR_PUBLIC) {
      return { name: 'Test vector', status: 'ok', message: 'BIP-340 public key derivation matches' };
    }
    return { name: 'Test vector', status: 'fail', message: `Derived ${derived}, expected ${VECTOR_PUBLIC}` };
  } catch (err) {
    return failure('Test vector', err);
  }
}

function checkRoundTrip(entropy: EntropySource): DoctorCheck {
  try {
    const kp = generateKeyPair(entropy);
    const restored = parseKeyPair(toBech32(kp.secretKey));
    const fromHex = parseKeyPair(toHex(kp.secretKey));
    const publicKey = parsePublicKey(toBech32(kp.publicKey));

    if (
      keysEqual(restored.secretKey, kp.secretKey) &&
      keysEqual(fromHex.publicKey, kp.publicKey) &&
      keysEqual(publicKey, kp.publicKey)
    ) {
      return { name: 'Round trip', status: 'ok', message: 'Generate, encode and parse agree (hex and bech32)' };
    }
    return { name: 'Round trip', status: 'fail', message: 'A parsed key differs from the generated one' };
  } catch (err) {
    return failure('Round trip', err);
  }
}

function checkConfig(configDir?: string): DoctorCheck {
  const configPath = findConfigFile(configDir);
  if (!configPath) {
    return { name: 'Config', status: 'warn', message: 'No sigil.config.json found (optional)' };
  }

  try {
    loadConfig(configDir);
    return { name: 'Config', status: 'ok', message: `Config loaded from ${configPath}` };
  } catch (err) {
    return failure('Config', err);
  }
}

// ─── Main ─────────────────────────────────────────────────────────────────────

/**
 * Run all doctor health checks and return the results in a fixed order:
 * Node.js version, entropy, test vector, round trip, config.
 *
 * @example
 * ```typescript
 * const checks = runDoctor();
 * const allOk = checks.every((c) => c.status !== 'fail');
 * ```
 */
export function runDoctor(options: DoctorOptions = {}): DoctorCheck[] {
  const entropy = options.entropy ?? systemEntropy;
  return [
    checkNodeVersion(options.nodeVersion ?? process.version),
    checkEntropy(entropy),
    checkTestVector(),
    checkRoundTrip(entropy),
    checkConfig(options.configDir),
  ];
}
