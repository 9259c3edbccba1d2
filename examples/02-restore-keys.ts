/**
 * Example 02: Restore Keys
 *
 * Reading keys a user pastes back in. Demonstrates:
 * - Restoring a key pair from an nsec string and from hex
 * - Telling a typo (checksum) apart from a wrong kind of key
 * - Non-throwing parsing with safeParseKeyPair()
 *
 * Run: npx tsx examples/02-restore-keys.ts
 */

import { parseKeyPair, safeParseKeyPair, toBech32, toHex } from '@sigil/keys';
import { SigilErrorCode, formatError } from '@sigil/types';

function main(): void {
  console.log('========================================');
  console.log('  Example 02: Restore Keys');
  console.log('========================================\n');

  // ── Step 1: Restore from bech32 ────────────────────────────────────────

  console.log('--- Step 1: From nsec ---\n');
  const fromNsec = parseKeyPair('nsec1j4c6269y9w0q2er2xjw8sv2ehyrtfxq3jwgdlxj6qfn8z4gjsq5qfvfk99');
  console.log('Secret key (hex):', toHex(fromNsec.secretKey));
  console.log('Public key (npub):', toBech32(fromNsec.publicKey));

  // ── Step 2: Restore from hex ───────────────────────────────────────────

  console.log('\n--- Step 2: From hex ---\n');
  const fromHex = parseKeyPair('6b911fd37cdf5c81d4c0adb1ab7fa822ed253ab0ad9aa18d77257c88b29b718e');
  console.log('Public key (hex):', toHex(fromHex.publicKey));

  // ── Step 3: Handle bad input ───────────────────────────────────────────
  // Every failure has its own error code.

  console.log('\n--- Step 3: Bad input ---\n');
  const inputs = [
    'nsec1j4c6269y9w0q2er2xjw8sv2ehyrtfxq3jwgdlxj6qfn8z4gjsq5qfvfk98',
    'npub14f8usejl26twx0dhuxjh9cas7keav9vr0v8nvtwtrjqx3vycc76qqh9nsy',
    '6b911fd37cdf5c81d4c0adb1ab7fa822ed253ab0ad9aa18d77257c88b29b718e00',
  ];
  for (const input of inputs) {
    const result = safeParseKeyPair(input);
    if (result.ok) {
      console.log(`${input.slice(0, 12)}... => ok`);
    } else if (result.error.code === SigilErrorCode.INVALID_CHECKSUM) {
      console.log(`${input.slice(0, 12)}... => typo, ask the user to copy it again`);
    } else {
      console.log(`${input.slice(0, 12)}... => ${formatError(result.error)}`);
    }
  }

  console.log('\n========================================');
  console.log('  Example complete!');
  console.log('========================================');
}

main();
