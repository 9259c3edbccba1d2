/**
 * Example 01: Generate Keys
 *
 * Creating a new identity. Demonstrates:
 * - Generating a key pair from the system entropy source
 * - Encoding both halves as hex and bech32
 * - Sharing only the public half
 *
 * Run: npx tsx examples/01-generate-keys.ts
 */

import { describeKeyPair, generateKeyPair, toBech32, toHex, toNostrUri } from '@sigil/keys';

function main(): void {
  console.log('========================================');
  console.log('  Example 01: Generate Keys');
  console.log('========================================\n');

  // ── Step 1: Generate a key pair ────────────────────────────────────────
  // The secret key is a random scalar below the curve order. The public
  // key is derived from it and is always the x-only form.

  const keyPair = generateKeyPair();

  // ── Step 2: Encode ─────────────────────────────────────────────────────
  // Hex for machines, bech32 for people. The prefix tells the two halves apart.

  console.log('--- Step 2: Encodings ---\n');
  console.log('Public key (hex):  ', toHex(keyPair.publicKey));
  console.log('Public key (npub): ', toBech32(keyPair.publicKey));
  console.log('Secret key (nsec): ', toBech32(keyPair.secretKey).slice(0, 12) + '...');

  // ── Step 3: Share ──────────────────────────────────────────────────────
  // describeKeyPair() never includes secret material, so it is safe to log.

  console.log('\n--- Step 3: Public description ---\n');
  console.log(JSON.stringify(describeKeyPair(keyPair), null, 2));
  console.log('\nShare link:', toNostrUri(keyPair.publicKey));

  console.log('\n========================================');
  console.log('  Example complete!');
  console.log('========================================');
}

main();
