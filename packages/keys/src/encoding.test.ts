import { describe, it, expect } from 'vitest';
import { InvalidChecksumError, InvalidFormatError } from '@sigil/types';
import {
  BECH32_DATA_LENGTH,
  decodeBech32,
  decodeHex,
  encodeBech32,
  encodeHex,
  hasBech32Prefix,
} from './encoding';

const THREE_HEX = '0000000000000000000000000000000000000000000000000000000000000003';
const THREE_NSEC = 'nsec1qqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqps52s3re';

function three(): Uint8Array {
  const bytes = new Uint8Array(32);
  bytes[31] = 3;
  return bytes;
}

// ---------------------------------------------------------------------------
// Hex
// ---------------------------------------------------------------------------
describe('encodeHex', () => {
  it('produces lowercase, zero-padded output', () => {
    expect(encodeHex(new Uint8Array([255, 0, 10]))).toBe('ff000a');
    expect(encodeHex(three())).toBe(THREE_HEX);
  });
});

describe('decodeHex', () => {
  it('decodes lowercase and uppercase hex', () => {
    expect(decodeHex(THREE_HEX, 32, 'secret key')).toEqual(three());
    expect(decodeHex('FF00', 2, 'value')).toEqual(new Uint8Array([255, 0]));
  });

  it('rejects wrong length with the expected and actual counts', () => {
    expect(() => decodeHex(THREE_HEX + '00', 32, 'secret key')).toThrow(
      'Invalid secret key: expected 64 hex characters, got 66',
    );
    expect(() => decodeHex(THREE_HEX.slice(1), 32, 'secret key')).toThrow(InvalidFormatError);
  });

  it('rejects non-hex characters', () => {
    const bad = 'g' + THREE_HEX.slice(1);
    expect(() => decodeHex(bad, 32, 'secret key')).toThrow(
      'Invalid secret key: contains non-hexadecimal characters',
    );
  });

  it('rejects a 0x prefix as a length error', () => {
    expect(() => decodeHex('0x' + THREE_HEX, 32, 'secret key')).toThrow(InvalidFormatError);
  });
});

// ---------------------------------------------------------------------------
// Bech32
// ---------------------------------------------------------------------------
describe('BECH32_DATA_LENGTH', () => {
  it('is 52 data characters plus a 6-character checksum', () => {
    expect(BECH32_DATA_LENGTH).toBe(58);
  });
});

describe('encodeBech32', () => {
  it('matches the reference encoding', () => {
    expect(encodeBech32('nsec', three())).toBe(THREE_NSEC);
  });
});

describe('hasBech32Prefix', () => {
  it('matches the prefix and separator in either case', () => {
    expect(hasBech32Prefix(THREE_NSEC, 'nsec')).toBe(true);
    expect(hasBech32Prefix(THREE_NSEC.toUpperCase(), 'nsec')).toBe(true);
    expect(hasBech32Prefix('nsec', 'nsec')).toBe(false);
    expect(hasBech32Prefix(THREE_NSEC, 'npub')).toBe(false);
  });
});

describe('decodeBech32', () => {
  it('decodes a valid string', () => {
    expect(decodeBech32(THREE_NSEC, 'nsec', 'secret key')).toEqual(three());
  });

  it('accepts an all-uppercase string', () => {
    expect(decodeBech32(THREE_NSEC.toUpperCase(), 'nsec', 'secret key')).toEqual(three());
  });

  it('rejects mixed case as a format error', () => {
    const mixed = 'nsec1' + THREE_NSEC.slice(5, 30).toUpperCase() + THREE_NSEC.slice(30);
    expect(() => decodeBech32(mixed, 'nsec', 'secret key')).toThrow(InvalidFormatError);
  });

  it('rejects the wrong prefix', () => {
    expect(() => decodeBech32(THREE_NSEC, 'npub', 'public key')).toThrow(
      'Invalid public key: expected a "npub1" prefix',
    );
  });

  it('rejects a missing separator', () => {
    expect(() => decodeBech32('nsecqqqq', 'nsec', 'secret key')).toThrow(InvalidFormatError);
  });

  it('rejects a truncated string as a format error, not a checksum error', () => {
    let caught: unknown;
    try {
      decodeBech32(THREE_NSEC.slice(0, -1), 'nsec', 'secret key');
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(InvalidFormatError);
    expect(caught).not.toBeInstanceOf(InvalidChecksumError);
  });

  it('rejects characters outside the bech32 alphabet', () => {
    const withB = THREE_NSEC.slice(0, 10) + 'b' + THREE_NSEC.slice(11);
    expect(() => decodeBech32(withB, 'nsec', 'secret key')).toThrow(
      'Invalid secret key: "b" at position 10 is not a bech32 character',
    );
  });

  it('reports a flipped checksum character as a checksum error', () => {
    const flipped = THREE_NSEC.slice(0, -1) + 'f';
    expect(() => decodeBech32(flipped, 'nsec', 'secret key')).toThrow(InvalidChecksumError);
  });

  it('reports a flipped data character as a checksum error', () => {
    const flipped = THREE_NSEC.slice(0, 10) + 'p' + THREE_NSEC.slice(11);
    expect(() => decodeBech32(flipped, 'nsec', 'secret key')).toThrow(
      'Invalid secret key: bech32 checksum mismatch',
    );
  });

  it('rejects non-zero padding bits', () => {
    const padded = 'nsec1qqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqp3fuyy7t';
    expect(() => decodeBech32(padded, 'nsec', 'secret key')).toThrow(
      'Invalid secret key: bech32 payload is not a 32-byte key',
    );
  });
});
