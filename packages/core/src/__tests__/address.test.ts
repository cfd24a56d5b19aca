import { describe, expect, it } from 'vitest';
import { addressKind, crc16, decodeBase32, encodeBase32, generateAddress, validateAddress } from '../address.js';
import { decodeStrictBase64 } from '../classifier.js';

function replaceAt(s: string, index: number, c: string): string {
  return s.slice(0, index) + c + s.slice(index + 1);
}

function otherSymbol(c: string): string {
  return c === 'a' ? 'b' : 'a';
}

describe('encodeBase32', () => {
  it('maps 5-bit groups to the address alphabet', () => {
    expect(encodeBase32(new Uint8Array(5))).toBe('aaaaaaaa');
    expect(encodeBase32(Uint8Array.from([0xff]))).toBe('96');
  });
});

describe('decodeBase32', () => {
  it('inverts encodeBase32 on whole symbols', () => {
    expect(decodeBase32('aaaaaaaa')).toEqual(new Uint8Array(5));
    expect(decodeBase32('96')).toEqual(Uint8Array.from([0xff]));
  });

  it('rejects symbols outside the alphabet', () => {
    expect(decodeBase32('a1')).toBeUndefined();
  });
});

describe('crc16', () => {
  it('matches the AUG-CCITT check value', () => {
    expect(crc16(new TextEncoder().encode('123456789'))).toBe(0xe5cc);
  });
});

describe('generateAddress', () => {
  it('derives a known address', () => {
    expect(generateAddress('a', 'test-key')).toBe('ndankz2qbdyj8z27kbr22qqvtgducfy3qm7i27ggvw8maq8f');
    expect(generateAddress('e', 'treasury')).toBe('nden57j9hjts466cqvgyacr3c7x8n432vrmc6nze3wjm95gs');
  });

  it('ends in the CRC of its 28-byte payload', () => {
    const bytes = decodeBase32(generateAddress('m', 'desk-1'));
    expect(bytes).toHaveLength(30);
    if (bytes === undefined) return;
    expect((bytes[28] << 8) | bytes[29]).toBe(crc16(bytes.subarray(0, 28)));
  });

  it('produces a valid address of the requested kind', () => {
    const address = generateAddress('a', 'test-key');
    expect(address).toHaveLength(48);
    expect(address.startsWith('nda')).toBe(true);
    expect(validateAddress(address)).toEqual({ ok: true });
  });

  it('is deterministic', () => {
    expect(generateAddress('x', 'k')).toBe(generateAddress('x', 'k'));
    expect(generateAddress('x', 'k')).not.toBe(generateAddress('x', 'j'));
  });

  it('always yields syntactically valid base64', () => {
    for (const kind of ['a', 'n', 'e', 'x', 'b', 'm'] as const) {
      expect(decodeStrictBase64(generateAddress(kind, `seed-${kind}`))).toBeDefined();
    }
  });
});

describe('validateAddress', () => {
  const address = generateAddress('n', 'test-key');

  it('accepts addresses of every kind', () => {
    for (const known of [
      'ndxnkz2qbdyj8z27kbr22qqvtgducfy3qm7i27ggvw8mapx5',
      'ndnnkz2qbdyj8z27kbr22qqvtgducfy3qm7i27ggvw8mbxxw',
      'ndm5yp2k2zv96g7h5yict8rnfd5nx6jmg5zs2kcedqern3w3',
      'ndbaqatxgt6thy85xc4t47n6nz6mjr9zu9te4ycy6twfnbqv',
    ]) {
      expect(validateAddress(known)).toEqual({ ok: true });
    }
  });

  it('rejects the wrong length', () => {
    expect(validateAddress(address.slice(1))).toEqual({ ok: false, reason: 'not a valid address length' });
  });

  it('rejects characters outside the alphabet', () => {
    expect(validateAddress(replaceAt(address, 20, 'l'))).toEqual({
      ok: false,
      reason: "invalid address character 'l'",
    });
  });

  it('rejects a missing prefix', () => {
    expect(validateAddress(`ab${address.slice(2)}`)).toEqual({ ok: false, reason: 'missing address prefix' });
  });

  it('rejects an unknown kind', () => {
    expect(validateAddress(replaceAt(address, 2, 'z'))).toEqual({ ok: false, reason: 'unknown address kind' });
  });

  it('rejects a corrupted checksum', () => {
    expect(validateAddress(replaceAt(address, 47, otherSymbol(address[47])))).toEqual({
      ok: false,
      reason: 'address checksum mismatch',
    });
  });

  it('rejects a corrupted body', () => {
    expect(validateAddress(replaceAt(address, 10, otherSymbol(address[10])))).toEqual({
      ok: false,
      reason: 'address checksum mismatch',
    });
  });
});

describe('addressKind', () => {
  it('names the kind of a valid address', () => {
    expect(addressKind(generateAddress('x', 'k'))).toBe('exchange');
  });

  it('returns undefined for invalid input', () => {
    expect(addressKind('foo')).toBeUndefined();
  });
});
