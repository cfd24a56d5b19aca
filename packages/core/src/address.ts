// ============================================================================
// @hintpack/core — Account Address Validator
// ============================================================================
//
// Account addresses are 48 characters of a 32-symbol alphabet with no
// look-alike glyphs, starting `nd<kind>`. Decoded, the 48 symbols are 30
// bytes: 28 payload bytes (the leading 15 bits spell the `nd<kind>` marker)
// and a big-endian CRC-16/AUG-CCITT of the payload. Every address is also syntactically valid base64, which is
// why the string classifier consults this check first.
// ============================================================================

import { createHash } from 'node:crypto';
import type { ValidationResult } from './types.js';

export const ADDRESS_ALPHABET = 'abcdefghijkmnpqrstuvwxyz23456789';
export const ADDRESS_LENGTH = 48;
export const ADDRESS_PREFIX = 'nd';

const PAYLOAD_BYTES = 28;
/** Symbols that carry at least the payload bits: 28 * 8 / 5, rounded up. */
const PAYLOAD_SYMBOLS = 45;

// ---- CRC-16 (poly 0x1021, init 0x1D0F, MSB first) ----

const CRC16_TABLE = new Uint16Array(256);
for (let i = 0; i < 256; i++) {
  let crc = i << 8;
  for (let j = 0; j < 8; j++) {
    crc = crc & 0x8000 ? ((crc << 1) ^ 0x1021) & 0xffff : (crc << 1) & 0xffff;
  }
  CRC16_TABLE[i] = crc;
}

export function crc16(data: Uint8Array): number {
  let crc = 0x1d0f;
  for (let i = 0; i < data.length; i++) {
    crc = ((crc << 8) & 0xffff) ^ CRC16_TABLE[((crc >> 8) ^ data[i]) & 0xff];
  }
  return crc;
}

/** Address kinds, keyed by their marker character. */
export const ADDRESS_KINDS = {
  a: 'user',
  n: 'network',
  e: 'endowment',
  x: 'exchange',
  b: 'bpc',
  m: 'market-maker',
} as const;

export type AddressKind = keyof typeof ADDRESS_KINDS;

function isAddressKind(c: string): c is AddressKind {
  return Object.prototype.hasOwnProperty.call(ADDRESS_KINDS, c);
}

/**
 * Base32-encode bytes with the address alphabet, most significant bit first.
 * A trailing partial symbol is zero-filled.
 */
export function encodeBase32(bytes: Uint8Array): string {
  let out = '';
  let acc = 0;
  let bits = 0;
  for (const byte of bytes) {
    acc = ((acc << 8) | byte) & 0xfff;
    bits += 8;
    while (bits >= 5) {
      bits -= 5;
      out += ADDRESS_ALPHABET[(acc >> bits) & 31];
    }
  }
  if (bits > 0) {
    out += ADDRESS_ALPHABET[(acc << (5 - bits)) & 31];
  }
  return out;
}

/**
 * Decode address-alphabet base32, most significant bit first. Trailing bits
 * that do not fill a byte are dropped. Returns undefined on a foreign symbol.
 */
export function decodeBase32(text: string): Uint8Array | undefined {
  const out: number[] = [];
  let acc = 0;
  let bits = 0;
  for (const c of text) {
    const v = ADDRESS_ALPHABET.indexOf(c);
    if (v === -1) return undefined;
    acc = ((acc << 5) | v) & 0xfff;
    bits += 5;
    if (bits >= 8) {
      bits -= 8;
      out.push((acc >> bits) & 0xff);
    }
  }
  return Uint8Array.from(out);
}

function withChecksum(payload: Uint8Array): Uint8Array {
  const crc = crc16(payload);
  const out = new Uint8Array(payload.length + 2);
  out.set(payload);
  out[payload.length] = crc >> 8;
  out[payload.length + 1] = crc & 0xff;
  return out;
}

/**
 * Check an account address: length, alphabet, prefix, kind and CRC.
 *
 * @example
 * ```ts
 * validateAddress('foo'); // { ok: false, reason: 'not a valid address length' }
 * ```
 */
export function validateAddress(candidate: string): ValidationResult {
  if (candidate.length !== ADDRESS_LENGTH) {
    return { ok: false, reason: 'not a valid address length' };
  }
  for (const c of candidate) {
    if (!ADDRESS_ALPHABET.includes(c)) {
      return { ok: false, reason: `invalid address character '${c}'` };
    }
  }
  if (!candidate.startsWith(ADDRESS_PREFIX)) {
    return { ok: false, reason: 'missing address prefix' };
  }
  if (!isAddressKind(candidate.charAt(ADDRESS_PREFIX.length))) {
    return { ok: false, reason: 'unknown address kind' };
  }
  const bytes = decodeBase32(candidate);
  if (bytes === undefined || bytes.length !== PAYLOAD_BYTES + 2) {
    return { ok: false, reason: 'not a valid address length' };
  }
  const expected = crc16(bytes.subarray(0, PAYLOAD_BYTES));
  if (((bytes[PAYLOAD_BYTES] << 8) | bytes[PAYLOAD_BYTES + 1]) !== expected) {
    return { ok: false, reason: 'address checksum mismatch' };
  }
  return { ok: true };
}

/**
 * Derive the address of a given kind for some key material.
 */
export function generateAddress(kind: AddressKind, data: Uint8Array | string): string {
  if (!isAddressKind(kind)) {
    throw new TypeError(`unknown address kind '${String(kind)}'`);
  }
  const digest = createHash('sha256').update(data).digest();
  const marked = `${ADDRESS_PREFIX}${kind}${encodeBase32(digest)}`.slice(0, PAYLOAD_SYMBOLS);
  const payload = decodeBase32(marked);
  if (payload === undefined) {
    throw new TypeError(`cannot encode address payload for kind '${kind}'`);
  }
  return encodeBase32(withChecksum(payload.subarray(0, PAYLOAD_BYTES)));
}

/**
 * The kind named by a valid address, or undefined.
 */
export function addressKind(candidate: string): (typeof ADDRESS_KINDS)[AddressKind] | undefined {
  if (!validateAddress(candidate).ok) return undefined;
  const c = candidate.charAt(ADDRESS_PREFIX.length);
  return isAddressKind(c) ? ADDRESS_KINDS[c] : undefined;
}
