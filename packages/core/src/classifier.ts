// ============================================================================
// @hintpack/core — String Classifier
// ============================================================================
//
// JSON has no byte-string type, so every string leaf is either kept as a
// MessagePack str or turned into a bin. First match wins:
//
//   1. not valid UTF-8              → bin of the raw bytes
//   2. recognized identifier        → str
//   3. standard, padded base64      → bin of the decoded bytes
//   4. anything else                → str
// ============================================================================

import { validateAddress } from './address.js';
import { decodeUtf8Strict, isWellFormed, toWtf8 } from './text.js';
import type { BinaryLeaf, IdentifierValidator } from './types.js';

const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Decode standard, padded base64. Returns undefined unless re-encoding the
 * result reproduces `s` exactly, which rules out non-zero padding bits.
 *
 * @example
 * ```ts
 * decodeStrictBase64('DwA=');  // Uint8Array [0x0f, 0x00]
 * decodeStrictBase64('DwA');   // undefined (unpadded)
 * decodeStrictBase64('-_8=');  // undefined (URL-safe alphabet)
 * ```
 */
export function decodeStrictBase64(s: string): Uint8Array | undefined {
  if (s.length % 4 !== 0 || !BASE64.test(s)) return undefined;
  const decoded = Buffer.from(s, 'base64');
  if (decoded.toString('base64') !== s) return undefined;
  return Uint8Array.from(decoded);
}

/**
 * Choose the MessagePack encoding for a string leaf.
 *
 * A `Uint8Array` source only arrives on the native path; it is emitted as-is
 * when it is not valid UTF-8 and otherwise classified as its decoded text.
 */
export function classifyString(
  source: string | Uint8Array,
  validator: IdentifierValidator = validateAddress,
): BinaryLeaf {
  let s: string;
  if (typeof source === 'string') {
    if (!isWellFormed(source)) {
      return { kind: 'bin', bytes: toWtf8(source) };
    }
    s = source;
  } else {
    const decoded = decodeUtf8Strict(source);
    if (decoded === undefined) {
      return { kind: 'bin', bytes: Uint8Array.from(source) };
    }
    s = decoded;
  }

  if (validator(s).ok) {
    return { kind: 'str', text: s };
  }

  const bytes = decodeStrictBase64(s);
  if (bytes !== undefined) {
    return { kind: 'bin', bytes };
  }

  return { kind: 'str', text: s };
}
