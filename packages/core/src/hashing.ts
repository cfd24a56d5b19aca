// ============================================================================
// @hintpack/core — Content Hashing
// ============================================================================
//
// Conversion is deterministic (sorted keys, fixed leaf rules), so the hash
// of the MessagePack output identifies the logical document regardless of
// the key order it was written in.
// ============================================================================

import { createHash } from 'node:crypto';
import { convert } from './converter.js';
import type { ConvertOptions, InputValue, TypeHintTable } from './types.js';

/**
 * Hex-encoded SHA-256 of encoded bytes.
 */
export function computeContentHash(data: Uint8Array): string {
  const hash = createHash('sha256');
  hash.update(data);
  return hash.digest('hex');
}

/**
 * Convert a value and hash the result.
 *
 * @example
 * ```ts
 * hashDocument({ a: 1, b: 2 }) === hashDocument({ b: 2, a: 1 }); // true
 * ```
 */
export function hashDocument(value: InputValue, hints?: TypeHintTable, options?: ConvertOptions): string {
  return computeContentHash(convert(value, hints, options));
}
