// ============================================================================
// @hintpack/core — Numeric Resolver
// ============================================================================
//
// JSON numbers are doubles. A hint table says which MessagePack number type
// a field (or an unnamed array position) should become; without one, only
// values that are exactly a 64-bit signed integer are accepted.
// ============================================================================

import type { ConversionContext } from './context.js';
import { NumericRangeError, UnsupportedNumericValueError, UnsupportedTypeHintError } from './errors.js';
import type { IntWidth } from './msgpack/writer.js';
import type { BinaryLeaf, TypeHintTable, TypeTag } from './types.js';

type TagSpec =
  | { kind: 'int' | 'uint'; width: IntWidth }
  | { kind: 'float32' | 'float64' };

const TAG_SPECS: Record<TypeTag, TagSpec> = {
  byte: { kind: 'uint', width: 8 },
  int8: { kind: 'int', width: 8 },
  int16: { kind: 'int', width: 16 },
  int32: { kind: 'int', width: 32 },
  int64: { kind: 'int', width: 64 },
  int: { kind: 'int', width: 64 },
  uint8: { kind: 'uint', width: 8 },
  uint16: { kind: 'uint', width: 16 },
  uint32: { kind: 'uint', width: 32 },
  uint64: { kind: 'uint', width: 64 },
  uint: { kind: 'uint', width: 64 },
  float32: { kind: 'float32' },
  float64: { kind: 'float64' },
};

const INT64_MIN = -(2 ** 63);
const INT64_LIMIT = 2 ** 63;

export interface ResolveOptions {
  strictNumeric?: boolean;
  fixedWidthIntegers?: boolean;
}

export function isTypeTag(tag: string): tag is TypeTag {
  return Object.prototype.hasOwnProperty.call(TAG_SPECS, tag);
}

/**
 * The tag governing the current leaf, if the table has one for its key.
 */
export function lookupHint(ctx: ConversionContext, hints: TypeHintTable | undefined): string | undefined {
  if (!hints || !Object.prototype.hasOwnProperty.call(hints, ctx.currentKey)) return undefined;
  const sequence = hints[ctx.currentKey];
  if (sequence.length === 0) return undefined;
  return sequence[ctx.currentHint % sequence.length];
}

/**
 * Narrow a double to a fixed-width integer the way a cast would: truncate
 * toward zero, then wrap modulo 2^width. Non-finite values become 0.
 */
export function narrowInteger(value: number, kind: 'int' | 'uint', width: IntWidth): bigint {
  if (!Number.isFinite(value)) return 0n;
  const truncated = BigInt(Math.trunc(value));
  return kind === 'int' ? BigInt.asIntN(width, truncated) : BigInt.asUintN(width, truncated);
}

function fits(value: number, kind: 'int' | 'uint', width: IntWidth): boolean {
  if (!Number.isInteger(value)) return false;
  const v = BigInt(value);
  return kind === 'int' ? BigInt.asIntN(width, v) === v : BigInt.asUintN(width, v) === v;
}

/**
 * Resolve a numeric leaf to its MessagePack number type.
 *
 * @throws {UnsupportedTypeHintError} the hint names an unknown tag
 * @throws {UnsupportedNumericValueError} no hint, and not an exact int64
 * @throws {NumericRangeError} strict mode, and the value does not fit its tag
 */
export function resolveNumber(
  value: number,
  ctx: ConversionContext,
  hints?: TypeHintTable,
  options: ResolveOptions = {},
): BinaryLeaf {
  const tag = lookupHint(ctx, hints);

  if (tag !== undefined) {
    if (!isTypeTag(tag)) {
      throw new UnsupportedTypeHintError(ctx.currentKey, tag);
    }
    const spec = TAG_SPECS[tag];
    switch (spec.kind) {
      case 'float32': {
        const narrowed = Math.fround(value);
        if (options.strictNumeric && Number.isFinite(value) && !Number.isFinite(narrowed)) {
          throw new NumericRangeError(ctx.currentKey, tag, value);
        }
        return { kind: 'float32', value: narrowed };
      }
      case 'float64':
        return { kind: 'float64', value };
      case 'int':
      case 'uint': {
        if (options.strictNumeric && !fits(value, spec.kind, spec.width)) {
          throw new NumericRangeError(ctx.currentKey, tag, value);
        }
        const narrowed = narrowInteger(value, spec.kind, spec.width);
        return options.fixedWidthIntegers
          ? { kind: spec.kind, value: narrowed, width: spec.width }
          : { kind: spec.kind, value: narrowed };
      }
    }
  }

  // Without a hint, fractional values are refused rather than written as
  // floats, so repeated fields never come out with mixed encodings.
  if (Number.isInteger(value) && value >= INT64_MIN && value < INT64_LIMIT) {
    return { kind: 'int', value: BigInt(value) };
  }
  throw new UnsupportedNumericValueError(value);
}
