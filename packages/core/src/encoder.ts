// ============================================================================
// @hintpack/core — Structural Encoder
// ============================================================================
//
// Recursive walk from a value tree to MessagePack. JSON values go through
// the string classifier and the numeric resolver; values that can only come
// from in-memory callers (bigint, typed arrays, Map, boxed primitives) take
// a native branch that uses no hints.
//
// Object keys are emitted in byte-lexicographic order of their UTF-8 form,
// so output never depends on insertion order.
// ============================================================================

import { classifyString } from './classifier.js';
import { type ConverterConfig, resolveConfig } from './config.js';
import { type ConversionContext, enterArray, nextPosition, withKey } from './context.js';
import { UnsupportedNumericValueError, UnsupportedValueError } from './errors.js';
import { MsgpackWriter } from './msgpack/writer.js';
import { resolveNumber } from './resolver.js';
import { compareBytes, toWtf8 } from './text.js';
import type { BinaryLeaf, ConvertOptions, NumericTypedArray, TypeHintTable } from './types.js';

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;
const UINT64_MAX = 2n ** 64n - 1n;

/**
 * Append a classified leaf to the writer.
 */
export function writeLeaf(writer: MsgpackWriter, leaf: BinaryLeaf): void {
  switch (leaf.kind) {
    case 'str':
      writer.appendString(leaf.text);
      break;
    case 'bin':
      writer.appendBytes(leaf.bytes);
      break;
    case 'int':
      writer.appendInt(leaf.value, leaf.width);
      break;
    case 'uint':
      writer.appendUint(leaf.value, leaf.width);
      break;
    case 'float32':
      writer.appendFloat32(leaf.value);
      break;
    case 'float64':
      writer.appendFloat64(leaf.value);
      break;
  }
}

function isNumericTypedArray(value: object): value is NumericTypedArray {
  return (
    value instanceof Int8Array ||
    value instanceof Int16Array ||
    value instanceof Int32Array ||
    value instanceof Uint8ClampedArray ||
    value instanceof Uint16Array ||
    value instanceof Uint32Array ||
    value instanceof Float32Array ||
    value instanceof Float64Array ||
    value instanceof BigInt64Array ||
    value instanceof BigUint64Array
  );
}

function isPlainObject(value: object): boolean {
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function describe(value: unknown): string {
  if (typeof value !== 'object' || value === null) return typeof value;
  return value.constructor?.name ?? 'object';
}

/**
 * Walks one document into a writer. Not reusable across documents: it keeps
 * the set of containers currently open to detect cycles.
 */
export class StructuralEncoder {
  private readonly open = new WeakSet<object>();

  constructor(
    private readonly writer: MsgpackWriter,
    private readonly hints: TypeHintTable | undefined,
    private readonly config: ConverterConfig,
  ) {}

  /**
   * Encode `value` and return the context that follows it.
   */
  encode(value: unknown, ctx: ConversionContext, path = '$'): ConversionContext {
    if (value === null || value === undefined) {
      this.writer.appendNil();
      return ctx;
    }

    switch (typeof value) {
      case 'boolean':
        this.writer.appendBool(value);
        return ctx;
      case 'number':
        writeLeaf(this.writer, resolveNumber(value, ctx, this.hints, this.config));
        return ctx;
      case 'string':
        writeLeaf(this.writer, classifyString(value, this.config.validator));
        return ctx;
      case 'bigint':
        this.encodeBigInt(value);
        return ctx;
      case 'object':
        return this.encodeObjectLike(value, ctx, path);
      default:
        throw new UnsupportedValueError(path, `${typeof value} is not supported`);
    }
  }

  private encodeObjectLike(value: object, ctx: ConversionContext, path: string): ConversionContext {
    if (value instanceof Number || value instanceof String || value instanceof Boolean) {
      return this.encode(value.valueOf(), ctx, path);
    }
    if (value instanceof Uint8Array) {
      writeLeaf(this.writer, classifyString(value, this.config.validator));
      return ctx;
    }
    if (isNumericTypedArray(value)) {
      this.encodeTypedArray(value);
      return ctx;
    }

    if (this.open.has(value)) {
      throw new UnsupportedValueError(path, 'circular reference');
    }
    this.open.add(value);
    try {
      if (Array.isArray(value)) {
        return this.encodeArray(value, ctx, path);
      }
      if (value instanceof Map) {
        const entries: [string, unknown][] = [];
        for (const [key, entry] of value) {
          if (typeof key !== 'string') {
            throw new UnsupportedValueError(path, `Map key of type ${typeof key} is not supported`);
          }
          entries.push([key, entry]);
        }
        return this.encodeEntries(entries, ctx, path);
      }
      if (isPlainObject(value)) {
        const entries: [string, unknown][] = Object.entries(value);
        return this.encodeEntries(entries, ctx, path);
      }
      throw new UnsupportedValueError(path, `${describe(value)} is not supported`);
    } finally {
      this.open.delete(value);
    }
  }

  private encodeArray(items: unknown[], ctx: ConversionContext, path: string): ConversionContext {
    this.writer.appendArrayHeader(items.length);
    let next = enterArray(ctx);
    for (let i = 0; i < items.length; i++) {
      next = nextPosition(this.encode(items[i], next, `${path}[${i}]`));
    }
    return next;
  }

  private encodeEntries(entries: [string, unknown][], ctx: ConversionContext, path: string): ConversionContext {
    const sorted = entries
      .map(([key, entry]) => ({ key, bytes: toWtf8(key), entry }))
      .sort((a, b) => compareBytes(a.bytes, b.bytes));

    this.writer.appendMapHeader(sorted.length);
    let next = ctx;
    for (const { key, bytes, entry } of sorted) {
      this.writer.appendStringBytes(bytes);
      next = this.encode(entry, withKey(next, key), `${path}.${key}`);
    }
    return next;
  }

  private encodeBigInt(value: bigint): void {
    if (value >= INT64_MIN && value <= INT64_MAX) {
      this.writer.appendInt(value);
    } else if (value > INT64_MAX && value <= UINT64_MAX) {
      this.writer.appendUint(value);
    } else {
      throw new UnsupportedNumericValueError(value);
    }
  }

  private encodeTypedArray(view: NumericTypedArray): void {
    this.writer.appendArrayHeader(view.length);
    if (view instanceof Float32Array) {
      for (const v of view) this.writer.appendFloat32(v);
    } else if (view instanceof Float64Array) {
      for (const v of view) this.writer.appendFloat64(v);
    } else if (view instanceof BigInt64Array) {
      for (const v of view) this.writer.appendInt(v);
    } else if (view instanceof BigUint64Array) {
      for (const v of view) this.writer.appendUint(v);
    } else if (view instanceof Int8Array || view instanceof Int16Array || view instanceof Int32Array) {
      for (const v of view) this.writer.appendInt(BigInt(v));
    } else {
      for (const v of view) this.writer.appendUint(BigInt(v));
    }
  }
}

/**
 * Encode one value into `writer`, starting from `ctx`.
 *
 * @returns The context after the value, for callers stitching several
 *   values into one stream.
 */
export function encodeValue(
  value: unknown,
  ctx: ConversionContext,
  hints: TypeHintTable | undefined,
  writer: MsgpackWriter,
  options: ConvertOptions = {},
): ConversionContext {
  return new StructuralEncoder(writer, hints, resolveConfig(options)).encode(value, ctx);
}
