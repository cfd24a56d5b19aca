// ============================================================================
// @hintpack/core — Type Definitions
// ============================================================================
//
// Shared shapes for the conversion pipeline: the JSON value tree, the
// native values accepted on the fallback path, hint tables and the leaf
// kinds the classifiers hand to the writer.
// ============================================================================

import type { IntWidth } from './msgpack/writer.js';

/** A parsed JSON document. Numbers are doubles. */
export type JsonValue = null | boolean | number | string | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Numeric typed arrays accepted on the native path. `Uint8Array` is left
 * out: it is treated as a byte string.
 */
export type NumericTypedArray =
  | Int8Array
  | Int16Array
  | Int32Array
  | Uint8ClampedArray
  | Uint16Array
  | Uint32Array
  | Float32Array
  | Float64Array
  | BigInt64Array
  | BigUint64Array;

/**
 * Anything `convert` accepts. Values outside `JsonValue` never come from the
 * JSON parser and are encoded without hints or heuristics beyond the byte
 * string check.
 */
export type InputValue =
  | JsonValue
  | undefined
  | bigint
  | Uint8Array
  | NumericTypedArray
  | Map<string, InputValue>
  | InputValue[]
  | { [key: string]: InputValue };

/** Numeric type tags a hint table may name. */
export const TYPE_TAGS = [
  'byte',
  'int8',
  'int16',
  'int32',
  'int64',
  'int',
  'uint8',
  'uint16',
  'uint32',
  'uint64',
  'uint',
  'float32',
  'float64',
] as const;

export type TypeTag = (typeof TYPE_TAGS)[number];

/**
 * Hint key (field name, or `""` for unnamed positions) → tags read
 * cyclically by array position.
 *
 * @example
 * ```ts
 * const hints: TypeHintTable = { Fee: ['int64'], '': ['int64', 'uint64'] };
 * ```
 */
export type TypeHintTable = Readonly<Record<string, readonly string[]>>;

/**
 * The encoding chosen for one leaf.
 */
export type BinaryLeaf =
  | { kind: 'str'; text: string }
  | { kind: 'bin'; bytes: Uint8Array }
  | { kind: 'int'; value: bigint; width?: IntWidth }
  | { kind: 'uint'; value: bigint; width?: IntWidth }
  | { kind: 'float32'; value: number }
  | { kind: 'float64'; value: number };

/** Outcome of an identifier check. */
export type ValidationResult = { ok: true } | { ok: false; reason: string };

/**
 * Recognizes strings that must stay strings even when they also decode as
 * base64.
 */
export type IdentifierValidator = (candidate: string) => ValidationResult;

/**
 * Per-call conversion options.
 */
export interface ConvertOptions {
  /** Identifier check used before the base64 heuristic. */
  validator?: IdentifierValidator;
  /** Reject hinted values that do not fit their tag instead of narrowing. */
  strictNumeric?: boolean;
  /** Encode hinted integers at exactly their tag's width. */
  fixedWidthIntegers?: boolean;
}
