// ============================================================================
// @hintpack/core — Error Types
// ============================================================================

/**
 * Base error class for all hintpack errors.
 */
export class HintpackError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HintpackError';
  }
}

// ---------------------------------------------------------------------------
// Numeric Resolution Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a hint table names a tag that has no MessagePack encoding.
 */
export class UnsupportedTypeHintError extends HintpackError {
  public readonly key: string;
  public readonly tag: string;

  constructor(key: string, tag: string) {
    super(`Unsupported numeric type hint ${key}=${tag}`);
    this.name = 'UnsupportedTypeHintError';
    this.key = key;
    this.tag = tag;
  }
}

/**
 * Thrown when a number has no hint and is not a lossless 64-bit integer.
 */
export class UnsupportedNumericValueError extends HintpackError {
  public readonly value: number | bigint;

  constructor(value: number | bigint) {
    super(`Unsupported numeric value ${String(value)}`);
    this.name = 'UnsupportedNumericValueError';
    this.value = value;
  }
}

/**
 * Thrown in strict numeric mode when a hinted value does not fit its tag.
 */
export class NumericRangeError extends HintpackError {
  public readonly key: string;
  public readonly tag: string;
  public readonly value: number;

  constructor(key: string, tag: string, value: number) {
    super(`Value ${value} does not fit type hint ${key}=${tag}`);
    this.name = 'NumericRangeError';
    this.key = key;
    this.tag = tag;
    this.value = value;
  }
}

// ---------------------------------------------------------------------------
// Input Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when the walk reaches a value outside the JSON and native models.
 */
export class UnsupportedValueError extends HintpackError {
  public readonly path: string;
  public readonly reason: string;

  constructor(path: string, reason: string) {
    super(`${reason} at ${path}`);
    this.name = 'UnsupportedValueError';
    this.path = path;
    this.reason = reason;
  }
}

/**
 * Thrown when a hint table is malformed.
 */
export class HintTableError extends HintpackError {
  public readonly key?: string;

  constructor(message: string, key?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HintTableError';
    this.key = key;
  }
}

/**
 * Wraps a failure of the JSON parser.
 */
export class UpstreamParseError extends HintpackError {
  constructor(context: string, cause: unknown) {
    super(`${context}: ${describeCause(cause)}`, { cause });
    this.name = 'UpstreamParseError';
  }
}

// ---------------------------------------------------------------------------
// I/O Errors
// ---------------------------------------------------------------------------

/**
 * Wraps a failure reading or writing a stream.
 */
export class StreamIOError extends HintpackError {
  public readonly operation: 'read' | 'write';

  constructor(operation: 'read' | 'write', context: string, cause: unknown) {
    super(`${context}: ${describeCause(cause)}`, { cause });
    this.name = 'StreamIOError';
    this.operation = operation;
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
