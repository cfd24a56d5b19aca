// ============================================================================
// @hintpack/core — Public API
// ============================================================================

// Conversion
export { convert, convertJson, convertStream } from './converter.js';
export type { ByteSource } from './converter.js';
export { StructuralEncoder, encodeValue, writeLeaf } from './encoder.js';
export { classifyString, decodeStrictBase64 } from './classifier.js';
export { resolveNumber, lookupHint, narrowInteger, isTypeTag } from './resolver.js';
export type { ResolveOptions } from './resolver.js';
export { ROOT_CONTEXT, enterArray, nextPosition, withKey } from './context.js';
export type { ConversionContext } from './context.js';

// Wire format
export { MsgpackWriter, FORMAT } from './msgpack/writer.js';
export type { IntWidth } from './msgpack/writer.js';

// Identifiers
export {
  validateAddress,
  generateAddress,
  addressKind,
  encodeBase32,
  decodeBase32,
  crc16,
  ADDRESS_ALPHABET,
  ADDRESS_KINDS,
  ADDRESS_LENGTH,
} from './address.js';
export type { AddressKind } from './address.js';

// Hints & configuration
export { parseHintTable, loadHintTable } from './hints.js';
export type { ParseHintOptions } from './hints.js';
export { resolveConfig } from './config.js';
export type { ConverterConfig } from './config.js';

// Hashing
export { computeContentHash, hashDocument } from './hashing.js';

// Types
export { TYPE_TAGS } from './types.js';
export type {
  BinaryLeaf,
  ConvertOptions,
  IdentifierValidator,
  InputValue,
  JsonObject,
  JsonValue,
  NumericTypedArray,
  TypeHintTable,
  TypeTag,
  ValidationResult,
} from './types.js';

// Errors
export {
  HintpackError,
  HintTableError,
  NumericRangeError,
  StreamIOError,
  UnsupportedNumericValueError,
  UnsupportedTypeHintError,
  UnsupportedValueError,
  UpstreamParseError,
} from './errors.js';

// Logging
export * as logger from './logger.js';
export { onLog, setLogLevel, getLogLevel, levelFromEnv } from './logger.js';
export type { LogEntry, LogLevel, LogCallback } from './logger.js';
