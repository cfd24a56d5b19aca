// ============================================================================
// @hintpack/core — Document Conversion
// ============================================================================
//
// Entry points. Each call owns a fresh context and buffer; the first error
// aborts the conversion and no partial output is returned or written.
// ============================================================================

import type { Writable } from 'node:stream';
import { resolveConfig } from './config.js';
import { ROOT_CONTEXT } from './context.js';
import { StructuralEncoder } from './encoder.js';
import { StreamIOError, UpstreamParseError } from './errors.js';
import { timer } from './logger.js';
import { MsgpackWriter } from './msgpack/writer.js';
import { isWellFormed, toWellFormed } from './text.js';
import type { ConvertOptions, InputValue, TypeHintTable } from './types.js';

// Invalid UTF-8 in JSON text is replaced, not rejected.
const lenientDecoder = new TextDecoder('utf-8');

// A \uD800-\uDFFF escape, which can parse to a lone surrogate.
const SURROGATE_ESCAPE = /\\u[dD][89a-fA-F]/;

/**
 * Lone surrogates written as JSON escapes get the same U+FFFD treatment as
 * invalid bytes, in string values and in keys.
 */
function wellFormedReviver(_key: string, value: unknown): unknown {
  if (typeof value === 'string') return toWellFormed(value);
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    if (Object.keys(value).some((k) => !isWellFormed(k))) {
      return Object.fromEntries(Object.entries(value).map(([k, v]) => [toWellFormed(k), v]));
    }
  }
  return value;
}

/**
 * Convert a value tree to MessagePack.
 *
 * @example
 * ```ts
 * convert({ foo: 'beefeater' });
 * // 81 a3 66 6f 6f a9 62 65 65 66 65 61 74 65 72
 * convert([[7776000000000, 10000000000]], { '': ['int64', 'uint64'] });
 * // 91 92 d3 00 00 07 12 7d b7 c0 00 cf 00 00 00 02 54 0b e4 00
 * ```
 */
export function convert(value: InputValue, hints?: TypeHintTable, options?: ConvertOptions): Uint8Array {
  const t = timer('convert');
  const writer = new MsgpackWriter();
  new StructuralEncoder(writer, hints, resolveConfig(options)).encode(value, ROOT_CONTEXT);
  t.endWith({ bytes: writer.length });
  return writer.toUint8Array();
}

/**
 * Parse JSON text (or UTF-8 bytes) and convert it. Text that is not
 * well-formed Unicode is repaired with U+FFFD before conversion.
 *
 * @throws {UpstreamParseError} the input is not JSON
 */
export function convertJson(
  input: string | Uint8Array,
  hints?: TypeHintTable,
  options?: ConvertOptions,
): Uint8Array {
  const text = typeof input === 'string' ? input : lenientDecoder.decode(input);
  let parsed: unknown;
  try {
    parsed =
      SURROGATE_ESCAPE.test(text) || !isWellFormed(text)
        ? JSON.parse(text, wellFormedReviver)
        : JSON.parse(text);
  } catch (e) {
    throw new UpstreamParseError('parsing JSON input', e);
  }
  const t = timer('convertJson');
  const writer = new MsgpackWriter(Math.max(256, text.length));
  new StructuralEncoder(writer, hints, resolveConfig(options)).encode(parsed, ROOT_CONTEXT);
  t.endWith({ inputChars: text.length, bytes: writer.length });
  return writer.toUint8Array();
}

/**
 * Anything that yields the input in chunks, e.g. a `Readable`.
 */
export type ByteSource = AsyncIterable<Uint8Array | string>;

async function readAll(input: ByteSource): Promise<Uint8Array> {
  const chunks: Buffer[] = [];
  try {
    for await (const chunk of input) {
      chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : Buffer.from(chunk));
    }
  } catch (e) {
    throw new StreamIOError('read', 'reading input', e);
  }
  return Buffer.concat(chunks);
}

function writeAll(output: Writable, bytes: Uint8Array): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (e: Error) => {
      reject(new StreamIOError('write', 'writing output', e));
    };
    output.once('error', onError);
    output.write(bytes, (e) => {
      if (e) {
        // The stream emits 'error' after this callback; onError stays
        // attached to receive it.
        reject(new StreamIOError('write', 'writing output', e));
      } else {
        output.off('error', onError);
        resolve();
      }
    });
  });
}

/**
 * Read all of `input` as JSON, convert it, and write the MessagePack to
 * `output` in one write. JSON has no length prefix, so the whole document is
 * buffered; nothing is written if reading, parsing or encoding fails.
 */
export async function convertStream(
  input: ByteSource,
  output: Writable,
  hints?: TypeHintTable,
  options?: ConvertOptions,
): Promise<void> {
  const raw = await readAll(input);
  const encoded = convertJson(raw, hints, options);
  await writeAll(output, encoded);
}
