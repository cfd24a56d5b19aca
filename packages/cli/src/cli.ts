// ============================================================================
// @hintpack/cli — JSON to MessagePack from the command line
// ============================================================================
// Commands:
//   hintpack convert [file|-] [--hints h.json] [--out f] [--hex]  → MessagePack
//   hintpack hash    [file|-] [--hints h.json]                    → sha256 hex
//   hintpack address validate <address>                           → kind or reason
//   hintpack address generate <kind> <text>                       → new address
// ============================================================================

import { createReadStream, createWriteStream } from 'node:fs';
import { Writable } from 'node:stream';
import { finished } from 'node:stream/promises';
import {
  ADDRESS_KINDS,
  type AddressKind,
  type ByteSource,
  type ConvertOptions,
  type TypeHintTable,
  addressKind,
  computeContentHash,
  convertStream,
  generateAddress,
  loadHintTable,
  validateAddress,
} from '@hintpack/core';

export interface CliIO {
  stdin: ByteSource;
  stdout: Writable;
  stderr: Writable;
}

/** Flags that take a value; their value is never a positional argument. */
const VALUE_FLAGS = new Set(['hints', 'out']);

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function getFlag(args: readonly string[], name: string): string | undefined {
  const idx = args.indexOf(`--${name}`);
  if (idx !== -1 && idx + 1 < args.length) return args[idx + 1];
  return undefined;
}

function hasFlag(args: readonly string[], name: string): boolean {
  return args.includes(`--${name}`);
}

function positionals(args: readonly string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      if (VALUE_FLAGS.has(arg.slice(2))) i++;
      continue;
    }
    out.push(arg);
  }
  return out;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

function emit(stream: Writable, data: Uint8Array | string): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.write(data, (e) => (e ? reject(e) : resolve()));
  });
}

function isAddressKind(kind: string): kind is AddressKind {
  return Object.hasOwn(ADDRESS_KINDS, kind);
}

const USAGE = `
  Usage:
    hintpack convert [file|-] [--hints hints.json] [--out file] [--hex] [--strict] [--fixed-width]
                                        Convert JSON to MessagePack
    hintpack hash    [file|-] [--hints hints.json]
                                        SHA-256 of the MessagePack output
    hintpack address validate <address> Check an account address
    hintpack address generate <kind> <text>
                                        Derive an address (kinds: ${Object.keys(ADDRESS_KINDS).join(', ')})

  Environment Variables:
    HINTPACK_DEBUG=1            Log conversion timings to stderr
    HINTPACK_STRICT_NUMERIC=1   Same as --strict
    HINTPACK_FIXED_WIDTH=1      Same as --fixed-width
`;

function openInput(source: string | undefined, io: CliIO): ByteSource {
  return source === undefined || source === '-' ? io.stdin : createReadStream(source);
}

/** Keeps what `convertStream` writes, for output that needs the whole buffer. */
class ByteCollector extends Writable {
  private readonly chunks: Buffer[] = [];

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(chunk);
    callback();
  }

  get bytes(): Buffer {
    return Buffer.concat(this.chunks);
  }
}

function readHints(args: readonly string[]): TypeHintTable | undefined {
  const file = getFlag(args, 'hints');
  return file === undefined ? undefined : loadHintTable(file);
}

function readOptions(args: readonly string[]): ConvertOptions {
  // Absent flags stay undefined so the environment switches still apply.
  return {
    strictNumeric: hasFlag(args, 'strict') ? true : undefined,
    fixedWidthIntegers: hasFlag(args, 'fixed-width') ? true : undefined,
  };
}

// ============================================================================
// convert
// ============================================================================
async function writeConverted(args: readonly string[], io: CliIO, target: Writable): Promise<void> {
  const [source] = positionals(args);
  const hints = readHints(args);
  const input = openInput(source, io);
  if (hasFlag(args, 'hex')) {
    const collector = new ByteCollector();
    await convertStream(input, collector, hints, readOptions(args));
    await emit(target, `${collector.bytes.toString('hex')}\n`);
  } else {
    await convertStream(input, target, hints, readOptions(args));
  }
}

async function convertCommand(args: readonly string[], io: CliIO): Promise<void> {
  const outPath = getFlag(args, 'out');
  if (outPath === undefined) {
    await writeConverted(args, io, io.stdout);
    return;
  }

  const file = createWriteStream(outPath);
  // An open failure can fire before the first write; finished() holds it.
  const done = finished(file);
  let failure: unknown;
  try {
    await writeConverted(args, io, file);
  } catch (e) {
    failure = e;
  }
  file.end();
  const [closed] = await Promise.allSettled([done]);
  if (failure !== undefined) throw failure;
  if (closed.status === 'rejected') throw closed.reason;
}

// ============================================================================
// hash
// ============================================================================
async function hashCommand(args: readonly string[], io: CliIO): Promise<void> {
  const [source] = positionals(args);
  const hints = readHints(args);
  const collector = new ByteCollector();
  await convertStream(openInput(source, io), collector, hints, readOptions(args));
  await emit(io.stdout, `${computeContentHash(collector.bytes)}\n`);
}

// ============================================================================
// address
// ============================================================================
async function addressCommand(args: readonly string[], io: CliIO): Promise<number> {
  const [action, ...rest] = positionals(args);
  switch (action) {
    case 'validate': {
      const [candidate] = rest;
      if (candidate === undefined) throw new UsageError('missing address');
      const result = validateAddress(candidate);
      if (!result.ok) {
        await emit(io.stderr, `invalid: ${result.reason}\n`);
        return 1;
      }
      await emit(io.stdout, `valid ${addressKind(candidate) ?? 'address'}\n`);
      return 0;
    }
    case 'generate': {
      const [kind, text] = rest;
      if (kind === undefined || text === undefined) throw new UsageError('missing kind or text');
      if (!isAddressKind(kind)) throw new UsageError(`unknown address kind "${kind}"`);
      await emit(io.stdout, `${generateAddress(kind, text)}\n`);
      return 0;
    }
    default:
      throw new UsageError(`unknown address action "${action ?? ''}"`);
  }
}

/**
 * Run one command and resolve to the process exit code.
 *
 * Errors never escape: they are reported on `io.stderr` as `Error: <message>`.
 */
export async function run(argv: readonly string[], io: CliIO): Promise<number> {
  const [command, ...args] = argv;
  try {
    switch (command) {
      case 'convert':
        await convertCommand(args, io);
        return 0;
      case 'hash':
        await hashCommand(args, io);
        return 0;
      case 'address':
        return await addressCommand(args, io);
      case undefined:
      case 'help':
      case '--help':
        await emit(io.stdout, USAGE);
        return 0;
      default:
        await emit(io.stderr, USAGE);
        return 1;
    }
  } catch (error) {
    const usage = error instanceof UsageError ? USAGE : '';
    await emit(io.stderr, `Error: ${errorMessage(error)}\n${usage}`);
    return 1;
  }
}
