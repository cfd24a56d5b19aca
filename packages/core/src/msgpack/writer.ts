// ============================================================================
// @hintpack/core — MessagePack Primitive Writer
// ============================================================================
//
// Appends MessagePack headers and scalars to a growable buffer. Integer
// writers pick the narrowest encoding within their signedness family unless
// an exact width is requested.

/** MessagePack format bytes used by the writer. */
export const FORMAT = {
  NIL: 0xc0,
  FALSE: 0xc2,
  TRUE: 0xc3,
  BIN8: 0xc4,
  BIN16: 0xc5,
  BIN32: 0xc6,
  FLOAT32: 0xca,
  FLOAT64: 0xcb,
  UINT8: 0xcc,
  UINT16: 0xcd,
  UINT32: 0xce,
  UINT64: 0xcf,
  INT8: 0xd0,
  INT16: 0xd1,
  INT32: 0xd2,
  INT64: 0xd3,
  STR8: 0xd9,
  STR16: 0xda,
  STR32: 0xdb,
  ARRAY16: 0xdc,
  ARRAY32: 0xdd,
  MAP16: 0xde,
  MAP32: 0xdf,
  FIXMAP: 0x80,
  FIXARRAY: 0x90,
  FIXSTR: 0xa0,
} as const;

/** Integer widths a fixed-width write can request. */
export type IntWidth = 8 | 16 | 32 | 64;

const sharedTextEncoder = new TextEncoder();

/** Scratch buffer for big-endian number writes. */
const scratchAB = new ArrayBuffer(8);
const scratchDV = new DataView(scratchAB);
const scratchU8 = new Uint8Array(scratchAB);

const INT8_MIN = -(2n ** 7n);
const INT16_MIN = -(2n ** 15n);
const INT32_MIN = -(2n ** 31n);
const INT8_MAX = 2n ** 7n - 1n;
const INT16_MAX = 2n ** 15n - 1n;
const INT32_MAX = 2n ** 31n - 1n;
const UINT8_MAX = 2n ** 8n - 1n;
const UINT16_MAX = 2n ** 16n - 1n;
const UINT32_MAX = 2n ** 32n - 1n;

/**
 * A growable MessagePack byte buffer.
 * Doubles capacity on overflow.
 *
 * @example
 * ```ts
 * const w = new MsgpackWriter();
 * w.appendMapHeader(1);
 * w.appendString('foo');
 * w.appendInt(255n);
 * w.toUint8Array(); // 81 a3 66 6f 6f d1 00 ff
 * ```
 */
export class MsgpackWriter {
  private buf: Uint8Array;
  private pos = 0;

  constructor(initialCapacity = 256) {
    this.buf = new Uint8Array(Math.max(1, initialCapacity));
  }

  /** Current number of bytes written. */
  get length(): number {
    return this.pos;
  }

  /** Return a trimmed copy of the written bytes. */
  toUint8Array(): Uint8Array {
    return this.buf.slice(0, this.pos);
  }

  private ensure(extra: number) {
    const needed = this.pos + extra;
    if (needed <= this.buf.length) return;
    let cap = this.buf.length;
    while (cap < needed) cap *= 2;
    const next = new Uint8Array(cap);
    next.set(this.buf.subarray(0, this.pos));
    this.buf = next;
  }

  private writeByte(b: number) {
    this.ensure(1);
    this.buf[this.pos++] = b;
  }

  private writeBytes(bytes: Uint8Array) {
    this.ensure(bytes.length);
    this.buf.set(bytes, this.pos);
    this.pos += bytes.length;
  }

  private writeScratch(prefix: number, size: number) {
    this.ensure(size + 1);
    this.buf[this.pos++] = prefix;
    for (let i = 0; i < size; i++) {
      this.buf[this.pos++] = scratchU8[i];
    }
  }

  private writeUint16(prefix: number, value: number) {
    scratchDV.setUint16(0, value, false);
    this.writeScratch(prefix, 2);
  }

  private writeUint32(prefix: number, value: number) {
    scratchDV.setUint32(0, value, false);
    this.writeScratch(prefix, 4);
  }

  // ── Scalars ──────────────────────────────────────────────────────────────

  appendNil(): void {
    this.writeByte(FORMAT.NIL);
  }

  appendBool(value: boolean): void {
    this.writeByte(value ? FORMAT.TRUE : FORMAT.FALSE);
  }

  /**
   * Append a signed integer. `value` must already lie in int64 range.
   * Without `width`, non-negative values use a positive fixint or the
   * smallest of int16/int32/int64; negative values use a negative fixint or
   * the smallest of int8..int64.
   */
  appendInt(value: bigint, width?: IntWidth): void {
    if (width !== undefined) {
      this.writeFixedInt(value, width);
      return;
    }
    if (value >= 0n) {
      if (value <= INT8_MAX) {
        this.writeByte(Number(value));
      } else if (value <= INT16_MAX) {
        this.writeFixedInt(value, 16);
      } else if (value <= INT32_MAX) {
        this.writeFixedInt(value, 32);
      } else {
        this.writeFixedInt(value, 64);
      }
      return;
    }
    if (value >= -32n) {
      this.writeByte(Number(value) & 0xff);
    } else if (value >= INT8_MIN) {
      this.writeFixedInt(value, 8);
    } else if (value >= INT16_MIN) {
      this.writeFixedInt(value, 16);
    } else if (value >= INT32_MIN) {
      this.writeFixedInt(value, 32);
    } else {
      this.writeFixedInt(value, 64);
    }
  }

  /**
   * Append an unsigned integer. `value` must already lie in uint64 range.
   * Without `width`, uses a positive fixint or the smallest of uint8..uint64.
   */
  appendUint(value: bigint, width?: IntWidth): void {
    if (width !== undefined) {
      this.writeFixedUint(value, width);
      return;
    }
    if (value <= INT8_MAX) {
      this.writeByte(Number(value));
    } else if (value <= UINT8_MAX) {
      this.writeFixedUint(value, 8);
    } else if (value <= UINT16_MAX) {
      this.writeFixedUint(value, 16);
    } else if (value <= UINT32_MAX) {
      this.writeFixedUint(value, 32);
    } else {
      this.writeFixedUint(value, 64);
    }
  }

  private writeFixedInt(value: bigint, width: IntWidth) {
    switch (width) {
      case 8:
        scratchDV.setInt8(0, Number(value));
        this.writeScratch(FORMAT.INT8, 1);
        break;
      case 16:
        scratchDV.setInt16(0, Number(value), false);
        this.writeScratch(FORMAT.INT16, 2);
        break;
      case 32:
        scratchDV.setInt32(0, Number(value), false);
        this.writeScratch(FORMAT.INT32, 4);
        break;
      case 64:
        scratchDV.setBigInt64(0, value, false);
        this.writeScratch(FORMAT.INT64, 8);
        break;
    }
  }

  private writeFixedUint(value: bigint, width: IntWidth) {
    switch (width) {
      case 8:
        scratchDV.setUint8(0, Number(value));
        this.writeScratch(FORMAT.UINT8, 1);
        break;
      case 16:
        this.writeUint16(FORMAT.UINT16, Number(value));
        break;
      case 32:
        this.writeUint32(FORMAT.UINT32, Number(value));
        break;
      case 64:
        scratchDV.setBigUint64(0, value, false);
        this.writeScratch(FORMAT.UINT64, 8);
        break;
    }
  }

  appendFloat32(value: number): void {
    scratchDV.setFloat32(0, value, false);
    this.writeScratch(FORMAT.FLOAT32, 4);
  }

  appendFloat64(value: number): void {
    scratchDV.setFloat64(0, value, false);
    this.writeScratch(FORMAT.FLOAT64, 8);
  }

  // ── Strings & Blobs ──────────────────────────────────────────────────────

  /** Append a well-formed string as UTF-8. */
  appendString(value: string): void {
    this.appendStringBytes(sharedTextEncoder.encode(value));
  }

  /** Append already-encoded string bytes under a str header. */
  appendStringBytes(bytes: Uint8Array): void {
    const n = bytes.length;
    if (n < 32) {
      this.writeByte(FORMAT.FIXSTR | n);
    } else if (n < 0x100) {
      this.writeByte(FORMAT.STR8);
      this.writeByte(n);
    } else if (n < 0x10000) {
      this.writeUint16(FORMAT.STR16, n);
    } else {
      this.writeUint32(FORMAT.STR32, n);
    }
    this.writeBytes(bytes);
  }

  appendBytes(bytes: Uint8Array): void {
    const n = bytes.length;
    if (n < 0x100) {
      this.writeByte(FORMAT.BIN8);
      this.writeByte(n);
    } else if (n < 0x10000) {
      this.writeUint16(FORMAT.BIN16, n);
    } else {
      this.writeUint32(FORMAT.BIN32, n);
    }
    this.writeBytes(bytes);
  }

  // ── Containers ───────────────────────────────────────────────────────────

  appendArrayHeader(size: number): void {
    if (size < 16) {
      this.writeByte(FORMAT.FIXARRAY | size);
    } else if (size < 0x10000) {
      this.writeUint16(FORMAT.ARRAY16, size);
    } else {
      this.writeUint32(FORMAT.ARRAY32, size);
    }
  }

  appendMapHeader(size: number): void {
    if (size < 16) {
      this.writeByte(FORMAT.FIXMAP | size);
    } else if (size < 0x10000) {
      this.writeUint16(FORMAT.MAP16, size);
    } else {
      this.writeUint32(FORMAT.MAP32, size);
    }
  }
}
