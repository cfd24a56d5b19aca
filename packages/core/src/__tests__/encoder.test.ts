import { describe, expect, it } from 'vitest';
import { ROOT_CONTEXT } from '../context.js';
import { convert } from '../converter.js';
import { encodeValue } from '../encoder.js';
import { UnsupportedNumericValueError, UnsupportedTypeHintError, UnsupportedValueError } from '../errors.js';
import { MsgpackWriter } from '../msgpack/writer.js';
import { hex, toHex } from './helpers.js';

function encodeUnknown(value: unknown): string {
  const writer = new MsgpackWriter();
  encodeValue(value, ROOT_CONTEXT, undefined, writer);
  return toHex(writer.toUint8Array());
}

describe('StructuralEncoder', () => {
  describe('scalars', () => {
    it('encodes null and booleans', () => {
      expect(toHex(convert(null))).toBe('c0');
      expect(toHex(convert(true))).toBe('c3');
      expect(toHex(convert(false))).toBe('c2');
    });

    it('encodes strings through the classifier', () => {
      expect(toHex(convert('foo'))).toBe(hex('A3 66 6F 6F'));
      expect(toHex(convert('DwA='))).toBe(hex('C4 02 0F 00'));
      expect(toHex(convert('oACI'))).toBe(hex('c4 03 a0 00 88'));
    });

    it('encodes integers without hints as int64', () => {
      expect(toHex(convert(255))).toBe(hex('d1 00 ff'));
      expect(toHex(convert(30000000))).toBe(hex('d2 01 c9 c3 80'));
      expect(toHex(convert(172800000000))).toBe(hex('d3 00 00 00 28 3b ae c0 00'));
    });
  });

  describe('objects', () => {
    it('encodes a one-entry map', () => {
      expect(toHex(convert({ foo: 'beefeater' }))).toBe(
        hex('81 A3 66 6F 6F A9 62 65 65 66 65 61 74 65 72'),
      );
    });

    it('decodes base64 values inside maps', () => {
      expect(toHex(convert({ foo: 'vu/q3qo=' }))).toBe(hex('81 a3 66 6f 6f c4 05 be ef ea de aa'));
    });

    it('sorts keys byte-lexicographically', () => {
      expect(toHex(convert({ b: 1, a: 2, B: 3 }))).toBe(hex('83 a1 42 03 a1 61 02 a1 62 01'));
    });

    it('orders keys by UTF-8 bytes rather than UTF-16 units', () => {
      // U+FF5E is ef bd 9e in UTF-8; U+1F600 is f0 9f 98 80.
      expect(toHex(convert({ '\u{1F600}': 1, '～': 2 }))).toBe(
        hex('82 a3 ef bd 9e 02 a4 f0 9f 98 80 01'),
      );
    });

    it('is independent of insertion order', () => {
      const a = convert({ x: [1, 2], y: { p: 'q', r: null }, z: true });
      const b = convert({ z: true, y: { r: null, p: 'q' }, x: [1, 2] });
      expect(toHex(a)).toBe(toHex(b));
    });

    it('encodes nested empty containers', () => {
      expect(toHex(convert({ x: {} }))).toBe(hex('81 a1 78 80'));
      expect(toHex(convert([]))).toBe('90');
    });

    it('encodes a list of records', () => {
      expect(toHex(convert([{ Fee: 4000000, To: null }]))).toBe(
        hex('91 82 a3 46 65 65 d2 00 3d 09 00 a2 54 6f c0'),
      );
    });
  });

  describe('positional hints', () => {
    it('cycles tags across an unnamed inner array', () => {
      const out = convert([[7776000000000, 10000000000]], { '': ['int64', 'uint64'] });
      expect(toHex(out)).toBe(hex('91 92 d3 00 00 07 12 7d b7 c0 00 cf 00 00 00 02 54 0b e4 00'));
    });

    it('restarts the position in every inner array', () => {
      const out = convert(
        [
          [2 ** 40, 2 ** 33],
          [2 ** 40, 2 ** 33],
        ],
        { '': ['int64', 'uint64'] },
      );
      const row = '92 d3 00 00 01 00 00 00 00 00 cf 00 00 00 02 00 00 00 00';
      expect(toHex(out)).toBe(hex(`92 ${row} ${row}`));
    });

    it('continues an outer array from where the inner array left off', () => {
      // The inner array leaves the shared position at 1; the outer array bumps
      // it to 2, so its second element reads tag 0 again.
      const out = convert([[200], 200], { '': ['int64', 'uint64'] });
      expect(toHex(out)).toBe(hex('92 91 d1 00 c8 d1 00 c8'));
    });

    it('keeps the last key seen after leaving an object', () => {
      const out = convert([{ Fee: 1 }, 200], { Fee: ['uint64'], '': ['int64'] });
      expect(toHex(out)).toBe(hex('92 81 a3 46 65 65 01 cc c8'));
    });

    it('uses exact widths in fixed-width mode', () => {
      const out = convert({ n: 1 }, { n: ['uint32'] }, { fixedWidthIntegers: true });
      expect(toHex(out)).toBe(hex('81 a1 6e ce 00 00 00 01'));
    });
  });

  describe('errors', () => {
    it('aborts on a fractional value', () => {
      expect(() => convert({ a: [1, 1.5] })).toThrow(UnsupportedNumericValueError);
    });

    it('aborts on an unknown tag', () => {
      expect(() => convert({ x: 1 }, { x: ['decimal'] })).toThrow(UnsupportedTypeHintError);
    });

    it('does not touch unknown tags that are never used', () => {
      expect(toHex(convert({ x: 'a' }, { x: ['decimal'] }))).toBe(hex('81 a1 78 a1 61'));
    });
  });

  describe('native values', () => {
    it('encodes bigint by range', () => {
      expect(toHex(convert(255n))).toBe(hex('d1 00 ff'));
      expect(toHex(convert(2n ** 63n))).toBe(hex('cf 80 00 00 00 00 00 00 00'));
      expect(() => convert(2n ** 64n)).toThrow(UnsupportedNumericValueError);
    });

    it('encodes byte arrays as blobs or strings', () => {
      expect(toHex(convert(Uint8Array.from([0xff, 0x00])))).toBe(hex('c4 02 ff 00'));
      expect(toHex(convert(Buffer.from('foo')))).toBe(hex('a3 66 6f 6f'));
    });

    it('encodes numeric typed arrays element by element', () => {
      expect(toHex(convert(Int32Array.from([1, 2, 3, 4])))).toBe(hex('94 01 02 03 04'));
      expect(toHex(convert(Uint32Array.from([255])))).toBe(hex('91 cc ff'));
      expect(toHex(convert(Float32Array.from([1.5])))).toBe(hex('91 ca 3f c0 00 00'));
      expect(toHex(convert(BigInt64Array.from([-1n])))).toBe(hex('91 ff'));
      expect(toHex(convert(BigUint64Array.from([2n ** 64n - 1n])))).toBe(
        hex('91 cf ff ff ff ff ff ff ff ff'),
      );
    });

    it('encodes a Map like an object', () => {
      const map = new Map<string, number>([
        ['b', 1],
        ['a', 2],
      ]);
      expect(toHex(convert(map))).toBe(hex('82 a1 61 02 a1 62 01'));
    });

    it('rejects non-string Map keys', () => {
      expect(() => encodeUnknown(new Map([[1, 'x']]))).toThrow('Map key of type number is not supported at $');
    });

    it('treats undefined as nil', () => {
      expect(toHex(convert({ a: undefined }))).toBe(hex('81 a1 61 c0'));
    });

    it('unboxes wrapper objects', () => {
      expect(encodeUnknown(new Number(255))).toBe(hex('d1 00 ff'));
      expect(encodeUnknown(new String('foo'))).toBe(hex('a3 66 6f 6f'));
      expect(encodeUnknown(new Boolean(true))).toBe('c3');
    });

    it('rejects values outside the model with their path', () => {
      expect(() => encodeUnknown({ when: new Date(0) })).toThrow('Date is not supported at $.when');
      expect(() => encodeUnknown([() => 1])).toThrow('function is not supported at $[0]');
      expect(() => encodeUnknown(Symbol('s'))).toThrow(UnsupportedValueError);
    });

    it('rejects circular references', () => {
      const node: Record<string, unknown> = { id: 1 };
      node.self = node;
      expect(() => encodeUnknown(node)).toThrow('circular reference at $.self');
    });

    it('allows the same object twice when it is not its own ancestor', () => {
      const shared = { k: 1 };
      expect(encodeUnknown({ a: shared, b: shared })).toBe(hex('82 a1 61 81 a1 6b 01 a1 62 81 a1 6b 01'));
    });
  });
});
