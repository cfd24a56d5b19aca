import { describe, expect, it } from 'vitest';
import { computeContentHash, hashDocument } from '../hashing.js';

describe('computeContentHash', () => {
  it('returns the hex SHA-256 of the bytes', () => {
    expect(computeContentHash(new Uint8Array(0))).toBe(
      'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855',
    );
  });
});

describe('hashDocument', () => {
  it('ignores key order', () => {
    expect(hashDocument({ a: 1, b: [2, 3] })).toBe(hashDocument({ b: [2, 3], a: 1 }));
  });

  it('depends on hints', () => {
    expect(hashDocument({ a: 1 }, { a: ['uint64'] }, { fixedWidthIntegers: true })).not.toBe(hashDocument({ a: 1 }));
  });
});
