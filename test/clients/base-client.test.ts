import { describe, expect, it } from 'vitest';
import { decodeRow, normalizeValue } from '../../src/clients/base-client.js';
import { ResultDecodeError } from '../../src/errors.js';

describe('decodeRow', () => {
  it('keys values by column name in column order', () => {
    expect(Object.entries(decodeRow(['id', 'name'], [1, Buffer.from('alice')]))).toEqual([
      ['id', 1],
      ['name', 'alice'],
    ]);
  });

  it('keeps a column named __proto__ as plain data', () => {
    const row = decodeRow(['__proto__', 'id'], [{ admin: true }, 1]);

    expect(Object.getPrototypeOf(row)).toBe(Object.prototype);
    expect(Object.entries(row)).toEqual([
      ['__proto__', { admin: true }],
      ['id', 1],
    ]);
  });

  it('lets a later duplicate column win', () => {
    expect(decodeRow(['a', 'a'], [1, 2])).toEqual({ a: 2 });
  });

  it('rejects a row whose width does not match the columns', () => {
    expect(() => decodeRow(['id'], [1, 2])).toThrow(ResultDecodeError);
  });
});

describe('normalizeValue', () => {
  it('maps missing values to null and bytes to text', () => {
    expect(normalizeValue(undefined)).toBeNull();
    expect(normalizeValue(new Uint8Array([104, 105]))).toBe('hi');
  });

  it('rejects values a result set cannot carry', () => {
    expect(() => normalizeValue(() => 1, 'fn')).toThrow(
      "failed to decode result: column 'fn' has unsupported value of type function"
    );
  });
});
