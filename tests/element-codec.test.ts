import { describe, test, expect } from 'vitest';
import { arrayToBytes, bytesToArray, jsonToArray } from '../src/core/element-codec.js';
import {
  arrayDtype,
  compoundDtype,
  dtype,
  enumDtype,
  opaqueDtype,
  refDtype,
  stringDtype,
  vlenDtype,
} from '../src/core/dtype.js';
import { Reference, RegionReference } from '../src/types.js';
import {
  InvalidTypeError,
  ShapeMismatchError,
  UnsupportedOperationError,
} from '../src/errors.js';

describe('binary encoding', () => {
  test('should pack integers in their byte order', () => {
    expect(arrayToBytes([1, -2], dtype('int32'))).toEqual(
      Uint8Array.from([1, 0, 0, 0, 254, 255, 255, 255])
    );
    expect(arrayToBytes([258], dtype('uint16', 'BE'))).toEqual(Uint8Array.from([1, 2]));
  });

  test('should pack floats', () => {
    expect(arrayToBytes([1.5], dtype('float64', 'BE'))).toEqual(
      Uint8Array.from([0x3f, 0xf8, 0, 0, 0, 0, 0, 0])
    );
  });

  test('should read 64-bit integers as bigint', () => {
    const bytes = arrayToBytes([5n, 7], dtype('int64'));
    expect(bytes).toHaveLength(16);
    expect(bytesToArray(bytes, dtype('int64'), 2)).toEqual([5n, 7n]);
  });

  test('should round-trip booleans', () => {
    const bytes = arrayToBytes([true, false], dtype('bool'));
    expect(bytes).toEqual(Uint8Array.from([1, 0]));
    expect(bytesToArray(bytes, dtype('bool'), 2)).toEqual([true, false]);
  });

  test('should pad and truncate fixed-length strings', () => {
    const dt = stringDtype('ascii', 5);
    expect(arrayToBytes(['abc'], dt)).toEqual(Uint8Array.from([97, 98, 99, 0, 0]));
    expect(bytesToArray(Uint8Array.from([97, 98, 99, 0, 0]), dt, 1)).toEqual(['abc']);
    expect(bytesToArray(arrayToBytes(['abcdefg'], dt), dt, 1)).toEqual(['abcde']);
  });

  test('should prefix variable-length strings with their byte count', () => {
    const bytes = arrayToBytes(['hé'], stringDtype('utf-8'));
    expect(bytes).toEqual(Uint8Array.from([3, 0, 0, 0, 0x68, 0xc3, 0xa9]));
    expect(bytesToArray(bytes, stringDtype('utf-8'), 1)).toEqual(['hé']);
  });

  test('should pad opaque values to the type size', () => {
    expect(arrayToBytes([Uint8Array.from([1, 2])], opaqueDtype(3))).toEqual(Uint8Array.from([1, 2, 0]));
  });

  test('should accept enum member names', () => {
    const dt = enumDtype({ RED: 0, GREEN: 1 }, dtype('int16'));
    const bytes = arrayToBytes(['GREEN', 0], dt);
    expect(bytes).toEqual(Uint8Array.from([1, 0, 0, 0]));
    expect(bytesToArray(bytes, dt, 2)).toEqual([1, 0]);
    expect(() => arrayToBytes(['PURPLE'], dt)).toThrow("'PURPLE' is not a member of the enumeration");
  });

  test('should pack array elements in row-major order', () => {
    const dt = arrayDtype(dtype('int8'), [2, 2]);
    const bytes = arrayToBytes([[[1, 2], [3, 4]]], dt);
    expect(bytes).toEqual(Uint8Array.from([1, 2, 3, 4]));
    expect(bytesToArray(bytes, dt, 1)).toEqual([[[1, 2], [3, 4]]]);
  });

  test('should pack compound fields in field order', () => {
    const dt = compoundDtype([['a', dtype('int16')], ['b', dtype('float32')]]);
    const bytes = arrayToBytes([{ a: 1, b: 0.5 }], dt);
    expect(bytes).toEqual(Uint8Array.from([1, 0, 0, 0, 0, 0x3f]));
    expect(bytesToArray(bytes, dt, 1)).toEqual([{ a: 1, b: 0.5 }]);
    expect(() => arrayToBytes([{ a: 1 }], dt)).toThrow("Missing compound field 'b'");
  });

  test('should round-trip variable-length sequences', () => {
    const dt = vlenDtype(dtype('int16'));
    const bytes = arrayToBytes([[1, 2], [3]], dt);
    expect(bytes).toEqual(Uint8Array.from([4, 0, 0, 0, 1, 0, 2, 0, 2, 0, 0, 0, 3, 0]));
    expect(bytesToArray(bytes, dt, 2)).toEqual([[1, 2], [3]]);
  });

  test('should not decode sequences of variable-length elements', () => {
    expect(() => bytesToArray(new Uint8Array(4), vlenDtype(stringDtype()), 1)).toThrow(
      UnsupportedOperationError
    );
  });

  test('should write references as their path text', () => {
    const ref = new Reference({ kind: 'dataset', id: 'd-123' });
    const bytes = arrayToBytes([ref, null], refDtype());
    expect(bytes.subarray(0, 4)).toEqual(Uint8Array.from([14, 0, 0, 0]));
    const [back, empty] = bytesToArray(bytes, refDtype(), 2);
    expect(back).toBeInstanceOf(Reference);
    expect(back instanceof Reference && back.target).toEqual({ kind: 'dataset', id: 'd-123' });
    expect(empty).toBeNull();
  });

  test('should keep the selection of region references', () => {
    const ref = new RegionReference({ kind: 'dataset', id: 'd-9' }, '[0:2]');
    const [back] = bytesToArray(arrayToBytes([ref], refDtype('region')), refDtype('region'), 1);
    expect(back).toBeInstanceOf(RegionReference);
    expect(String(back)).toBe('datasets/d-9[0:2]');
  });

  test('should reject short and long responses', () => {
    expect(() => bytesToArray(new Uint8Array(3), dtype('int32'), 1)).toThrow(
      'Binary response too short: wanted 4 more bytes at offset 0, have 3'
    );
    expect(() => bytesToArray(new Uint8Array(5), dtype('int32'), 1)).toThrow(
      'Binary response has 1 trailing bytes after 1 elements'
    );
  });

  test('should reject values of the wrong kind', () => {
    expect(() => arrayToBytes(['x'], dtype('float32'))).toThrow('Cannot store string in a float element');
    expect(() => arrayToBytes([1.5], stringDtype())).toThrow(InvalidTypeError);
  });
});

describe('jsonToArray', () => {
  test('should check nested lists against the shape', () => {
    expect(jsonToArray([[1, 2], [3, 4]], dtype('int32'), [2, 2])).toEqual([[1, 2], [3, 4]]);
    expect(() => jsonToArray([1, 2], dtype('int32'), [3])).toThrow('JSON response does not match shape (3,)');
  });

  test('should convert 64-bit integers and non-finite floats', () => {
    expect(jsonToArray([1, 2], dtype('uint64'), [2])).toEqual([1n, 2n]);
    expect(jsonToArray(['NaN', 'Infinity', 0.25], dtype('float32'), [3])).toEqual([NaN, Infinity, 0.25]);
  });

  test('should read compound rows as lists', () => {
    const dt = compoundDtype([['a', dtype('int16')], ['b', stringDtype()]]);
    expect(jsonToArray([[1, 'x']], dt, [1])).toEqual([{ a: 1, b: 'x' }]);
  });

  test('should decode opaque values from base64', () => {
    expect(jsonToArray('AQID', opaqueDtype(3), [])).toEqual(Uint8Array.from([1, 2, 3]));
  });

  test('should reject values of the wrong kind', () => {
    expect(() => jsonToArray('x', dtype('int32'), [])).toThrow(ShapeMismatchError);
    expect(() => jsonToArray('x', dtype('int32'), [])).toThrow('Unexpected JSON value for int element: "x"');
  });
});
