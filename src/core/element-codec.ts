/**
 * Element codec
 *
 * Converts between element values and the two value encodings the server
 * uses: packed binary (fixed-size elements back to back in their declared
 * byte order) and JSON (nested lists). Variable-length elements are written
 * in binary as a 4-byte little-endian byte count followed by the bytes.
 */

import { concat as uint8ArrayConcat } from 'uint8arrays/concat';
import { fromString as uint8ArrayFromString } from 'uint8arrays/from-string';
import { toString as uint8ArrayToString } from 'uint8arrays/to-string';
import type { DType, IntDType, StringEncoding } from './dtype.js';
import { dtypeItemSize, H5T_VARIABLE } from './type-codec.js';
import { parseObjectRef } from './registry.js';
import {
  CompoundValue,
  ElementValue,
  NDArray,
  Reference,
  RegionReference,
  Shape,
} from '../types.js';
import { InvalidTypeError, ShapeMismatchError, UnsupportedOperationError } from '../errors.js';
import { product, reshape, flatten, formatShape } from '../utils.js';

function textEncoding(encoding: StringEncoding): 'ascii' | 'utf8' {
  return encoding === 'ascii' ? 'ascii' : 'utf8';
}

// ---------------------------------------------------------------------------
// Binary decode
// ---------------------------------------------------------------------------

class ByteReader {
  readonly view: DataView;
  offset = 0;

  constructor(readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get remaining(): number {
    return this.bytes.byteLength - this.offset;
  }

  need(n: number): number {
    if (n > this.remaining) {
      throw new ShapeMismatchError(
        `Binary response too short: wanted ${n} more bytes at offset ${this.offset}, have ${this.remaining}`
      );
    }
    const at = this.offset;
    this.offset += n;
    return at;
  }

  take(n: number): Uint8Array {
    const at = this.need(n);
    return this.bytes.subarray(at, at + n);
  }

  /** Payload of a variable-length element */
  takeVlen(): Uint8Array {
    const at = this.need(4);
    return this.take(this.view.getUint32(at, true));
  }
}

function readInt(r: ByteReader, dt: IntDType): number | bigint {
  const le = dt.byteOrder === 'LE';
  const at = r.need(dt.size);
  switch (dt.size) {
    case 1:
      return dt.signed ? r.view.getInt8(at) : r.view.getUint8(at);
    case 2:
      return dt.signed ? r.view.getInt16(at, le) : r.view.getUint16(at, le);
    case 4:
      return dt.signed ? r.view.getInt32(at, le) : r.view.getUint32(at, le);
    case 8:
      return dt.signed ? r.view.getBigInt64(at, le) : r.view.getBigUint64(at, le);
  }
}

function stripNuls(bytes: Uint8Array): Uint8Array {
  let end = bytes.length;
  while (end > 0 && bytes[end - 1] === 0) end--;
  return bytes.subarray(0, end);
}

function parseReference(text: string, flavor: 'object' | 'region'): Reference | RegionReference | null {
  if (text.length === 0) return null;
  if (flavor === 'object') {
    return new Reference(parseObjectRef(text));
  }
  const bracket = text.indexOf('[');
  if (bracket === -1) {
    return new RegionReference(parseObjectRef(text), '');
  }
  return new RegionReference(parseObjectRef(text.slice(0, bracket)), text.slice(bracket));
}

function readElement(r: ByteReader, dt: DType): ElementValue {
  switch (dt.kind) {
    case 'int':
      return readInt(r, dt);
    case 'float': {
      const at = r.need(dt.size);
      const le = dt.byteOrder === 'LE';
      return dt.size === 4 ? r.view.getFloat32(at, le) : r.view.getFloat64(at, le);
    }
    case 'bool':
      return r.view.getUint8(r.need(1)) !== 0;
    case 'string':
      return uint8ArrayToString(stripNuls(r.take(dt.length)), textEncoding(dt.encoding));
    case 'vlen-string':
      return uint8ArrayToString(r.takeVlen(), textEncoding(dt.encoding));
    case 'opaque':
      return r.take(dt.size).slice();
    case 'enum':
      return Number(readInt(r, dt.base));
    case 'array': {
      const flat: ElementValue[] = [];
      for (let i = 0; i < product(dt.shape); i++) {
        flat.push(readElement(r, dt.base));
      }
      return reshape(flat, dt.shape);
    }
    case 'compound': {
      const row: CompoundValue = {};
      for (const field of dt.fields) {
        row[field.name] = readElement(r, field.dtype);
      }
      return row;
    }
    case 'vlen': {
      const itemSize = dtypeItemSize(dt.base);
      if (itemSize === H5T_VARIABLE || itemSize === 0) {
        throw new UnsupportedOperationError('Variable-length sequences of variable-length types are not supported');
      }
      const payload = r.takeVlen();
      if (payload.byteLength % itemSize !== 0) {
        throw new ShapeMismatchError(
          `Variable-length payload of ${payload.byteLength} bytes is not a multiple of ${itemSize}`
        );
      }
      return bytesToArray(payload, dt.base, payload.byteLength / itemSize);
    }
    case 'reference':
      return parseReference(uint8ArrayToString(r.takeVlen(), 'utf8'), dt.flavor);
  }
}

/**
 * Decode `count` packed elements
 */
export function bytesToArray(bytes: Uint8Array, dt: DType, count: number): ElementValue[] {
  const reader = new ByteReader(bytes);
  const values: ElementValue[] = [];
  for (let i = 0; i < count; i++) {
    values.push(readElement(reader, dt));
  }
  if (reader.remaining !== 0) {
    throw new ShapeMismatchError(
      `Binary response has ${reader.remaining} trailing bytes after ${count} elements`
    );
  }
  return values;
}

// ---------------------------------------------------------------------------
// Binary encode
// ---------------------------------------------------------------------------

function typeError(value: ElementValue, dt: DType): InvalidTypeError {
  return new InvalidTypeError(`Cannot store ${describe(value)} in a ${dt.kind} element`);
}

function describe(value: ElementValue): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  if (value instanceof Uint8Array) return 'bytes';
  return typeof value;
}

function fixed(size: number, write: (view: DataView) => void): Uint8Array {
  const bytes = new Uint8Array(size);
  write(new DataView(bytes.buffer));
  return bytes;
}

function vlenBytes(payload: Uint8Array): Uint8Array {
  const header = fixed(4, (v) => v.setUint32(0, payload.byteLength, true));
  return uint8ArrayConcat([header, payload]);
}

function writeInt(value: ElementValue, dt: IntDType): Uint8Array {
  const le = dt.byteOrder === 'LE';
  if (dt.size === 8) {
    let big: bigint;
    if (typeof value === 'bigint') {
      big = value;
    } else if (typeof value === 'number' && Number.isInteger(value)) {
      big = BigInt(value);
    } else {
      throw typeError(value, dt);
    }
    return fixed(8, (v) => (dt.signed ? v.setBigInt64(0, big, le) : v.setBigUint64(0, big, le)));
  }
  let n: number;
  if (typeof value === 'number') {
    n = value;
  } else if (typeof value === 'bigint') {
    n = Number(value);
  } else {
    throw typeError(value, dt);
  }
  return fixed(dt.size, (v) => {
    if (dt.size === 1) {
      if (dt.signed) v.setInt8(0, n);
      else v.setUint8(0, n);
    } else if (dt.size === 2) {
      if (dt.signed) v.setInt16(0, n, le);
      else v.setUint16(0, n, le);
    } else if (dt.signed) {
      v.setInt32(0, n, le);
    } else {
      v.setUint32(0, n, le);
    }
  });
}

function writeElement(parts: Uint8Array[], value: ElementValue, dt: DType): void {
  switch (dt.kind) {
    case 'int':
      parts.push(writeInt(value, dt));
      return;
    case 'float': {
      if (typeof value !== 'number') throw typeError(value, dt);
      const x = value;
      const le = dt.byteOrder === 'LE';
      parts.push(fixed(dt.size, (v) => (dt.size === 4 ? v.setFloat32(0, x, le) : v.setFloat64(0, x, le))));
      return;
    }
    case 'bool':
      if (typeof value !== 'boolean' && typeof value !== 'number') throw typeError(value, dt);
      parts.push(Uint8Array.of(value ? 1 : 0));
      return;
    case 'string': {
      if (typeof value !== 'string') throw typeError(value, dt);
      const encoded = uint8ArrayFromString(value, textEncoding(dt.encoding));
      const padded = new Uint8Array(dt.length);
      padded.set(encoded.subarray(0, dt.length));
      parts.push(padded);
      return;
    }
    case 'vlen-string':
      if (typeof value !== 'string') throw typeError(value, dt);
      parts.push(vlenBytes(uint8ArrayFromString(value, textEncoding(dt.encoding))));
      return;
    case 'opaque': {
      if (!(value instanceof Uint8Array)) throw typeError(value, dt);
      const padded = new Uint8Array(dt.size);
      padded.set(value.subarray(0, dt.size));
      parts.push(padded);
      return;
    }
    case 'enum':
      if (typeof value === 'string') {
        const code = dt.mapping[value];
        if (code === undefined) {
          throw new InvalidTypeError(`'${value}' is not a member of the enumeration`);
        }
        parts.push(writeInt(code, dt.base));
      } else {
        parts.push(writeInt(value, dt.base));
      }
      return;
    case 'array': {
      const values = flatten(value, dt.shape.length);
      if (values.length !== product(dt.shape)) {
        throw new ShapeMismatchError(
          `Array element has ${values.length} values, type needs shape ${formatShape(dt.shape)}`
        );
      }
      for (const v of values) writeElement(parts, v, dt.base);
      return;
    }
    case 'compound': {
      if (!isCompoundValue(value)) throw typeError(value, dt);
      for (const field of dt.fields) {
        if (!(field.name in value)) {
          throw new InvalidTypeError(`Missing compound field '${field.name}'`);
        }
        writeElement(parts, value[field.name], field.dtype);
      }
      return;
    }
    case 'vlen': {
      if (!Array.isArray(value)) throw typeError(value, dt);
      parts.push(vlenBytes(arrayToBytes(value, dt.base)));
      return;
    }
    case 'reference': {
      let text: string;
      if (value === null) {
        text = '';
      } else if (value instanceof Reference || value instanceof RegionReference) {
        text = value.toString();
      } else if (typeof value === 'string') {
        text = value;
      } else {
        throw typeError(value, dt);
      }
      parts.push(vlenBytes(uint8ArrayFromString(text, 'utf8')));
      return;
    }
  }
}

function isCompoundValue(value: ElementValue): value is CompoundValue {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Uint8Array) &&
    !(value instanceof Reference) &&
    !(value instanceof RegionReference)
  );
}

/**
 * Pack flat element values into the binary wire form
 */
export function arrayToBytes(values: readonly ElementValue[], dt: DType): Uint8Array {
  const parts: Uint8Array[] = [];
  for (const value of values) {
    writeElement(parts, value, dt);
  }
  return uint8ArrayConcat(parts);
}

// ---------------------------------------------------------------------------
// JSON decode
// ---------------------------------------------------------------------------

function jsonElement(value: unknown, dt: DType): ElementValue {
  switch (dt.kind) {
    case 'int':
      if (typeof value !== 'number') break;
      return dt.size === 8 ? BigInt(value) : value;
    case 'float':
      if (typeof value === 'number') return value;
      // non-finite values arrive as strings
      if (value === 'NaN' || value === 'Infinity' || value === '-Infinity') return Number(value);
      break;
    case 'bool':
      if (typeof value === 'boolean') return value;
      if (typeof value === 'number') return value !== 0;
      break;
    case 'string':
    case 'vlen-string':
      if (typeof value === 'string') return value;
      break;
    case 'opaque':
      if (typeof value === 'string') return uint8ArrayFromString(value, 'base64pad');
      break;
    case 'enum':
      if (typeof value === 'number') return value;
      if (typeof value === 'string' && dt.mapping[value] !== undefined) return dt.mapping[value];
      break;
    case 'array':
      return jsonToArray(value, dt.base, dt.shape);
    case 'compound': {
      if (!Array.isArray(value) || value.length !== dt.fields.length) break;
      const row: CompoundValue = {};
      dt.fields.forEach((field, i) => {
        row[field.name] = jsonElement(value[i], field.dtype);
      });
      return row;
    }
    case 'vlen':
      if (!Array.isArray(value)) break;
      return value.map((v: unknown) => jsonElement(v, dt.base));
    case 'reference':
      if (value === null) return null;
      if (typeof value === 'string') return parseReference(value, dt.flavor);
      break;
  }
  throw new ShapeMismatchError(`Unexpected JSON value for ${dt.kind} element: ${JSON.stringify(value)}`);
}

/**
 * Convert a JSON value response of the given shape to element values
 */
export function jsonToArray(value: unknown, dt: DType, shape: Shape): NDArray {
  if (shape.length === 0) {
    return jsonElement(value, dt);
  }
  if (!Array.isArray(value) || value.length !== shape[0]) {
    throw new ShapeMismatchError(
      `JSON response does not match shape ${formatShape(shape)}`
    );
  }
  const rest = shape.slice(1);
  return value.map((v: unknown) => jsonToArray(v, dt, rest));
}
