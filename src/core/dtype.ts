/**
 * Native element types
 *
 * A `DType` is the in-process description of one array element, the
 * counterpart of a NumPy dtype. The type codec maps it to and from the JSON
 * type descriptors the server speaks.
 */

import type { DataType } from 'zarrita';
import { InvalidTypeError } from '../errors.js';

export type ByteOrder = 'LE' | 'BE';

export type StringEncoding = 'ascii' | 'utf-8';

export type ReferenceFlavor = 'object' | 'region';

export interface IntDType {
  kind: 'int';
  size: 1 | 2 | 4 | 8;
  signed: boolean;
  byteOrder: ByteOrder;
}

export interface FloatDType {
  kind: 'float';
  size: 4 | 8;
  byteOrder: ByteOrder;
}

export interface BoolDType {
  kind: 'bool';
}

/** Fixed-length string; `length` counts bytes, not code points. */
export interface StringDType {
  kind: 'string';
  length: number;
  encoding: StringEncoding;
}

export interface VlenStringDType {
  kind: 'vlen-string';
  encoding: StringEncoding;
}

export interface OpaqueDType {
  kind: 'opaque';
  size: number;
}

export interface EnumDType {
  kind: 'enum';
  base: IntDType;
  mapping: Readonly<Record<string, number>>;
}

export interface ArrayDType {
  kind: 'array';
  base: DType;
  shape: readonly number[];
}

export interface VlenDType {
  kind: 'vlen';
  base: DType;
}

export interface CompoundField {
  name: string;
  dtype: DType;
}

export interface CompoundDType {
  kind: 'compound';
  fields: readonly CompoundField[];
}

export interface ReferenceDType {
  kind: 'reference';
  flavor: ReferenceFlavor;
}

export type DType =
  | IntDType
  | FloatDType
  | BoolDType
  | StringDType
  | VlenStringDType
  | OpaqueDType
  | EnumDType
  | ArrayDType
  | VlenDType
  | CompoundDType
  | ReferenceDType;

/**
 * The zarrita data types with a direct native counterpart
 */
export type NumericDataType = Extract<
  DataType,
  | 'int8' | 'int16' | 'int32' | 'int64'
  | 'uint8' | 'uint16' | 'uint32' | 'uint64'
  | 'float32' | 'float64'
  | 'bool'
>;

const INT_SIZES: Record<string, IntDType['size']> = {
  int8: 1, int16: 2, int32: 4, int64: 8,
  uint8: 1, uint16: 2, uint32: 4, uint64: 8,
};

/**
 * Native type for a zarrita data type name, e.g. `dtype('int32')`
 */
export function dtype(name: NumericDataType, byteOrder: ByteOrder = 'LE'): IntDType | FloatDType | BoolDType {
  if (name === 'bool') {
    return { kind: 'bool' };
  }
  if (name === 'float32' || name === 'float64') {
    return { kind: 'float', size: name === 'float32' ? 4 : 8, byteOrder };
  }
  return { kind: 'int', size: INT_SIZES[name], signed: !name.startsWith('u'), byteOrder };
}

/**
 * zarrita data type name for a native numeric type, if it has one
 */
export function toDataType(dt: DType): NumericDataType | undefined {
  switch (dt.kind) {
    case 'bool':
      return 'bool';
    case 'float':
      return dt.size === 4 ? 'float32' : 'float64';
    case 'int': {
      const bits = dt.size * 8;
      const name = `${dt.signed ? '' : 'u'}int${bits}`;
      return isNumericDataType(name) ? name : undefined;
    }
    default:
      return undefined;
  }
}

export function isNumericDataType(name: string): name is NumericDataType {
  return name === 'bool' || name === 'float32' || name === 'float64' || name in INT_SIZES;
}

/**
 * Native type for HDF5 strings. A `length` gives a fixed-length string,
 * otherwise the string is variable length.
 */
export function stringDtype(encoding: StringEncoding = 'utf-8', length?: number): StringDType | VlenStringDType {
  if (length === undefined) {
    return { kind: 'vlen-string', encoding };
  }
  if (!Number.isInteger(length) || length < 1) {
    throw new InvalidTypeError(`string length must be a positive integer (got ${length})`);
  }
  return { kind: 'string', length, encoding };
}

export function vlenDtype(base: DType): VlenDType {
  return { kind: 'vlen', base };
}

/**
 * Native enumerated type; `base` must be an integer type
 */
export function enumDtype(mapping: Record<string, number>, base: DType = dtype('uint8')): EnumDType {
  if (base.kind !== 'int') {
    throw new InvalidTypeError('Only integer types can be used as enums');
  }
  return { kind: 'enum', base, mapping: { ...mapping } };
}

export function arrayDtype(base: DType, shape: readonly number[]): ArrayDType {
  return { kind: 'array', base, shape: [...shape] };
}

export function compoundDtype(fields: readonly (readonly [string, DType])[]): CompoundDType {
  return { kind: 'compound', fields: fields.map(([name, dt]) => ({ name, dtype: dt })) };
}

export function opaqueDtype(size: number): OpaqueDType {
  return { kind: 'opaque', size };
}

export function refDtype(flavor: ReferenceFlavor = 'object'): ReferenceDType {
  return { kind: 'reference', flavor };
}

// ---------------------------------------------------------------------------
// Inspectors, after h5py's check_*_dtype helpers
// ---------------------------------------------------------------------------

export interface StringInfo {
  encoding: StringEncoding;
  /** Byte length, or `null` for variable-length strings */
  length: number | null;
}

export function checkStringDtype(dt: DType): StringInfo | undefined {
  if (dt.kind === 'vlen-string') return { encoding: dt.encoding, length: null };
  if (dt.kind === 'string') return { encoding: dt.encoding, length: dt.length };
  return undefined;
}

/**
 * Base of a variable-length type; `'string'`/`'bytes'` for vlen strings
 */
export function checkVlenDtype(dt: DType): DType | 'string' | 'bytes' | undefined {
  if (dt.kind === 'vlen') return dt.base;
  if (dt.kind === 'vlen-string') return dt.encoding === 'utf-8' ? 'string' : 'bytes';
  return undefined;
}

export function checkEnumDtype(dt: DType): Readonly<Record<string, number>> | undefined {
  return dt.kind === 'enum' ? dt.mapping : undefined;
}

export function checkRefDtype(dt: DType): ReferenceFlavor | undefined {
  return dt.kind === 'reference' ? dt.flavor : undefined;
}

/**
 * Structural equality of two native types
 */
export function dtypesEqual(a: DType, b: DType): boolean {
  switch (a.kind) {
    case 'int':
      return b.kind === 'int' && a.size === b.size && a.signed === b.signed && a.byteOrder === b.byteOrder;
    case 'float':
      return b.kind === 'float' && a.size === b.size && a.byteOrder === b.byteOrder;
    case 'bool':
      return b.kind === 'bool';
    case 'string':
      return b.kind === 'string' && a.length === b.length && a.encoding === b.encoding;
    case 'vlen-string':
      return b.kind === 'vlen-string' && a.encoding === b.encoding;
    case 'opaque':
      return b.kind === 'opaque' && a.size === b.size;
    case 'reference':
      return b.kind === 'reference' && a.flavor === b.flavor;
    case 'vlen':
      return b.kind === 'vlen' && dtypesEqual(a.base, b.base);
    case 'enum': {
      if (b.kind !== 'enum' || !dtypesEqual(a.base, b.base)) return false;
      const keys = Object.keys(a.mapping);
      return keys.length === Object.keys(b.mapping).length &&
        keys.every((k) => a.mapping[k] === b.mapping[k]);
    }
    case 'array':
      return b.kind === 'array' && dtypesEqual(a.base, b.base) &&
        a.shape.length === b.shape.length && a.shape.every((n, i) => n === b.shape[i]);
    case 'compound':
      return b.kind === 'compound' && a.fields.length === b.fields.length &&
        a.fields.every((f, i) => f.name === b.fields[i].name && dtypesEqual(f.dtype, b.fields[i].dtype));
  }
}
