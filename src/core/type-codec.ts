/**
 * Type descriptor codec
 *
 * Maps native element types (`DType`) to the JSON type items exchanged with
 * the server and back. `decodeType(encodeType(t))` equals `t` for every
 * representable type, except that the canonical boolean enum always decodes
 * to `bool`.
 */

import {
  DType,
  IntDType,
  FloatDType,
  ByteOrder,
  StringEncoding,
  ReferenceFlavor,
} from './dtype.js';
import { InvalidTypeError, MalformedDescriptorError } from '../errors.js';
import { product } from '../utils.js';

export const H5T_VARIABLE = 'H5T_VARIABLE';
export type Variable = typeof H5T_VARIABLE;

export type CharSet = 'H5T_CSET_ASCII' | 'H5T_CSET_UTF8';
export type StrPad = 'H5T_STR_NULLPAD' | 'H5T_STR_NULLTERM' | 'H5T_STR_SPACEPAD';
export type RefBase = 'H5T_STD_REF_OBJ' | 'H5T_STD_REF_DSETREG';

export interface IntegerTypeItem {
  class: 'H5T_INTEGER';
  base: string;
  dims?: readonly number[];
}

export interface FloatTypeItem {
  class: 'H5T_FLOAT';
  base: string;
  dims?: readonly number[];
}

export interface StringTypeItem {
  class: 'H5T_STRING';
  charSet: CharSet;
  length: number | Variable;
  strPad?: StrPad;
}

export interface OpaqueTypeItem {
  class: 'H5T_OPAQUE';
  size: number;
}

export interface EnumTypeItem {
  class: 'H5T_ENUM';
  base: TypeItem | string;
  mapping: Record<string, number>;
}

export interface ArrayTypeItem {
  class: 'H5T_ARRAY';
  base: TypeItem | string;
  dims: readonly number[];
}

export interface VlenTypeItem {
  class: 'H5T_VLEN';
  base: TypeItem | string;
  size?: Variable;
}

export interface CompoundFieldItem {
  name: string;
  type: TypeItem | string;
}

export interface CompoundTypeItem {
  class: 'H5T_COMPOUND';
  fields: readonly CompoundFieldItem[];
}

export interface ReferenceTypeItem {
  class: 'H5T_REFERENCE';
  base: RefBase;
}

export type TypeItem =
  | IntegerTypeItem
  | FloatTypeItem
  | StringTypeItem
  | OpaqueTypeItem
  | EnumTypeItem
  | ArrayTypeItem
  | VlenTypeItem
  | CompoundTypeItem
  | ReferenceTypeItem;

const BOOL_MAPPING: Readonly<Record<string, number>> = { FALSE: 0, TRUE: 1 };

// ---------------------------------------------------------------------------
// Encode
// ---------------------------------------------------------------------------

function predefinedName(dt: IntDType | FloatDType): string {
  const bits = dt.size * 8;
  if (dt.kind === 'float') {
    return `H5T_IEEE_F${bits}${dt.byteOrder}`;
  }
  return `H5T_STD_${dt.signed ? 'I' : 'U'}${bits}${dt.byteOrder}`;
}

function charSet(encoding: StringEncoding): CharSet {
  return encoding === 'ascii' ? 'H5T_CSET_ASCII' : 'H5T_CSET_UTF8';
}

function isAscii(text: string): boolean {
  return /^[\x00-\x7f]*$/.test(text);
}

/**
 * Type item for a native element type
 */
export function encodeType(dt: DType): TypeItem {
  switch (dt.kind) {
    case 'int':
      return { class: 'H5T_INTEGER', base: predefinedName(dt) };
    case 'float':
      return { class: 'H5T_FLOAT', base: predefinedName(dt) };
    case 'bool':
      return {
        class: 'H5T_ENUM',
        base: { class: 'H5T_INTEGER', base: 'H5T_STD_I8LE' },
        mapping: { ...BOOL_MAPPING },
      };
    case 'string':
      return {
        class: 'H5T_STRING',
        charSet: charSet(dt.encoding),
        length: dt.length,
        strPad: 'H5T_STR_NULLPAD',
      };
    case 'vlen-string':
      return {
        class: 'H5T_STRING',
        charSet: charSet(dt.encoding),
        length: H5T_VARIABLE,
        strPad: 'H5T_STR_NULLTERM',
      };
    case 'opaque':
      return { class: 'H5T_OPAQUE', size: dt.size };
    case 'enum':
      return { class: 'H5T_ENUM', base: encodeType(dt.base), mapping: { ...dt.mapping } };
    case 'array':
      if (dt.base.kind === 'array') {
        throw new InvalidTypeError('Array type base must not itself be an array type');
      }
      return { class: 'H5T_ARRAY', base: encodeType(dt.base), dims: [...dt.shape] };
    case 'vlen':
      return { class: 'H5T_VLEN', base: encodeType(dt.base), size: H5T_VARIABLE };
    case 'compound': {
      if (dt.fields.length === 0) {
        throw new InvalidTypeError('Compound type must have at least one field');
      }
      const seen = new Set<string>();
      const fields = dt.fields.map((field) => {
        if (!isAscii(field.name)) {
          throw new InvalidTypeError(`Compound field name is not ASCII: ${field.name}`);
        }
        if (seen.has(field.name)) {
          throw new InvalidTypeError(`Duplicate compound field name: ${field.name}`);
        }
        seen.add(field.name);
        return { name: field.name, type: encodeType(field.dtype) };
      });
      return { class: 'H5T_COMPOUND', fields };
    }
    case 'reference':
      return {
        class: 'H5T_REFERENCE',
        base: dt.flavor === 'object' ? 'H5T_STD_REF_OBJ' : 'H5T_STD_REF_DSETREG',
      };
  }
}

// ---------------------------------------------------------------------------
// Decode
// ---------------------------------------------------------------------------

const PREDEFINED = /^H5T_(STD|IEEE)_([IUF])(8|16|32|64)(LE|BE)$/;

function parsePredefined(name: string): IntDType | FloatDType {
  const m = PREDEFINED.exec(name);
  if (!m) {
    throw new MalformedDescriptorError(`Unknown predefined type: ${name}`);
  }
  const [, family, letter, bitsText, order] = m;
  const bits = Number(bitsText);
  const byteOrder: ByteOrder = order === 'BE' ? 'BE' : 'LE';

  if (family === 'IEEE') {
    if (letter !== 'F' || (bits !== 32 && bits !== 64)) {
      throw new MalformedDescriptorError(`Unknown predefined type: ${name}`);
    }
    return { kind: 'float', size: bits === 32 ? 4 : 8, byteOrder };
  }
  if (letter === 'F') {
    throw new MalformedDescriptorError(`Unknown predefined type: ${name}`);
  }
  const size = bits === 8 ? 1 : bits === 16 ? 2 : bits === 32 ? 4 : 8;
  return { kind: 'int', size, signed: letter === 'I', byteOrder };
}

function requireKeys(item: object, cls: string, keys: readonly string[]): void {
  for (const key of keys) {
    if (!(key in item)) {
      throw new MalformedDescriptorError(`'${key}' not provided for ${cls} type`);
    }
  }
}

function encodingOf(cset: string): StringEncoding {
  if (cset === 'H5T_CSET_ASCII') return 'ascii';
  if (cset === 'H5T_CSET_UTF8') return 'utf-8';
  throw new MalformedDescriptorError(`Unexpected charSet: ${cset}`);
}

function withDims(base: DType, dims: readonly number[] | undefined): DType {
  if (dims === undefined) return base;
  return { kind: 'array', base, shape: [...dims] };
}

function isBoolMapping(mapping: Record<string, number>): boolean {
  const keys = Object.keys(mapping);
  return keys.length === 2 && mapping.FALSE === 0 && mapping.TRUE === 1;
}

/**
 * Native element type for a type item. A bare string is read as the name of
 * a predefined integer or float type.
 */
export function decodeType(item: TypeItem | string): DType {
  if (typeof item === 'string') {
    return parsePredefined(item);
  }
  if (typeof item !== 'object' || item === null || !('class' in item)) {
    throw new MalformedDescriptorError('Type item has no class');
  }
  const cls: string = item.class;

  switch (item.class) {
    case 'H5T_INTEGER': {
      requireKeys(item, item.class, ['base']);
      const dt = parsePredefined(item.base);
      if (dt.kind !== 'int') {
        throw new MalformedDescriptorError(`Not an integer type: ${item.base}`);
      }
      return withDims(dt, item.dims);
    }
    case 'H5T_FLOAT': {
      requireKeys(item, item.class, ['base']);
      const dt = parsePredefined(item.base);
      if (dt.kind !== 'float') {
        throw new MalformedDescriptorError(`Not a float type: ${item.base}`);
      }
      return withDims(dt, item.dims);
    }
    case 'H5T_STRING': {
      requireKeys(item, item.class, ['length', 'charSet']);
      const encoding = encodingOf(item.charSet);
      if (item.length === H5T_VARIABLE) {
        return { kind: 'vlen-string', encoding };
      }
      if (!Number.isInteger(item.length) || item.length < 1) {
        throw new MalformedDescriptorError(`Invalid string length: ${item.length}`);
      }
      return { kind: 'string', length: item.length, encoding };
    }
    case 'H5T_OPAQUE':
      requireKeys(item, item.class, ['size']);
      return { kind: 'opaque', size: item.size };
    case 'H5T_ENUM': {
      requireKeys(item, item.class, ['base', 'mapping']);
      const base = decodeType(item.base);
      if (base.kind !== 'int') {
        throw new MalformedDescriptorError('Enum base type must be an integer type');
      }
      if (base.size === 1 && isBoolMapping(item.mapping)) {
        return { kind: 'bool' };
      }
      return { kind: 'enum', base, mapping: { ...item.mapping } };
    }
    case 'H5T_ARRAY': {
      requireKeys(item, item.class, ['base', 'dims']);
      const base = decodeType(item.base);
      // an array of arrays is one array over the outer then inner dims
      if (base.kind === 'array') {
        return { kind: 'array', base: base.base, shape: [...item.dims, ...base.shape] };
      }
      return { kind: 'array', base, shape: [...item.dims] };
    }
    case 'H5T_VLEN':
      requireKeys(item, item.class, ['base']);
      return { kind: 'vlen', base: decodeType(item.base) };
    case 'H5T_COMPOUND':
      requireKeys(item, item.class, ['fields']);
      return {
        kind: 'compound',
        fields: item.fields.map((field) => {
          requireKeys(field, 'compound field', ['name', 'type']);
          return { name: field.name, dtype: decodeType(field.type) };
        }),
      };
    case 'H5T_REFERENCE': {
      requireKeys(item, item.class, ['base']);
      let flavor: ReferenceFlavor;
      if (item.base === 'H5T_STD_REF_OBJ') {
        flavor = 'object';
      } else if (item.base === 'H5T_STD_REF_DSETREG') {
        flavor = 'region';
      } else {
        throw new MalformedDescriptorError(`Unexpected reference base: ${String(item.base)}`);
      }
      return { kind: 'reference', flavor };
    }
    default:
      throw new MalformedDescriptorError(`Unknown type class: ${cls}`);
  }
}

// ---------------------------------------------------------------------------
// Sizes
// ---------------------------------------------------------------------------

/**
 * Byte size of one element of a native type, or `H5T_VARIABLE`
 */
export function dtypeItemSize(dt: DType): number | Variable {
  switch (dt.kind) {
    case 'int':
    case 'float':
      return dt.size;
    case 'bool':
      return 1;
    case 'string':
      return dt.length;
    case 'opaque':
      return dt.size;
    case 'enum':
      return dt.base.size;
    case 'array': {
      const size = dtypeItemSize(dt.base);
      return size === H5T_VARIABLE ? size : size * product(dt.shape);
    }
    case 'compound': {
      let total = 0;
      for (const field of dt.fields) {
        const size = dtypeItemSize(field.dtype);
        if (size === H5T_VARIABLE) return H5T_VARIABLE;
        total += size;
      }
      return total;
    }
    case 'vlen-string':
    case 'vlen':
    case 'reference':
      return H5T_VARIABLE;
  }
}

/**
 * Byte size of one element described by a type item, or `H5T_VARIABLE`
 */
export function getItemSize(item: TypeItem | string): number | Variable {
  return dtypeItemSize(decodeType(item));
}
