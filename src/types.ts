/**
 * Type definitions for hslab
 */

import type { Slice } from 'zarrita';
import type { TypeItem } from './core/type-codec.js';

/**
 * Extents of an array. The empty shape `[]` is a scalar dataspace.
 */
export type Shape = readonly number[];

/**
 * A dataspace is a shape, or `null` for a null dataspace (no elements at all).
 */
export type Dataspace = Shape | null;

/**
 * Maximum extents; `null` on an axis means unlimited.
 */
export type MaxShape = readonly (number | null)[];

/**
 * Per-axis chunk extents, rank-matched to the shape.
 */
export type ChunkLayout = readonly number[];

/**
 * Target of an object reference
 */
export type ObjectKind = 'group' | 'dataset' | 'datatype';

export interface ObjectRef {
  kind: ObjectKind;
  id: string;
}

/**
 * Value of an object reference element
 */
export class Reference {
  constructor(readonly target: ObjectRef) {}

  toString(): string {
    return `${this.target.kind}s/${this.target.id}`;
  }
}

/**
 * Value of a region reference element: an object plus a selection on it
 */
export class RegionReference {
  constructor(readonly target: ObjectRef, readonly select: string) {}

  toString(): string {
    return `${this.target.kind}s/${this.target.id}${this.select}`;
  }
}

/**
 * A single element as read from or written to an array
 */
export type ElementValue =
  | number
  | bigint
  | boolean
  | string
  | null
  | Uint8Array
  | Reference
  | RegionReference
  | ElementValue[]
  | CompoundValue;

/**
 * Compound element: field name to field value, in field order
 */
export interface CompoundValue {
  [field: string]: ElementValue;
}

/**
 * Multi-dimensional data as nested arrays of elements. Array-typed and
 * variable-length elements are arrays themselves, so the rank of a value is
 * only known together with the shape it was read with.
 */
export type NDArray = ElementValue;

/**
 * Marker returned for reads of a null dataspace
 */
export class Empty {
  toString(): string {
    return 'Empty';
  }
}

/**
 * `...` in an index expression
 */
export const ELLIPSIS: unique symbol = Symbol('...');
export type Ellipsis = typeof ELLIPSIS;

/**
 * Nested boolean array matching a whole array shape
 */
export type BooleanMask = readonly boolean[] | readonly BooleanMask[];

/**
 * One term of an index expression
 */
export type IndexTerm =
  | number
  | Slice
  | Ellipsis
  | readonly number[]
  | BooleanMask
  | readonly (readonly number[])[];

export type IndexExpression = readonly IndexTerm[];

/**
 * Metadata of a remote array, fetched once per handle
 */
export interface ArrayInfo {
  id: string;
  shape: Dataspace;
  maxshape?: MaxShape | null;
  type: TypeItem;
  chunks: ChunkLayout | null;
}
