/**
 * Utility functions for hslab
 */

import { NDArray, ElementValue, Shape } from './types.js';

/**
 * Number of elements in an array of the given shape
 */
export function product(shape: Shape): number {
  return shape.reduce((a, b) => a * b, 1);
}

/**
 * Get the shape of a nested array, looking at most `maxRank` levels deep.
 * Array-typed elements are themselves arrays, so callers pass the rank they
 * expect to find above the element level.
 */
export function getShape(data: NDArray, maxRank = Infinity): number[] {
  const shape: number[] = [];
  let current: NDArray = data;

  while (Array.isArray(current) && shape.length < maxRank) {
    shape.push(current.length);
    if (current.length === 0) break;
    current = current[0];
  }

  return shape;
}

/**
 * Flatten the outer `rank` levels of a nested array
 */
export function flatten(data: NDArray, rank = Infinity): ElementValue[] {
  if (rank === 0 || !Array.isArray(data)) {
    return [data];
  }

  const result: ElementValue[] = [];

  function recurse(arr: NDArray, depth: number): void {
    if (depth === rank || !Array.isArray(arr)) {
      result.push(arr);
      return;
    }

    for (const item of arr) {
      recurse(item, depth + 1);
    }
  }

  recurse(data, 0);
  return result;
}

/**
 * Reshape a flat array into a multi-dimensional array
 */
export function reshape(data: readonly ElementValue[], shape: Shape): NDArray {
  if (shape.length === 0) {
    return data[0];
  }

  if (shape.length === 1) {
    return data.slice(0, shape[0]);
  }

  const [first, ...rest] = shape;
  const size = product(rest);
  const result: NDArray[] = [];

  for (let i = 0; i < first; i++) {
    const slice = data.slice(i * size, (i + 1) * size);
    result.push(reshape(slice, rest));
  }

  return result;
}

/**
 * Nested empty array of the given shape (at least one extent is zero)
 */
export function emptyArray(shape: Shape): NDArray {
  return reshape([], shape);
}

/**
 * Replicate `data` laid out in `from` to the shape `to`. Both shapes have the
 * same rank; every axis of `from` is 1 or equal to the matching axis of `to`.
 */
export function broadcastTo(
  data: readonly ElementValue[],
  from: Shape,
  to: Shape
): ElementValue[] {
  const rank = to.length;
  const total = product(to);
  const fromStrides = new Array<number>(rank).fill(0);
  let stride = 1;
  for (let i = rank - 1; i >= 0; i--) {
    fromStrides[i] = from[i] === 1 ? 0 : stride;
    stride *= from[i];
  }

  const result: ElementValue[] = new Array(total);
  const index = new Array<number>(rank).fill(0);
  for (let n = 0; n < total; n++) {
    let offset = 0;
    for (let i = 0; i < rank; i++) offset += index[i] * fromStrides[i];
    result[n] = data[offset];

    for (let i = rank - 1; i >= 0; i--) {
      index[i]++;
      if (index[i] < to[i]) break;
      index[i] = 0;
    }
  }

  return result;
}

/**
 * Check if two shapes are equal
 */
export function shapesEqual(a: Shape | null, b: Shape | null): boolean {
  if (a === null || b === null) {
    return a === b;
  }
  if (a.length !== b.length) {
    return false;
  }
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      return false;
    }
  }
  return true;
}

export function formatShape(shape: Shape | null): string {
  if (shape === null) return 'None';
  return shape.length === 1 ? `(${shape[0]},)` : `(${shape.join(', ')})`;
}
