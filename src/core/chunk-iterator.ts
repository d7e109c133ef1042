/**
 * Chunk-aligned iteration over a selection
 */

import { slice } from 'zarrita';
import type { Slice } from 'zarrita';
import type { ChunkLayout, Shape } from '../types.js';
import { Selection, SimpleSelection } from './selection.js';
import {
  InvalidSelectionError,
  ShapeMismatchError,
  UnsupportedOperationError,
} from '../errors.js';
import { formatShape, product, shapesEqual } from '../utils.js';

const CHUNK_BASE = 16 * 1024; // Multiplier by which chunks are adjusted
const CHUNK_MIN = 8 * 1024; // Soft lower limit (8k)
const CHUNK_MAX = 1024 * 1024; // Hard upper limit (1M)

/**
 * Walks the chunks a rectangular selection touches, in row-major order
 * (last axis fastest), yielding each chunk's share of the selection as one
 * slice per axis. The regions tile the selection exactly.
 *
 * One-shot: build a new iterator to walk the same selection again.
 */
export class ChunkIterator implements IterableIterator<Slice[]> {
  private readonly _layout: ChunkLayout;
  private readonly _start: number[];
  private readonly _stop: number[];
  private readonly _first: number[];
  private readonly _index: number[];
  private _done: boolean;

  constructor(shape: Shape, layout: ChunkLayout | null, selection?: Selection) {
    if (layout === null) {
      throw new UnsupportedOperationError('Chunked dataset required');
    }
    if (layout.length !== shape.length) {
      throw new ShapeMismatchError(
        `Chunk layout ${formatShape(layout)} does not match shape ${formatShape(shape)}`
      );
    }
    if (layout.some((n) => !Number.isInteger(n) || n < 1)) {
      throw new ShapeMismatchError(`Invalid chunk layout ${formatShape(layout)}`);
    }

    const sel = selection ?? Selection.all(shape);
    if (!(sel instanceof SimpleSelection)) {
      throw new InvalidSelectionError(`Chunk iteration needs a rectangular selection, got ${sel.kind}`);
    }
    if (!shapesEqual(sel.shape, shape)) {
      throw new InvalidSelectionError(
        `Selection shape ${formatShape(sel.shape)} does not match ${formatShape(shape)}`
      );
    }
    if (sel.step.some((s) => s !== 1)) {
      throw new InvalidSelectionError('Chunk iteration needs a selection with unit steps');
    }

    this._layout = layout;
    this._start = [...sel.start];
    this._stop = sel.stop;
    this._first = this._start.map((s, i) => Math.floor(s / layout[i]));
    this._index = [...this._first];
    this._done = shape.length === 0 || sel.nselect === 0;
  }

  [Symbol.iterator](): IterableIterator<Slice[]> {
    return this;
  }

  next(): IteratorResult<Slice[]> {
    const rank = this._layout.length;
    if (this._done || this._index[0] * this._layout[0] >= this._stop[0]) {
      this._done = true;
      return { done: true, value: undefined };
    }

    const region: Slice[] = [];
    for (let dim = 0; dim < rank; dim++) {
      const start = Math.max(this._index[dim] * this._layout[dim], this._start[dim]);
      const stop = Math.min((this._index[dim] + 1) * this._layout[dim], this._stop[dim]);
      region.push(slice(start, stop));
    }

    // advance the last axis, carrying into higher axes
    for (let dim = rank - 1; dim >= 0; dim--) {
      this._index[dim]++;
      if (this._index[dim] * this._layout[dim] < this._stop[dim]) {
        break;
      }
      if (dim > 0) {
        this._index[dim] = this._first[dim];
      }
    }

    return { done: false, value: region };
  }
}

/**
 * Guess a chunk layout for an array, given its shape and the size of each
 * element in bytes. Chunks are a power-of-2 fraction of each axis, sized by
 * the total array size and kept under 1 MiB. Zero extents (typically
 * growable axes) are treated as 1024.
 */
export function guessChunk(shape: Shape, typeSize: number): number[] {
  const dims = shape.map((x) => (x !== 0 ? x : 1024));
  const ndims = dims.length;
  if (ndims === 0) {
    throw new UnsupportedOperationError('Chunks not allowed for scalar datasets.');
  }
  if (!dims.every((x) => Number.isFinite(x))) {
    throw new ShapeMismatchError('Illegal value in chunk tuple');
  }

  const chunks = [...dims];
  const dsetSize = product(chunks) * typeSize;
  let targetSize = CHUNK_BASE * 2 ** Math.log10(dsetSize / (1024 * 1024));
  if (targetSize > CHUNK_MAX) {
    targetSize = CHUNK_MAX;
  } else if (targetSize < CHUNK_MIN) {
    targetSize = CHUNK_MIN;
  }

  let idx = 0;
  for (;;) {
    const chunkBytes = product(chunks) * typeSize;
    if (
      (chunkBytes < targetSize || Math.abs(chunkBytes - targetSize) / targetSize < 0.5) &&
      chunkBytes < CHUNK_MAX
    ) {
      break;
    }
    if (product(chunks) === 1) {
      break; // element larger than CHUNK_MAX
    }
    chunks[idx % ndims] = Math.ceil(chunks[idx % ndims] / 2);
    idx++;
  }

  return chunks;
}
