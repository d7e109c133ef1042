/**
 * RemoteArray - a handle on one array held by a remote service
 */

import type { Slice } from 'zarrita';
import {
  ArrayInfo,
  ChunkLayout,
  Dataspace,
  ElementValue,
  ELLIPSIS,
  Empty,
  MaxShape,
  NDArray,
  Shape,
} from './types.js';
import type { DType } from './core/dtype.js';
import { decodeType, dtypeItemSize, H5T_VARIABLE } from './core/type-codec.js';
import type { TypeItem, Variable } from './core/type-codec.js';
import { arrayToBytes, bytesToArray, jsonToArray } from './core/element-codec.js';
import {
  FancySelection,
  PointSelection,
  ScalarSelection,
  Selection,
  SimpleSelection,
  select,
} from './core/selection.js';
import type { Selector } from './core/selection.js';
import { ChunkIterator, guessChunk } from './core/chunk-iterator.js';
import type { ConnectionHandle, ConnectionRegistry } from './core/registry.js';
import type { Transport, ValueResponse } from './backends/transport.js';
import {
  InvalidSelectionError,
  PayloadTooLargeError,
  ShapeMismatchError,
  UnsupportedOperationError,
} from './errors.js';
import {
  broadcastTo,
  emptyArray,
  flatten,
  formatShape,
  getShape,
  product,
  reshape,
  shapesEqual,
} from './utils.js';

/** Fancy selections whose query text is longer than this are sent in a POST body */
const MAX_QUERY_LENGTH = 100;

export interface TransferOptions {
  signal?: AbortSignal;
}

export interface ChunkData {
  selection: Slice[];
  data: NDArray;
}

/**
 * Nesting levels an element of `dt` adds below the array axes
 */
function elementRank(dt: DType): number {
  switch (dt.kind) {
    case 'array':
      return dt.shape.length + elementRank(dt.base);
    case 'vlen':
      return 1 + elementRank(dt.base);
    default:
      return 0;
  }
}

/**
 * Extents of the outer `rank` levels of a JSON value
 */
function jsonShape(value: unknown, rank: number): number[] {
  const shape: number[] = [];
  let current = value;
  while (Array.isArray(current) && shape.length < rank) {
    shape.push(current.length);
    current = current.length > 0 ? current[0] : undefined;
  }
  return shape;
}

function isNullSelection(terms: readonly Selector[]): boolean {
  return terms.length === 0 || (terms.length === 1 && terms[0] === ELLIPSIS);
}

/**
 * Copy a page laid out in `pageShape` into `target` (laid out in `shape`),
 * offset by `offset` along `axis`
 */
function placePage(
  target: ElementValue[],
  shape: Shape,
  page: readonly ElementValue[],
  pageShape: Shape,
  axis: number,
  offset: number
): void {
  const rank = shape.length;
  const strides = new Array<number>(rank).fill(1);
  for (let i = rank - 2; i >= 0; i--) strides[i] = strides[i + 1] * shape[i + 1];

  const index = new Array<number>(rank).fill(0);
  for (let n = 0; n < page.length; n++) {
    let pos = 0;
    for (let i = 0; i < rank; i++) {
      pos += (i === axis ? index[i] + offset : index[i]) * strides[i];
    }
    target[pos] = page[n];

    for (let i = rank - 1; i >= 0; i--) {
      index[i]++;
      if (index[i] < pageShape[i]) break;
      index[i] = 0;
    }
  }
}

export class RemoteArray {
  private readonly _info: ArrayInfo;
  private readonly _dtype: DType;
  private readonly _registry: ConnectionRegistry<Transport>;
  private readonly _handle: ConnectionHandle;
  private _shape: Dataspace;

  constructor(info: ArrayInfo, registry: ConnectionRegistry<Transport>, handle: ConnectionHandle) {
    this._info = info;
    this._dtype = decodeType(info.type);
    this._registry = registry;
    this._handle = handle;
    this._shape = info.shape === null ? null : [...info.shape];
  }

  /**
   * Fetch the metadata of array `id` and return a handle on it
   */
  static async open(
    registry: ConnectionRegistry<Transport>,
    handle: ConnectionHandle,
    id: string,
    options: TransferOptions = {}
  ): Promise<RemoteArray> {
    const info = await registry.resolve(handle).getArrayInfo(id, options.signal);
    return new RemoteArray(info, registry, handle);
  }

  // ---- properties ----

  get id(): string {
    return this._info.id;
  }

  /** Current extents; `null` for a null dataspace */
  get shape(): Dataspace {
    return this._shape;
  }

  get maxshape(): MaxShape | null {
    return this._info.maxshape ?? null;
  }

  get chunks(): ChunkLayout | null {
    return this._info.chunks;
  }

  get dtype(): DType {
    return this._dtype;
  }

  get typeItem(): TypeItem {
    return this._info.type;
  }

  get ndim(): number {
    return this._shape === null ? 0 : this._shape.length;
  }

  get size(): number {
    return this._shape === null ? 0 : product(this._shape);
  }

  get itemSize(): number | Variable {
    return dtypeItemSize(this._dtype);
  }

  private get transport(): Transport {
    return this._registry.resolve(this._handle);
  }

  /**
   * Selection an index expression denotes on this array
   */
  select(...terms: Selector[]): Selection {
    if (this._shape === null) {
      throw new InvalidSelectionError('Null dataspace has no selectable elements');
    }
    return select(this._shape, ...terms);
  }

  // ---- reading ----

  async read(...terms: Selector[]): Promise<NDArray | Empty> {
    return this.readAt(terms);
  }

  async readAt(terms: readonly Selector[], options: TransferOptions = {}): Promise<NDArray | Empty> {
    if (this._shape === null) {
      if (isNullSelection(terms)) return new Empty();
      throw new InvalidSelectionError('Null dataspace can only be read with () or ...');
    }
    return this.readSelection(select(this._shape, ...terms), options);
  }

  /**
   * Read the elements of a selection as nested arrays of its `mshape`
   */
  async readSelection(sel: Selection, options: TransferOptions = {}): Promise<NDArray> {
    const { signal } = options;

    if (sel instanceof ScalarSelection) {
      const res = await this.transport.getValue({ id: this.id, signal });
      return this.decode(res, 1, [])[0];
    }

    const mshape = sel.mshape ?? [];
    if (sel.nselect === 0) {
      return emptyArray(mshape);
    }

    if (sel instanceof SimpleSelection) {
      return reshape(await this.readPaged(sel, signal), mshape);
    }

    if (sel instanceof FancySelection) {
      const query = sel.getQueryParam();
      const request = { id: this.id, select: query, signal };
      const res = query.length > MAX_QUERY_LENGTH
        ? await this.transport.postValue(request)
        : await this.transport.getValue(request);
      return reshape(this.decode(res, sel.nselect, mshape), mshape);
    }

    if (sel instanceof PointSelection) {
      const res = await this.transport.postValue({ id: this.id, points: sel.points, signal });
      return reshape(this.decode(res, sel.nselect, mshape), mshape);
    }

    throw new UnsupportedOperationError(`Cannot read a ${sel.kind} selection`);
  }

  /**
   * Read a rectangular selection in pages of whole chunk rows along the
   * axis that crosses the most chunks. A page the service refuses as too
   * large halves the page size and starts over.
   */
  private async readPaged(sel: SimpleSelection, signal?: AbortSignal): Promise<ElementValue[]> {
    const shape = sel.shape;
    const mshape = sel.mshape;
    const stop = sel.stop;
    const itemSize = this.itemSize;
    const layout = this.chunks ?? guessChunk(shape, itemSize === H5T_VARIABLE ? 8 : itemSize);

    let split = -1;
    let maxChunks = 1;
    for (let i = 0; i < shape.length; i++) {
      if (sel.scalar[i]) continue;
      const n = Math.ceil((stop[i] - sel.start[i]) / layout[i]);
      if (split < 0 || n > maxChunks) {
        split = i;
        maxChunks = n;
      }
    }

    if (split < 0) {
      const res = await this.transport.getValue({
        id: this.id,
        select: sel.getQueryParam() ?? undefined,
        signal,
      });
      return this.decode(res, sel.nselect, mshape, sel.count);
    }

    const axis = sel.scalar.slice(0, split).filter((s) => !s).length;
    const step = sel.step[split];
    let chunksPerPage = maxChunks;

    for (;;) {
      const result: ElementValue[] = new Array(sel.nselect);
      const rows = chunksPerPage * layout[split];
      let pageStart = sel.start[split];
      let offset = 0;
      let tooLarge = false;

      while (pageStart < stop[split]) {
        let pageStop = pageStart + rows;
        const rem = (pageStop - sel.start[split]) % step;
        if (rem !== 0) pageStop += step - rem;
        pageStop = Math.min(pageStop, stop[split]);

        const count = [...sel.count];
        count[split] = Math.floor((pageStop - pageStart - 1) / step) + 1;
        const start = [...sel.start];
        start[split] = pageStart;
        const page = new SimpleSelection(shape, start, count, sel.step, sel.scalar);

        let res: ValueResponse;
        try {
          res = await this.transport.getValue({
            id: this.id,
            select: page.getQueryParam() ?? undefined,
            signal,
          });
        } catch (err: unknown) {
          if (err instanceof PayloadTooLargeError && chunksPerPage > 1) {
            chunksPerPage = Math.floor(chunksPerPage / 2);
            tooLarge = true;
            break;
          }
          throw err;
        }

        const pageShape = page.mshape;
        placePage(result, mshape, this.decode(res, page.nselect, pageShape, page.count), pageShape, axis, offset);
        offset += count[split];
        pageStart += count[split] * step;
      }

      if (!tooLarge) return result;
    }
  }

  /**
   * Flat element values of a response. A JSON reply may keep the integer
   * axes of a hyperslab as length-1 axes (`queryShape`) or drop them
   * (`shape`).
   */
  private decode(
    res: ValueResponse,
    count: number,
    shape: Shape,
    queryShape: Shape = shape
  ): ElementValue[] {
    if (res.kind === 'binary') {
      return bytesToArray(res.bytes, this._dtype, count);
    }
    const layout = shapesEqual(jsonShape(res.value, queryShape.length), queryShape) ? queryShape : shape;
    return flatten(jsonToArray(res.value, this._dtype, layout), layout.length);
  }

  // ---- writing ----

  async write(value: NDArray | Empty, ...terms: Selector[]): Promise<void> {
    return this.writeAt(terms, value);
  }

  async writeAt(
    terms: readonly Selector[],
    value: NDArray | Empty,
    options: TransferOptions = {}
  ): Promise<void> {
    if (this._shape === null) {
      if (!isNullSelection(terms)) {
        throw new InvalidSelectionError('Null dataspace can only be written with () or ...');
      }
      if (!(value instanceof Empty)) {
        throw new ShapeMismatchError('Only Empty can be written to a null dataspace');
      }
      return;
    }
    if (value instanceof Empty) {
      throw new ShapeMismatchError(`Cannot write Empty to shape ${formatShape(this._shape)}`);
    }
    return this.writeSelection(select(this._shape, ...terms), value, options);
  }

  /**
   * Write `value` to a selection, broadcasting it to `mshape` where the
   * selection allows
   */
  async writeSelection(sel: Selection, value: NDArray, options: TransferOptions = {}): Promise<void> {
    const { signal } = options;
    if (sel.nselect === 0) return;

    const mshape = sel.mshape ?? [];
    const full = getShape(value);
    const valueShape = full.slice(0, Math.max(0, full.length - elementRank(this._dtype)));

    let data: ElementValue[];
    if (shapesEqual(valueShape, mshape)) {
      data = flatten(value, mshape.length);
    } else {
      const aligned = sel.broadcast(valueShape);
      data = broadcastTo(flatten(value, valueShape.length), aligned, mshape);
    }
    if (data.length !== sel.nselect) {
      throw new ShapeMismatchError(
        `Value of shape ${formatShape(valueShape)} does not fill selection ${formatShape(mshape)}`
      );
    }

    const body = arrayToBytes(data, this._dtype);
    if (sel instanceof PointSelection) {
      await this.transport.putValue({ id: this.id, points: sel.points, body, signal });
      return;
    }
    const omitSelect = sel.kind === 'all' || sel.kind === 'scalar';
    await this.transport.putValue({
      id: this.id,
      select: omitSelect ? undefined : sel.getQueryParam() ?? undefined,
      body,
      signal,
    });
  }

  // ---- shape ----

  /**
   * Change the extents of a chunked array within its `maxshape`
   */
  async resize(shape: Shape, options: TransferOptions = {}): Promise<void> {
    if (this.chunks === null) {
      throw new UnsupportedOperationError('Only chunked datasets can be resized');
    }
    const current = this._shape;
    if (current === null || shape.length !== current.length) {
      throw new ShapeMismatchError(
        `Resize to ${formatShape(shape)} must keep the rank of ${formatShape(current)}`
      );
    }
    const maxshape = this.maxshape ?? current;
    shape.forEach((n, i) => {
      const limit = maxshape[i];
      if (!Number.isInteger(n) || n < 0 || (limit !== null && n > limit)) {
        throw new ShapeMismatchError(
          `Extent ${n} of axis ${i} is outside the maximum ${limit === null ? 'unlimited' : limit}`
        );
      }
    });
    await this.transport.resize(this.id, shape, options.signal);
    this._shape = [...shape];
  }

  // ---- chunks ----

  /**
   * Chunk-aligned regions of a rectangular selection
   */
  iterChunks(...terms: Selector[]): ChunkIterator {
    if (this._shape === null || this._shape.length === 0) {
      throw new UnsupportedOperationError('Chunk iteration needs an array of rank 1 or more');
    }
    const sel = terms.length === 0 ? undefined : select(this._shape, ...terms);
    return new ChunkIterator(this._shape, this.chunks, sel);
  }

  /**
   * Read a selection one chunk region at a time
   */
  async *readChunks(...terms: Selector[]): AsyncGenerator<ChunkData> {
    const regions = this.iterChunks(...terms);
    const shape = this._shape;
    if (shape === null) return;
    for (const region of regions) {
      yield { selection: region, data: await this.readSelection(select(shape, ...region)) };
    }
  }
}
