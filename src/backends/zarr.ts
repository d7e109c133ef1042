// backends/zarr.ts
import * as zarr from "zarrita";
import type { DataType, Mutable, Readable, Slice } from "zarrita";
import { dtype as nativeDtype, isNumericDataType } from "../core/dtype.js";
import type { DType } from "../core/dtype.js";
import { encodeType } from "../core/type-codec.js";
import { arrayToBytes, bytesToArray } from "../core/element-codec.js";
import {
  FancySelection,
  PointSelection,
  Selection,
  SimpleSelection,
  parseQueryParam,
} from "../core/selection.js";
import type { ArrayInfo, ElementValue, MaxShape, Shape } from "../types.js";
import {
  InvalidTypeError,
  ShapeMismatchError,
  TransportError,
  UnsupportedOperationError,
} from "../errors.js";
import { product } from "../utils.js";
import type { Transport, ValueRequest, ValueResponse } from "./transport.js";

export type ZarrStore = Readable & Mutable;

type ZarrArray = zarr.Array<DataType, ZarrStore>;

export interface CreateArrayOptions {
  shape: Shape;
  chunks: Shape;
  dtype: DataType;
  /** Maximum extents, kept in the array attributes; `null` is unlimited */
  maxshape?: MaxShape;
}

/**
 * The elements a request touches: a bounding box to read or write in one
 * zarrita call, and the offset of each element inside it, in request order
 */
interface Region {
  box: Slice[];
  coords: number[][];
}

function* cartesian(axes: readonly (readonly number[])[]): Generator<number[]> {
  if (axes.some((a) => a.length === 0)) return;
  const index = axes.map(() => 0);
  for (;;) {
    yield index.map((i, d) => axes[d][i]);
    let d = axes.length - 1;
    while (d >= 0) {
      index[d]++;
      if (index[d] < axes[d].length) break;
      index[d] = 0;
      d--;
    }
    if (d < 0) return;
  }
}

function range(start: number, count: number, step: number): number[] {
  return Array.from({ length: count }, (_, i) => start + i * step);
}

function axisIndices(sel: Selection): number[][] {
  if (sel instanceof SimpleSelection) {
    return sel.start.map((s, i) => range(s, sel.count[i], sel.step[i]));
  }
  if (sel instanceof FancySelection) {
    return sel.axes.map((axis) => {
      switch (axis.type) {
        case "slice":
          return range(axis.start, axis.count, axis.step);
        case "index":
          return [axis.index];
        case "list":
          return [...axis.indices];
      }
    });
  }
  throw new UnsupportedOperationError(`Selection kind ${sel.kind} has no per-axis indices`);
}

function regionOf(points: Iterable<readonly number[]>, rank: number): Region {
  const global = Array.from(points, (p) => [...p]);
  const lo = new Array<number>(rank).fill(Infinity);
  const hi = new Array<number>(rank).fill(-Infinity);
  for (const p of global) {
    p.forEach((c, d) => {
      lo[d] = Math.min(lo[d], c);
      hi[d] = Math.max(hi[d], c);
    });
  }
  return {
    box: lo.map((l, d) => zarr.slice(l, hi[d] + 1)),
    coords: global.map((p) => p.map((c, d) => c - lo[d])),
  };
}

function parseMaxshape(value: unknown, rank: number): MaxShape | null {
  if (!Array.isArray(value) || value.length !== rank) return null;
  const out: (number | null)[] = [];
  for (const v of value) {
    if (v === null || typeof v === "number") out.push(v);
    else return null;
  }
  return out;
}

/**
 * In-process transport over a zarr v3 hierarchy. Array ids are node paths
 * under the store root. Serves the numeric data types zarrita reads into
 * plain typed arrays; elements go over the "wire" little-endian.
 */
export class ZarrTransport implements Transport {
  private readonly root: zarr.Location<ZarrStore>;

  constructor(store: ZarrStore) {
    this.root = zarr.root(store);
  }

  /**
   * Create (or replace) an array node and optionally fill it
   */
  async createArray(id: string, opts: CreateArrayOptions, data?: readonly ElementValue[]): Promise<void> {
    const { shape, chunks, dtype, maxshape } = opts;
    await zarr.create(this.root.resolve(id), {
      shape: [...shape],
      chunk_shape: [...chunks],
      data_type: dtype,
      attributes: maxshape ? { maxshape: [...maxshape] } : {},
    });
    if (data !== undefined) {
      await this.putValue({ id, body: arrayToBytes(data, this.elementType(dtype)) });
    }
  }

  private async open(id: string): Promise<ZarrArray> {
    try {
      return await zarr.open(this.root.resolve(id), { kind: "array" });
    } catch (err: unknown) {
      throw new TransportError(`No array at ${id}: ${err instanceof Error ? err.message : String(err)}`, 404);
    }
  }

  private elementType(name: DataType): DType {
    if (!isNumericDataType(name) || name === "bool") {
      throw new UnsupportedOperationError(`zarr data type ${name} is not served in process`);
    }
    return nativeDtype(name);
  }

  private region(arr: ZarrArray, request: ValueRequest): { region: Region; count: number } {
    if (arr.shape.length === 0) {
      throw new UnsupportedOperationError("Scalar zarr arrays are not served in process");
    }
    if (request.points !== undefined) {
      const sel = new PointSelection(arr.shape, request.points);
      return { region: regionOf(sel.points, arr.shape.length), count: sel.nselect };
    }
    const sel = request.select === undefined
      ? Selection.all(arr.shape)
      : parseQueryParam(request.select, arr.shape);
    const axes = axisIndices(sel);
    return { region: regionOf(cartesian(axes), arr.shape.length), count: product(axes.map((a) => a.length)) };
  }

  private async gather(arr: ZarrArray, region: Region): Promise<ElementValue[]> {
    if (region.coords.length === 0) return [];
    if (arr.is("number")) {
      const chunk = await zarr.get(arr, region.box);
      return region.coords.map((c) => chunk.data[offset(c, chunk.stride)]);
    }
    if (arr.is("bigint")) {
      const chunk = await zarr.get(arr, region.box);
      return region.coords.map((c) => chunk.data[offset(c, chunk.stride)]);
    }
    throw new UnsupportedOperationError(`zarr data type ${arr.dtype} is not served in process`);
  }

  private async scatter(arr: ZarrArray, region: Region, values: readonly ElementValue[]): Promise<void> {
    if (region.coords.length === 0) return;
    if (arr.is("number")) {
      const chunk = await zarr.get(arr, region.box);
      region.coords.forEach((c, i) => {
        const v = values[i];
        if (typeof v !== "number") throw new InvalidTypeError(`Expected a number, got ${typeof v}`);
        chunk.data[offset(c, chunk.stride)] = v;
      });
      await zarr.set(arr, region.box, chunk);
      return;
    }
    if (arr.is("bigint")) {
      const chunk = await zarr.get(arr, region.box);
      region.coords.forEach((c, i) => {
        const v = values[i];
        if (typeof v !== "bigint") throw new InvalidTypeError(`Expected a bigint, got ${typeof v}`);
        chunk.data[offset(c, chunk.stride)] = v;
      });
      await zarr.set(arr, region.box, chunk);
      return;
    }
    throw new UnsupportedOperationError(`zarr data type ${arr.dtype} is not served in process`);
  }

  // ------------------------------- Transport --------------------------------
  async getArrayInfo(id: string): Promise<ArrayInfo> {
    const arr = await this.open(id);
    const type = encodeType(this.elementType(arr.dtype));
    return {
      id,
      shape: arr.shape,
      maxshape: parseMaxshape(arr.attrs.maxshape, arr.shape.length),
      type,
      chunks: arr.chunks,
    };
  }

  async getValue(request: ValueRequest): Promise<ValueResponse> {
    const arr = await this.open(request.id);
    const dt = this.elementType(arr.dtype);
    const { region } = this.region(arr, request);
    const values = await this.gather(arr, region);
    return { kind: "binary", bytes: arrayToBytes(values, dt) };
  }

  async postValue(request: ValueRequest): Promise<ValueResponse> {
    return this.getValue(request);
  }

  async putValue(request: ValueRequest): Promise<void> {
    const arr = await this.open(request.id);
    const dt = this.elementType(arr.dtype);
    const { region, count } = this.region(arr, request);
    const values = bytesToArray(request.body ?? new Uint8Array(0), dt, count);
    await this.scatter(arr, region, values);
  }

  /**
   * Rewrite the array metadata with the new shape. The chunk grid is kept,
   * so stored chunks stay where they are.
   */
  async resize(id: string, shape: Shape): Promise<void> {
    const arr = await this.open(id);
    if (shape.length !== arr.shape.length) {
      throw new ShapeMismatchError(`Resize must keep rank ${arr.shape.length}`);
    }
    const maxshape = parseMaxshape(arr.attrs.maxshape, arr.shape.length);
    await zarr.create(this.root.resolve(id), {
      shape: [...shape],
      chunk_shape: [...arr.chunks],
      data_type: arr.dtype,
      attributes: maxshape ? { maxshape: [...maxshape] } : {},
    });
  }

  async close(): Promise<void> {
    // nothing held open
  }
}

function offset(coord: readonly number[], stride: readonly number[]): number {
  let o = 0;
  for (let i = 0; i < coord.length; i++) o += coord[i] * stride[i];
  return o;
}
