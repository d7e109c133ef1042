/**
 * Transport collaborator
 *
 * The array classes never talk to a server themselves. They hand selection
 * text and packed element bytes to a `Transport`, which owns the wire,
 * authentication and retries.
 */

import type { ArrayInfo, Shape } from "../types.js";

export type Points = readonly (readonly number[])[];

export interface ValueRequest {
  /** Array id, e.g. `d-0a1b…` */
  id: string;
  /** Selection text from `Selection.getQueryParam()`; omitted for the whole array */
  select?: string;
  /** Coordinates of a point selection */
  points?: Points;
  /** Packed element bytes, for writes */
  body?: Uint8Array;
  signal?: AbortSignal;
}

export type ValueResponse =
  | { kind: "binary"; bytes: Uint8Array }
  | { kind: "json"; value: unknown };

export interface Transport {
  /** Shape, type and layout of an array */
  getArrayInfo(id: string, signal?: AbortSignal): Promise<ArrayInfo>;
  /** Read the elements named by `select` */
  getValue(request: ValueRequest): Promise<ValueResponse>;
  /** Read by points, or by a selection too long for a query string */
  postValue(request: ValueRequest): Promise<ValueResponse>;
  /** Write packed elements to the selection or points */
  putValue(request: ValueRequest): Promise<void>;
  resize(id: string, shape: Shape, signal?: AbortSignal): Promise<void>;
  close(): Promise<void>;
}
