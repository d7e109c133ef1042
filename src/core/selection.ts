/**
 * Selection algebra
 *
 * Classifies an index expression against an array shape and computes what
 * it selects: per-axis start/count/step for rectangular selections, per-axis
 * index lists for fancy selections, or a flat list of coordinates. Each
 * selection knows the shape of its result (`mshape`), how many elements it
 * covers (`nselect`) and how to render itself as the `select` query
 * parameter of a value request.
 */

import { slice } from 'zarrita';
import type { Slice } from 'zarrita';
import { ELLIPSIS, IndexTerm, Shape } from '../types.js';
import {
  InvalidSelectionError,
  OutOfRangeError,
  ShapeMismatchError,
  UnsupportedOperationError,
} from '../errors.js';
import { formatShape, product, shapesEqual } from '../utils.js';

export { slice };

export type SelectionKind = 'all' | 'none' | 'simple' | 'fancy' | 'points' | 'scalar';

/**
 * Anything accepted where an index term is expected. A `Selection` is only
 * valid as the sole term.
 */
export type Selector = IndexTerm | Selection;

export abstract class Selection {
  abstract readonly kind: SelectionKind;

  protected constructor(protected readonly _shape: Shape) {}

  /** Shape of the array the selection applies to */
  get shape(): Shape {
    return this._shape;
  }

  /**
   * Shape of the result of applying the selection; `null` for the empty
   * `()` selection on a scalar dataspace
   */
  abstract get mshape(): Shape | null;

  /** Number of selected elements */
  abstract get nselect(): number;

  /**
   * Selection text for the `select` query parameter, or `null` when the
   * selection has no textual form
   */
  getQueryParam(): string | null {
    return null;
  }

  /**
   * Check that data of `targetShape` can be written to this selection and
   * return it aligned to `mshape`, with 1 on broadcast axes
   */
  broadcast(targetShape: Shape): Shape {
    throw new UnsupportedOperationError(
      `Broadcasting is not supported for ${this.kind} selections (got ${formatShape(targetShape)})`
    );
  }

  static all(shape: Shape): SimpleSelection {
    return new SimpleSelection(
      shape,
      shape.map(() => 0),
      [...shape],
      shape.map(() => 1),
      shape.map(() => false),
      'all'
    );
  }

  static none(shape: Shape): SimpleSelection {
    return new SimpleSelection(
      shape,
      shape.map(() => 0),
      shape.map(() => 0),
      shape.map(() => 1),
      shape.map(() => false),
      'none'
    );
  }
}

// ---------------------------------------------------------------------------
// Simple (hyperslab) selections
// ---------------------------------------------------------------------------

export class SimpleSelection extends Selection {
  readonly kind: 'all' | 'none' | 'simple';
  readonly start: readonly number[];
  readonly count: readonly number[];
  readonly step: readonly number[];
  /** Axes indexed by a bare integer; they are dropped from `mshape` */
  readonly scalar: readonly boolean[];

  constructor(
    shape: Shape,
    start: readonly number[],
    count: readonly number[],
    step: readonly number[],
    scalar: readonly boolean[],
    kind: 'all' | 'none' | 'simple' = 'simple'
  ) {
    super(shape);
    this.start = start;
    this.count = count;
    this.step = step;
    this.scalar = scalar;
    this.kind = kind;
  }

  /** Exclusive stop per axis, clipped to the extent */
  get stop(): number[] {
    return this.start.map((s, i) => Math.min(s + this.count[i] * this.step[i], this._shape[i]));
  }

  get mshape(): Shape {
    return this.count.filter((_, i) => !this.scalar[i]);
  }

  get nselect(): number {
    return product(this.count);
  }

  getQueryParam(): string | null {
    if (this._shape.length === 0) return null;
    const stop = this.stop;
    const axes = this.start.map((s, i) => formatRange(s, stop[i], this.step[i]));
    return `[${axes.join(',')}]`;
  }

  broadcast(targetShape: Shape): Shape {
    const mshape = this.mshape;
    const target = [...targetShape];
    const aligned: number[] = [];

    for (let i = mshape.length - 1; i >= 0; i--) {
      const t = target.pop();
      if (t === undefined) {
        aligned.push(1);
      } else if (t === 1 || t === mshape[i]) {
        aligned.push(t);
      } else {
        throw new ShapeMismatchError(
          `Can't broadcast ${formatShape(targetShape)} -> ${formatShape(mshape)}`
        );
      }
    }
    if (target.some((t) => t !== 1)) {
      throw new ShapeMismatchError(
        `Can't broadcast ${formatShape(targetShape)} -> ${formatShape(mshape)}`
      );
    }
    return aligned.reverse();
  }
}

function formatRange(start: number, stop: number, step: number): string {
  return step === 1 ? `${start}:${stop}` : `${start}:${stop}:${step}`;
}

// ---------------------------------------------------------------------------
// Fancy selections
// ---------------------------------------------------------------------------

export type FancyAxis =
  | { type: 'slice'; start: number; count: number; step: number }
  | { type: 'index'; index: number }
  | { type: 'list'; indices: readonly number[] };

/**
 * Slices, integers and increasing index lists mixed across axes. Each list
 * selects independently along its own axis.
 */
export class FancySelection extends Selection {
  readonly kind = 'fancy' as const;

  constructor(shape: Shape, readonly axes: readonly FancyAxis[]) {
    super(shape);
  }

  get mshape(): Shape {
    const mshape: number[] = [];
    for (const axis of this.axes) {
      if (axis.type === 'slice') mshape.push(axis.count);
      else if (axis.type === 'list') mshape.push(axis.indices.length);
    }
    return mshape;
  }

  get nselect(): number {
    return product(this.mshape);
  }

  getQueryParam(): string {
    const axes = this.axes.map((axis, i) => {
      switch (axis.type) {
        case 'slice':
          return formatRange(
            axis.start,
            Math.min(axis.start + axis.count * axis.step, this._shape[i]),
            axis.step
          );
        case 'index':
          return String(axis.index);
        case 'list':
          return `[${axis.indices.join(',')}]`;
      }
    });
    return `[${axes.join(',')}]`;
  }
}

// ---------------------------------------------------------------------------
// Point selections
// ---------------------------------------------------------------------------

export class PointSelection extends Selection {
  readonly kind = 'points' as const;

  constructor(shape: Shape, readonly points: readonly (readonly number[])[]) {
    super(shape);
  }

  get mshape(): Shape {
    return [this.points.length];
  }

  get nselect(): number {
    return this.points.length;
  }
}

// ---------------------------------------------------------------------------
// Scalar dataspace selections
// ---------------------------------------------------------------------------

export class ScalarSelection extends Selection {
  readonly kind = 'scalar' as const;

  constructor(private readonly _mshape: Shape | null) {
    super([]);
  }

  get mshape(): Shape | null {
    return this._mshape;
  }

  get nselect(): number {
    return 1;
  }

  broadcast(targetShape: Shape): Shape {
    if (product(targetShape) !== 1) {
      throw new ShapeMismatchError(`Can't broadcast ${formatShape(targetShape)} to scalar`);
    }
    return [];
  }
}

// ---------------------------------------------------------------------------
// Index term translation
// ---------------------------------------------------------------------------

function isSlice(term: Selector): term is Slice {
  return (
    typeof term === 'object' &&
    !Array.isArray(term) &&
    !(term instanceof Selection) &&
    'start' in term &&
    'stop' in term &&
    'step' in term
  );
}

function checkInteger(value: unknown, what: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new InvalidSelectionError(`Illegal ${what} "${String(value)}" (must be an integer)`);
  }
  return value;
}

/**
 * Resolve a slice against an axis length: negative bounds count from the end
 * and out-of-range bounds clamp. Only positive steps are accepted.
 */
export function sliceIndices(
  { start, stop, step }: Slice,
  length: number
): [start: number, stop: number, step: number] {
  const s = step === null ? 1 : checkInteger(step, 'slice step');
  if (s < 1) {
    throw new InvalidSelectionError(`Step must be >= 1 (got ${s})`);
  }

  let a = start === null ? 0 : checkInteger(start, 'slice start');
  if (a < 0) a = Math.max(a + length, 0);
  else if (a > length) a = length;

  let b = stop === null ? length : checkInteger(stop, 'slice stop');
  if (b < 0) b = Math.max(b + length, 0);
  else if (b > length) b = length;

  return [a, b, s];
}

/**
 * Start, count and step of a slice on an axis; a stop before the start
 * selects nothing
 */
export function translateSlice(sl: Slice, length: number): [start: number, count: number, step: number] {
  const [start, stop, step] = sliceIndices(sl, length);
  const count = stop <= start ? 0 : 1 + Math.floor((stop - start - 1) / step);
  return [start, count, step];
}

function translateInt(index: unknown, length: number): number {
  let i = checkInteger(index, 'index');
  if (i < 0) i += length;
  if (i < 0 || i >= length) {
    throw new OutOfRangeError(`Index (${String(index)}) out of range (0-${length - 1})`);
  }
  return i;
}

function expandEllipsis(terms: readonly IndexTerm[], rank: number): IndexTerm[] {
  const nEllipsis = terms.filter((t) => t === ELLIPSIS).length;
  if (nEllipsis > 1) {
    throw new InvalidSelectionError('Only one ellipsis may be used.');
  }
  const args: IndexTerm[] = nEllipsis === 0 ? [...terms, ELLIPSIS] : [...terms];

  const expanded: IndexTerm[] = [];
  for (const term of args) {
    if (term === ELLIPSIS) {
      const fill = rank - args.length + 1;
      for (let i = 0; i < fill; i++) expanded.push(slice(null));
    } else {
      expanded.push(term);
    }
  }
  if (expanded.length > rank) {
    throw new InvalidSelectionError(
      `Argument sequence too long: ${terms.length} terms for an array of rank ${rank}`
    );
  }
  return expanded;
}

function isNumberList(items: readonly unknown[]): items is readonly number[] {
  return items.every((v) => typeof v === 'number');
}

function isBooleanList(items: readonly unknown[]): items is readonly boolean[] {
  return items.length > 0 && items.every((v) => typeof v === 'boolean');
}

function translateList(items: readonly unknown[], length: number): number[] {
  if (isBooleanList(items)) {
    if (items.length !== length) {
      throw new InvalidSelectionError(
        `Boolean index of length ${items.length} does not match axis of length ${length}`
      );
    }
    const indices: number[] = [];
    items.forEach((b, i) => {
      if (b) indices.push(i);
    });
    return indices;
  }
  if (!isNumberList(items)) {
    throw new InvalidSelectionError('Boolean indexing arrays must be 1-D');
  }

  const indices = items.map((v) => translateInt(v, length));
  for (let i = 1; i < indices.length; i++) {
    if (indices[i] <= indices[i - 1]) {
      throw new InvalidSelectionError(
        'Indexing elements must be in increasing order with no repeats'
      );
    }
  }
  return indices;
}

/**
 * Coordinates of the `true` elements of a whole-array mask, in row-major
 * order
 */
function maskToPoints(mask: readonly unknown[], shape: Shape): number[][] {
  const points: number[][] = [];

  function walk(node: unknown, depth: number, prefix: number[]): void {
    if (depth === shape.length) {
      if (typeof node !== 'boolean') {
        throw new InvalidSelectionError('Boolean mask must contain only booleans');
      }
      if (node) points.push(prefix);
      return;
    }
    if (!Array.isArray(node) || node.length !== shape[depth]) {
      throw new InvalidSelectionError(
        `Boolean mask does not match array shape ${formatShape(shape)}`
      );
    }
    node.forEach((child: unknown, i: number) => walk(child, depth + 1, [...prefix, i]));
  }

  walk(mask, 0, []);
  return points;
}

function checkPoints(items: readonly unknown[], shape: Shape): number[][] {
  return items.map((item) => {
    if (!Array.isArray(item) || item.length !== shape.length || !isNumberList(item)) {
      throw new InvalidSelectionError(
        `Point coordinates must be integer lists of length ${shape.length}`
      );
    }
    return item.map((c, axis) => {
      const i = checkInteger(c, 'point coordinate');
      if (i < 0 || i >= shape[axis]) {
        throw new OutOfRangeError(
          `Point coordinate ${i} out of range (0-${shape[axis] - 1}) on axis ${axis}`
        );
      }
      return i;
    });
  });
}

function isNested(items: readonly unknown[]): boolean {
  return items.length > 0 && Array.isArray(items[0]);
}

function isFullSlice(sl: Slice): boolean {
  return sl.start === null && sl.stop === null && (sl.step === null || sl.step === 1);
}

/**
 * Build the selection an index expression denotes on an array of `shape`
 *
 * @example
 * ```ts
 * const sel = select([10, 10, 10], slice(2, 6, 2), 3, slice(null));
 * sel.mshape; // [2, 10]
 * sel.getQueryParam(); // '[2:6:2,3:4,0:10]'
 * ```
 */
export function select(shape: Shape, ...terms: readonly Selector[]): Selection {
  if (terms.length === 1) {
    const only = terms[0];
    if (only instanceof Selection) {
      if (!shapesEqual(only.shape, shape)) {
        throw new InvalidSelectionError(
          `Mismatched selection shape: ${formatShape(only.shape)} vs ${formatShape(shape)}`
        );
      }
      return only;
    }
  }

  const indexTerms: IndexTerm[] = [];
  for (const term of terms) {
    if (term instanceof Selection) {
      throw new InvalidSelectionError('A Selection must be the only index term');
    }
    indexTerms.push(term);
  }

  if (shape.length === 0) {
    if (indexTerms.length === 0) return new ScalarSelection(null);
    if (indexTerms.length === 1 && indexTerms[0] === ELLIPSIS) return new ScalarSelection([]);
    throw new InvalidSelectionError('Illegal slicing argument for scalar dataspace');
  }

  if (indexTerms.length === 1) {
    const only = indexTerms[0];
    if (shape.length === 1 && Array.isArray(only) && isBooleanList(only) && only.length === shape[0]) {
      return new PointSelection(shape, maskToPoints(only, shape));
    }
    if (Array.isArray(only) && isNested(only)) {
      const items: readonly unknown[] = only;
      if (shape.length > 1 && !isNumberList(flattenOnce(items))) {
        return new PointSelection(shape, maskToPoints(items, shape));
      }
      return new PointSelection(shape, checkPoints(items, shape));
    }
  }

  const args = expandEllipsis(indexTerms, shape.length);
  const rank = shape.length;

  const isFancy = args.some((t) => Array.isArray(t));
  if (isFancy) {
    const axes: FancyAxis[] = args.map((term, i): FancyAxis => {
      if (typeof term === 'number') {
        return { type: 'index', index: translateInt(term, shape[i]) };
      }
      if (isSlice(term)) {
        const [start, count, step] = translateSlice(term, shape[i]);
        return { type: 'slice', start, count, step };
      }
      if (Array.isArray(term)) {
        const items: readonly unknown[] = term;
        return { type: 'list', indices: translateList(items, shape[i]) };
      }
      throw new InvalidSelectionError(`Illegal index "${String(term)}"`);
    });
    return new FancySelection(shape, axes);
  }

  const start: number[] = [];
  const count: number[] = [];
  const step: number[] = [];
  const scalar: boolean[] = [];
  let whole = true;

  for (let i = 0; i < rank; i++) {
    const term = args[i];
    if (isSlice(term)) {
      const [a, n, s] = translateSlice(term, shape[i]);
      start.push(a);
      count.push(n);
      step.push(s);
      scalar.push(false);
      whole = whole && isFullSlice(term);
    } else if (typeof term === 'number') {
      start.push(translateInt(term, shape[i]));
      count.push(1);
      step.push(1);
      scalar.push(true);
      whole = false;
    } else {
      throw new InvalidSelectionError(
        `Illegal index "${String(term)}" (must be a slice or number)`
      );
    }
  }

  return new SimpleSelection(shape, start, count, step, scalar, whole ? 'all' : 'simple');
}

function flattenOnce(items: readonly unknown[]): unknown[] {
  const out: unknown[] = [];
  for (const item of items) {
    if (Array.isArray(item)) out.push(...item);
    else out.push(item);
  }
  return out;
}

// ---------------------------------------------------------------------------
// Query text
// ---------------------------------------------------------------------------

function splitTopLevel(text: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = '';
  for (const ch of text) {
    if (ch === '[') depth++;
    if (ch === ']') depth--;
    if (ch === ',' && depth === 0) {
      parts.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  parts.push(current);
  return parts;
}

function parseInteger(text: string, query: string): number {
  const trimmed = text.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new InvalidSelectionError(`Invalid selection query: ${query}`);
  }
  return Number(trimmed);
}

/**
 * Parse the text produced by `getQueryParam()` back into a selection on
 * `shape`. Integer axes of a rectangular selection come back as length-1
 * ranges.
 */
export function parseQueryParam(text: string, shape: Shape): Selection {
  const query = text.trim();
  if (!query.startsWith('[') || !query.endsWith(']')) {
    throw new InvalidSelectionError(`Invalid selection query: ${text}`);
  }

  const terms: IndexTerm[] = splitTopLevel(query.slice(1, -1)).map((part) => {
    const p = part.trim();
    if (p.startsWith('[')) {
      if (!p.endsWith(']')) {
        throw new InvalidSelectionError(`Invalid selection query: ${text}`);
      }
      const inner = p.slice(1, -1).trim();
      return inner.length === 0 ? [] : inner.split(',').map((v) => parseInteger(v, text));
    }
    if (p.includes(':')) {
      const fields = p.split(':');
      if (fields.length > 3) {
        throw new InvalidSelectionError(`Invalid selection query: ${text}`);
      }
      const [a, b, c] = fields.map((f) => (f.trim() === '' ? null : parseInteger(f, text)));
      return slice(a ?? null, b ?? null, c ?? null);
    }
    return parseInteger(p, text);
  });

  return select(shape, ...terms);
}
