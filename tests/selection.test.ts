/**
 * Tests for the selection algebra
 */

import { describe, test, expect } from 'vitest';
import {
  FancySelection,
  PointSelection,
  ScalarSelection,
  Selection,
  SimpleSelection,
  parseQueryParam,
  select,
  slice,
  sliceIndices,
  translateSlice,
} from '../src/core/selection.js';
import { ELLIPSIS } from '../src/types.js';
import {
  InvalidSelectionError,
  OutOfRangeError,
  ShapeMismatchError,
  UnsupportedOperationError,
} from '../src/errors.js';

describe('select', () => {
  describe('simple selections', () => {
    test('should drop integer axes from mshape', () => {
      const sel = select([10, 10, 10], slice(2, 6, 2), 3, slice(null));
      expect(sel).toBeInstanceOf(SimpleSelection);
      expect(sel.kind).toBe('simple');
      expect(sel.mshape).toEqual([2, 10]);
      expect(sel.nselect).toBe(20);
      expect(sel.getQueryParam()).toBe('[2:6:2,3:4,0:10]');
    });

    test('should treat no terms and a lone ellipsis as the whole array', () => {
      const none = select([4, 5]);
      const dots = select([4, 5], ELLIPSIS);
      expect(none.kind).toBe('all');
      expect(dots.kind).toBe('all');
      expect(dots.mshape).toEqual([4, 5]);
      expect(dots.getQueryParam()).toBe('[0:4,0:5]');
    });

    test('should expand an ellipsis in the middle', () => {
      const sel = select([2, 3, 4, 5], 1, ELLIPSIS, slice(0, 2));
      expect(sel.mshape).toEqual([3, 4, 2]);
      expect(sel.getQueryParam()).toBe('[1:2,0:3,0:4,0:2]');
    });

    test('should resolve negative indices against the extent', () => {
      const sel = select([10], -1);
      expect(sel.mshape).toEqual([]);
      expect(sel.getQueryParam()).toBe('[9:10]');
      expect(select([10], slice(-3, null)).getQueryParam()).toBe('[7:10]');
    });

    test('should clip slice bounds to the extent', () => {
      const sel = select([10], slice(5, 100));
      expect(sel.mshape).toEqual([5]);
      expect(sel.getQueryParam()).toBe('[5:10]');
    });

    test('should select nothing when stop is before start', () => {
      const sel = select([10], slice(5, 2));
      expect(sel.nselect).toBe(0);
      expect(sel.mshape).toEqual([0]);
    });

    test('should give an empty selection on a zero extent', () => {
      const sel = select([0, 3]);
      expect(sel.nselect).toBe(0);
      expect(sel.mshape).toEqual([0, 3]);
    });

    test('should reject integer indices out of range', () => {
      expect(() => select([10], 10)).toThrow(OutOfRangeError);
      expect(() => select([10], 10)).toThrow('Index (10) out of range (0-9)');
      expect(() => select([10], -11)).toThrow(OutOfRangeError);
    });

    test('should reject steps below 1', () => {
      expect(() => select([10], slice(0, 5, 0))).toThrow('Step must be >= 1 (got 0)');
      expect(() => select([10], slice(5, 0, -1))).toThrow(InvalidSelectionError);
    });

    test('should reject more than one ellipsis', () => {
      expect(() => select([3, 3], ELLIPSIS, ELLIPSIS)).toThrow('Only one ellipsis may be used.');
    });

    test('should reject more terms than axes', () => {
      expect(() => select([3, 3], 0, 0, 0)).toThrow(
        'Argument sequence too long: 3 terms for an array of rank 2'
      );
    });

    test('should reject non-integer indices', () => {
      expect(() => select([10], 1.5)).toThrow(InvalidSelectionError);
    });
  });

  describe('fancy selections', () => {
    test('should select index lists independently per axis', () => {
      const sel = select([5, 6], [0, 2, 4], slice(1, 3));
      expect(sel).toBeInstanceOf(FancySelection);
      expect(sel.mshape).toEqual([3, 2]);
      expect(sel.nselect).toBe(6);
      expect(sel.getQueryParam()).toBe('[[0,2,4],1:3]');
    });

    test('should render integer axes bare', () => {
      const sel = select([5, 6], 2, [1, 3]);
      expect(sel.mshape).toEqual([2]);
      expect(sel.getQueryParam()).toBe('[2,[1,3]]');
    });

    test('should accept an increasing list', () => {
      const sel = select([13], [1, 2, 5]);
      expect(sel.mshape).toEqual([3]);
    });

    test('should reject decreasing lists and repeats', () => {
      expect(() => select([13], [2, 1, 3])).toThrow(InvalidSelectionError);
      expect(() => select([13], [1, 1, 2])).toThrow(
        'Indexing elements must be in increasing order with no repeats'
      );
    });

    test('should reject list entries out of range', () => {
      expect(() => select([5], [1, 5])).toThrow(OutOfRangeError);
    });

    test('should turn a per-axis boolean mask into an index list', () => {
      const sel = select([2, 4], slice(null), [true, false, true, true]);
      expect(sel).toBeInstanceOf(FancySelection);
      expect(sel.getQueryParam()).toBe('[0:2,[0,2,3]]');
      expect(sel.mshape).toEqual([2, 3]);
    });

    test('should reject a mask of the wrong length', () => {
      expect(() => select([4], [true, false])).toThrow(
        'Boolean index of length 2 does not match axis of length 4'
      );
    });
  });

  describe('point selections', () => {
    test('should take the true positions of a whole-array mask in row-major order', () => {
      const sel = select([2, 3], [[true, false, false], [false, true, true]]);
      expect(sel).toBeInstanceOf(PointSelection);
      expect(sel instanceof PointSelection && sel.points).toEqual([[0, 0], [1, 1], [1, 2]]);
      expect(sel.mshape).toEqual([3]);
      expect(sel.getQueryParam()).toBeNull();
    });

    test('should read a full-length mask on a 1-d array as points', () => {
      const sel = select([4], [true, false, true, true]);
      expect(sel).toBeInstanceOf(PointSelection);
      expect(sel instanceof PointSelection && sel.points).toEqual([[0], [2], [3]]);
      expect(sel.mshape).toEqual([3]);
    });

    test('should accept a list of coordinates', () => {
      const sel = select([4, 4], [[0, 1], [3, 3]]);
      expect(sel).toBeInstanceOf(PointSelection);
      expect(sel.nselect).toBe(2);
    });

    test('should reject coordinates outside the shape', () => {
      expect(() => select([4, 4], [[4, 0]])).toThrow(OutOfRangeError);
    });

    test('should reject a mask that does not match the shape', () => {
      expect(() => select([2, 3], [[true, false], [false, true]])).toThrow(
        'Boolean mask does not match array shape (2, 3)'
      );
    });
  });

  describe('scalar dataspace', () => {
    test('should give no mshape for () and rank 0 for ...', () => {
      const empty = select([]);
      const dots = select([], ELLIPSIS);
      expect(empty).toBeInstanceOf(ScalarSelection);
      expect(empty.mshape).toBeNull();
      expect(dots.mshape).toEqual([]);
      expect(empty.nselect).toBe(1);
    });

    test('should reject any other term', () => {
      expect(() => select([], 0)).toThrow('Illegal slicing argument for scalar dataspace');
    });
  });

  describe('selection terms', () => {
    test('should reuse a selection made for the same shape', () => {
      const sel = select([4], slice(1, 3));
      expect(select([4], sel)).toBe(sel);
    });

    test('should reject a selection made for another shape', () => {
      const sel = select([4], slice(1, 3));
      expect(() => select([5], sel)).toThrow('Mismatched selection shape: (4,) vs (5,)');
    });

    test('should reject a selection mixed with other terms', () => {
      const sel = select([4], slice(1, 3));
      expect(() => select([4], sel, 0)).toThrow('A Selection must be the only index term');
    });
  });
});

describe('Selection.all / Selection.none', () => {
  test('should cover the whole shape or nothing', () => {
    const all = Selection.all([3, 4]);
    const none = Selection.none([3, 4]);
    expect(all.kind).toBe('all');
    expect(all.nselect).toBe(12);
    expect(all.getQueryParam()).toBe('[0:3,0:4]');
    expect(none.kind).toBe('none');
    expect(none.nselect).toBe(0);
    expect(none.mshape).toEqual([0, 0]);
  });
});

describe('broadcast', () => {
  const sel = select([5, 3]);

  test('should align a rank-0 value to every axis', () => {
    expect(sel.broadcast([])).toEqual([1, 1]);
  });

  test('should align trailing axes', () => {
    expect(sel.broadcast([3])).toEqual([1, 3]);
    expect(sel.broadcast([5, 1])).toEqual([5, 1]);
    expect(sel.broadcast([1, 5, 3])).toEqual([5, 3]);
  });

  test('should reject mismatched shapes', () => {
    expect(() => sel.broadcast([4])).toThrow("Can't broadcast (4,) -> (5, 3)");
    expect(() => sel.broadcast([2, 5, 3])).toThrow(ShapeMismatchError);
  });

  test('should not broadcast fancy or point selections', () => {
    expect(() => select([5, 3], [0, 1]).broadcast([])).toThrow(UnsupportedOperationError);
    expect(() => select([5, 3], [[0, 0]]).broadcast([1])).toThrow(UnsupportedOperationError);
  });

  test('should only take single values on a scalar dataspace', () => {
    expect(select([]).broadcast([1, 1])).toEqual([]);
    expect(() => select([]).broadcast([2])).toThrow(ShapeMismatchError);
  });
});

describe('slice helpers', () => {
  test('should clamp slice bounds to the axis', () => {
    expect(sliceIndices(slice(-3, null), 10)).toEqual([7, 10, 1]);
    expect(sliceIndices(slice(null), 4)).toEqual([0, 4, 1]);
    expect(translateSlice(slice(1, 8, 3), 10)).toEqual([1, 3, 3]);
    expect(translateSlice(slice(8, 2), 10)).toEqual([8, 0, 1]);
  });
});

describe('parseQueryParam', () => {
  test('should read back rectangular query text', () => {
    const sel = parseQueryParam('[2:6:2,3:4,0:10]', [10, 10, 10]);
    expect(sel.mshape).toEqual([2, 1, 10]);
    expect(sel.getQueryParam()).toBe('[2:6:2,3:4,0:10]');
  });

  test('should read back fancy query text', () => {
    const sel = parseQueryParam('[[0,2],1:3]', [5, 6]);
    expect(sel).toBeInstanceOf(FancySelection);
    expect(sel.getQueryParam()).toBe('[[0,2],1:3]');
  });

  test('should read bare integers as integer axes', () => {
    const sel = parseQueryParam('[2,1:3]', [5, 6]);
    expect(sel.mshape).toEqual([2]);
  });

  test('should reject text without brackets', () => {
    expect(() => parseQueryParam('2:3', [5])).toThrow('Invalid selection query: 2:3');
    expect(() => parseQueryParam('[a:3]', [5])).toThrow(InvalidSelectionError);
  });
});
