/**
 * Unit tests for weighted layout.
 */

import { describe, it, expect } from 'vitest';
import { createBounds } from '../../src/core/bounds.js';
import { distributeBounds } from '../../src/core/layout.js';

describe('distributeBounds', () => {
  it('returns nothing for no children', () => {
    expect(distributeBounds(createBounds({ width: 10, height: 10 }), [], 'column')).toEqual([]);
  });

  it('splits a column along y in proportion to weight', () => {
    const slots = distributeBounds(createBounds({ width: 100, height: 90 }), [1, 2], 'column');
    expect(slots).toEqual([
      { width: 100, height: 30, x: 0, y: 0 },
      { width: 100, height: 60, x: 0, y: 30 },
    ]);
  });

  it('splits a row along x starting at the origin', () => {
    const slots = distributeBounds(createBounds({ width: 10, height: 5, x: 2, y: 3 }), [1, 1, 1], 'row');
    expect(slots).toEqual([
      { width: 3, height: 5, x: 2, y: 3 },
      { width: 3, height: 5, x: 5, y: 3 },
      { width: 3, height: 5, x: 8, y: 3 },
    ]);
  });

  it('floors each share and leaves the remainder unassigned', () => {
    const slots = distributeBounds(createBounds({ width: 4, height: 100 }), [1, 2], 'column');
    expect(slots.map((s) => s.height)).toEqual([33, 66]);
    expect(slots[1].y).toBe(33);
  });

  it('gives zero size when the total weight is zero', () => {
    const slots = distributeBounds(createBounds({ width: 10, height: 10 }), [0, 0], 'row');
    expect(slots).toEqual([
      { width: 0, height: 10, x: 0, y: 0 },
      { width: 0, height: 10, x: 0, y: 0 },
    ]);
  });

  it('gives a zero-weight child no space among weighted siblings', () => {
    const slots = distributeBounds(createBounds({ width: 12, height: 1 }), [1, 0, 2], 'row');
    expect(slots.map((s) => [s.x, s.width])).toEqual([
      [0, 4],
      [4, 0],
      [4, 8],
    ]);
  });
});
