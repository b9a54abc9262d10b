/**
 * Weighted single-axis layout: the flexbox subset containers use.
 *
 * A container's bounds are split among its children along the main axis
 * (y for columns, x for rows) in proportion to their weights:
 *
 *   size_i = floor(main * weight_i / totalWeight)
 *
 * Children are placed one after another starting at the container's origin
 * and inherit the full cross-axis extent. The rounding remainder is not
 * handed to any child, so the last child may end short of the far edge.
 */

import { createBounds, type Bounds } from './bounds.js';

export type Direction = 'row' | 'column';

export function distributeBounds(bounds: Bounds, weights: readonly number[], direction: Direction): Bounds[] {
  if (weights.length === 0) return [];

  const isRow = direction === 'row';
  const mainSize = isRow ? bounds.width : bounds.height;
  const totalWeight = weights.reduce((sum, w) => sum + w, 0);

  let mainPos = isRow ? bounds.x : bounds.y;

  return weights.map((weight) => {
    const size = totalWeight > 0 ? Math.floor((mainSize * weight) / totalWeight) : 0;

    const slot = isRow
      ? createBounds({ x: mainPos, y: bounds.y, width: size, height: bounds.height })
      : createBounds({ x: bounds.x, y: mainPos, width: bounds.width, height: size });

    mainPos += size;
    return slot;
  });
}
