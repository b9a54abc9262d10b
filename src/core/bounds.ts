/**
 * Bounds: the rectangle a component occupies on screen.
 *
 * Coordinates are terminal cells, 0-based from the top-left corner.
 */

export interface Bounds {
  readonly width: number;
  readonly height: number;
  readonly x: number;
  readonly y: number;
}

/** The reserved state keys a Container reads its geometry from. */
export const GEOMETRY_KEYS = ['width', 'height', 'x', 'y'] as const;

export type GeometryKey = (typeof GEOMETRY_KEYS)[number];

/** Create a frozen Bounds, filling missing fields with 0. */
export function createBounds(partial: Partial<Bounds> = {}): Bounds {
  return Object.freeze({
    width: partial.width ?? 0,
    height: partial.height ?? 0,
    x: partial.x ?? 0,
    y: partial.y ?? 0,
  });
}

export function boundsEqual(a: Bounds, b: Bounds): boolean {
  return a.width === b.width && a.height === b.height && a.x === b.x && a.y === b.y;
}
