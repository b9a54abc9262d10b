/**
 * Ambient screen size, used by containers constructed without geometry.
 */

export interface ScreenSize {
  width: number;
  height: number;
}

export const DEFAULT_SCREEN: Readonly<ScreenSize> = Object.freeze({ width: 80, height: 24 });

/** Current terminal size, or 80x24 when stdout is not a terminal. */
export function screenSize(stream: NodeJS.WriteStream = process.stdout): ScreenSize {
  const width = stream.columns;
  const height = stream.rows;
  return {
    width: typeof width === 'number' && width > 0 ? width : DEFAULT_SCREEN.width,
    height: typeof height === 'number' && height > 0 ? height : DEFAULT_SCREEN.height,
  };
}
