/**
 * ANSI escape sequences used by the renderer and positioned components.
 */

export const ESC = '\x1b[';

export const CLEAR_SCREEN = `${ESC}2J`;
export const HIDE_CURSOR = `${ESC}?25l`;
export const SHOW_CURSOR = `${ESC}?25h`;

/** Move the cursor to 0-based column `x`, row `y`. */
export function moveTo(x: number, y: number): string {
  return `${ESC}${Math.max(0, Math.floor(y)) + 1};${Math.max(0, Math.floor(x)) + 1}H`;
}

/** Strip CSI escape sequences, leaving the printable text. */
export function stripAnsi(text: string): string {
  return text.replace(/\x1b\[[0-9;?]*[A-Za-z]/g, '');
}
