/**
 * Greedy word wrapping for fixed-width terminal regions.
 *
 * Widths are terminal cells: text is walked by grapheme cluster, East Asian
 * wide characters and emoji take two cells, combining marks and controls
 * take none.
 */

const segmenter = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

// East Asian Wide and Fullwidth blocks.
const WIDE_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x1100, 0x115f],
  [0x2e80, 0x303e],
  [0x3041, 0x33ff],
  [0x3400, 0x4dbf],
  [0x4e00, 0x9fff],
  [0xa000, 0xa4cf],
  [0xac00, 0xd7a3],
  [0xf900, 0xfaff],
  [0xfe30, 0xfe4f],
  [0xff00, 0xff60],
  [0xffe0, 0xffe6],
  [0x20000, 0x2fffd],
  [0x30000, 0x3fffd],
];

const EMOJI = /\p{Emoji_Presentation}|\p{Extended_Pictographic}\u{FE0F}/u;
const ZERO_WIDTH = /^[\p{Mn}\p{Me}\p{Cc}\p{Cf}]+$/u;

function isWide(codePoint: number): boolean {
  return WIDE_RANGES.some(([from, to]) => codePoint >= from && codePoint <= to);
}

/** Split `text` into user-perceived characters. */
export function graphemes(text: string): string[] {
  return Array.from(segmenter.segment(text), (s) => s.segment);
}

function graphemeCells(grapheme: string): number {
  if (EMOJI.test(grapheme)) return 2;
  if (isWide(grapheme.codePointAt(0) ?? 0)) return 2;
  if (ZERO_WIDTH.test(grapheme)) return 0;
  return 1;
}

/** Display width of `text` in terminal cells. */
export function measureCells(text: string): number {
  let cells = 0;
  for (const grapheme of graphemes(text)) cells += graphemeCells(grapheme);
  return cells;
}

/**
 * Wrap `content` to lines of at most `width` cells.
 *
 * Explicit newlines are kept, runs of spaces between words collapse to one,
 * and words wider than `width` are split between graphemes. A single
 * grapheme wider than `width` gets a line of its own.
 */
export function wrapText(content: string, width: number): string[] {
  if (width <= 0) return [];

  const lines: string[] = [];
  for (const paragraph of content.split('\n')) {
    const words = paragraph.split(' ').filter((w) => w.length > 0);
    if (words.length === 0) {
      lines.push('');
      continue;
    }

    let line = '';
    let lineCells = 0;
    for (const word of words) {
      for (const piece of splitWord(word, width)) {
        const pieceCells = measureCells(piece);
        if (line.length === 0) {
          line = piece;
          lineCells = pieceCells;
        } else if (lineCells + 1 + pieceCells <= width) {
          line += ` ${piece}`;
          lineCells += 1 + pieceCells;
        } else {
          lines.push(line);
          line = piece;
          lineCells = pieceCells;
        }
      }
    }
    lines.push(line);
  }

  return lines;
}

function splitWord(word: string, width: number): string[] {
  if (measureCells(word) <= width) return [word];

  const pieces: string[] = [];
  let piece = '';
  let cells = 0;
  for (const grapheme of graphemes(word)) {
    const next = graphemeCells(grapheme);
    if (piece.length > 0 && cells + next > width) {
      pieces.push(piece);
      piece = '';
      cells = 0;
    }
    piece += grapheme;
    cells += next;
  }
  if (piece.length > 0) pieces.push(piece);
  return pieces;
}
