/**
 * Incremental prefix renderer
 *
 * Erases the rows the previous frame occupied and redraws the typed prefix,
 * wrapping at the terminal width. Output is a single string so the terminal
 * can paint it in one write.
 */

import type { LogicalColor } from '../terminal/types';
import type { CharMark } from './classifier';

export interface RenderFrame {
  typed: string;
  marks: readonly CharMark[];
  /** Buffer length before the edit being drawn */
  previousLength: number;
  width: number;
}

const CURSOR_UP = '\x1b[A';

/**
 * Rows a draw of `length` characters occupies. A draw that exactly fills
 * a row leaves the cursor on that row, not the next.
 */
export function linesToClear(length: number, width: number): number {
  const columns = Math.max(1, width);
  return Math.floor(Math.max(length - 1, 0) / columns) + 1;
}

export function renderTypedPrefix(
  frame: RenderFrame,
  colorCode: (color: LogicalColor) => string,
): string {
  const width = Math.max(1, frame.width);
  const lines = linesToClear(frame.previousLength, width);
  const blank = ' '.repeat(width);

  let output = '\r';
  for (let i = 0; i < lines; i++) {
    output += `\r${blank}\r`;
    if (i < lines - 1) output += CURSOR_UP;
  }

  let currentLineLength = 0;
  for (let i = 0; i < frame.typed.length; i++) {
    if (currentLineLength >= width) {
      output += '\r\n';
      currentLineLength = 0;
    }
    output += colorCode(frame.marks[i] ?? 'incorrect') + frame.typed[i];
    currentLineLength++;
  }
  output += colorCode('default');

  return output;
}
