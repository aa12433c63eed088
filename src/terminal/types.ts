/**
 * Terminal capability interface
 *
 * Everything the typing engine needs from a terminal. Implementations are
 * picked once at startup (Node stdio for the CLI, xterm.js when embedded).
 */

/**
 * Logical colours; each implementation maps them through the active palette.
 */
export type LogicalColor = 'correct' | 'incorrect' | 'info' | 'default';

export type Palette = Record<LogicalColor, string>;

export interface TypingTerminal {
  write: (data: string) => void;
  /** Write the escape code for a logical colour */
  setColor: (color: LogicalColor) => void;
  /** Escape code for a logical colour, for callers that build a frame string */
  colorCode: (color: LogicalColor) => string;
  /** Resolves with the next key; blocks (awaits) until one arrives */
  readKey: () => Promise<string>;
  /** Column count, 80 when the host cannot tell */
  getWidth: () => number;
  enterRawMode: () => void;
  restoreMode: () => void;
}

export const DEFAULT_WIDTH = 80;
