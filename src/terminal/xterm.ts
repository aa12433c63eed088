/**
 * xterm.js terminal
 *
 * Lets the session engine run inside an xterm.js Terminal (browser or any
 * host that implements the same surface). xterm has no line discipline, so
 * "raw mode" is just the lifetime of the onData subscription.
 */

import type { IDisposable, Terminal } from '@xterm/xterm';
import { DEFAULT_WIDTH, type LogicalColor, type Palette, type TypingTerminal } from './types';
import { KeyQueue } from './keys';

/**
 * The part of xterm's Terminal the engine drives
 */
export type XtermHost = Pick<Terminal, 'cols'> & {
  write(data: string): void;
  onData(listener: (data: string) => void): IDisposable;
};

export function createXtermTerminal(terminal: XtermHost, palette: Palette): TypingTerminal {
  const queue = new KeyQueue();
  let subscription: IDisposable | null = null;

  return {
    write: (data: string) => terminal.write(data),
    setColor: (color: LogicalColor) => terminal.write(palette[color]),
    colorCode: (color: LogicalColor) => palette[color],
    readKey: () => queue.next(),
    getWidth: () => terminal.cols || DEFAULT_WIDTH,
    enterRawMode: () => {
      if (subscription) return;
      subscription = terminal.onData(data => queue.push(data));
    },
    restoreMode: () => {
      if (!subscription) return;
      subscription.dispose();
      subscription = null;
      terminal.write(palette.default);
      queue.clear();
    },
  };
}
