/**
 * Node stdio terminal
 *
 * Maps process.stdin/stdout onto the TypingTerminal capability interface.
 * Raw mode is only held while a session reads keys; the exit hook puts the
 * TTY back if the process dies in between.
 */

import { DEFAULT_WIDTH, type LogicalColor, type Palette, type TypingTerminal } from './types';
import { KeyQueue } from './keys';

export interface NodeInput {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  setEncoding(encoding: BufferEncoding): unknown;
  on(event: 'data', listener: (chunk: string) => void): unknown;
  off(event: 'data', listener: (chunk: string) => void): unknown;
  resume(): unknown;
  pause(): unknown;
}

export interface NodeOutput {
  columns?: number;
  write(data: string): unknown;
}

export interface NodeTerminalOptions {
  input?: NodeInput;
  output?: NodeOutput;
  /** Register a process exit hook while in raw mode (default: true) */
  exitHook?: boolean;
}

// Synchronized output: the terminal batches erase + redraw into one paint.
// Supported by Warp, iTerm2, kitty, foot, WezTerm, etc.
const SYNC_START = '\x1b[?2026h';
const SYNC_END = '\x1b[?2026l';

export function createNodeTerminal(palette: Palette, options: NodeTerminalOptions = {}): TypingTerminal {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  const exitHook = options.exitHook ?? true;

  const queue = new KeyQueue();
  let raw = false;

  const onData = (chunk: string) => queue.push(chunk);

  function restoreMode() {
    if (!raw) return;
    raw = false;
    input.off('data', onData);
    if (input.isTTY && input.setRawMode) {
      input.setRawMode(false);
    }
    input.pause();
    output.write(palette.default);
    queue.clear();
    if (exitHook) process.off('exit', restoreMode);
  }

  const terminal: TypingTerminal = {
    write: (data: string) => {
      output.write(SYNC_START + data + SYNC_END);
    },
    setColor: (color: LogicalColor) => {
      output.write(palette[color]);
    },
    colorCode: (color: LogicalColor) => palette[color],
    readKey: () => queue.next(),
    getWidth: () => output.columns || DEFAULT_WIDTH,
    enterRawMode: () => {
      if (raw) return;
      raw = true;
      if (input.isTTY && input.setRawMode) {
        input.setRawMode(true);
      }
      input.setEncoding('utf8');
      input.on('data', onData);
      input.resume();
      if (exitHook) process.on('exit', restoreMode);
    },
    restoreMode,
  };

  return terminal;
}
