/**
 * In-memory TypingTerminal for tests: replays scripted keys and records
 * everything written. Colours render as readable tags like <correct>.
 */

import type { LogicalColor, TypingTerminal } from '../terminal/types';

export interface ScriptedTerminal extends TypingTerminal {
  /** Everything written, colour codes included */
  readonly output: string[];
  /** true for enterRawMode, false for restoreMode, in call order */
  readonly modeChanges: boolean[];
  readonly remainingKeys: number;
}

export function colorTag(color: LogicalColor): string {
  return `<${color}>`;
}

export function createScriptedTerminal(keys: string[], width = 80): ScriptedTerminal {
  const queue = [...keys];
  const output: string[] = [];
  const modeChanges: boolean[] = [];

  return {
    output,
    modeChanges,
    get remainingKeys() {
      return queue.length;
    },
    write: (data: string) => {
      output.push(data);
    },
    setColor: (color: LogicalColor) => {
      output.push(colorTag(color));
    },
    colorCode: colorTag,
    readKey: () => {
      const key = queue.shift();
      if (key === undefined) return Promise.reject(new Error('Key script exhausted'));
      return Promise.resolve(key);
    },
    getWidth: () => width,
    enterRawMode: () => {
      modeChanges.push(true);
    },
    restoreMode: () => {
      modeChanges.push(false);
    },
  };
}

/**
 * Clock that returns the given millisecond readings in order
 */
export function sequenceClock(...readings: number[]): () => number {
  let i = 0;
  return () => readings[Math.min(i++, readings.length - 1)];
}

/**
 * Keys for typing a text: a start key followed by every character
 */
export function typeAll(text: string): string[] {
  return ['\r', ...Array.from(text)];
}
