/**
 * Key decoding
 *
 * Raw terminal input arrives in chunks: a paste can carry many characters and
 * one arrow press is a multi-byte escape sequence. Keys are split so that
 * readKey() always yields exactly one key.
 */

export const KEY_ESCAPE = '\x1b';
export const KEY_CTRL_C = '\x03';
export const KEY_BACKSPACE = '\x7f';
export const KEY_CTRL_H = '\b';

export function isCancelKey(key: string): boolean {
  return key === KEY_ESCAPE || key === KEY_CTRL_C;
}

export function isBackspaceKey(key: string): boolean {
  return key === KEY_BACKSPACE || key === KEY_CTRL_H;
}

/**
 * Printable ASCII, space through tilde
 */
export function isPrintableKey(key: string): boolean {
  return key.length === 1 && key >= ' ' && key <= '~';
}

/**
 * Split a raw input chunk into keys. CSI (`ESC [ ... final`) and SS3
 * (`ESC O x`) sequences stay whole; a lone ESC is its own key.
 */
export function splitKeys(data: string): string[] {
  const chars = Array.from(data);
  const keys: string[] = [];

  let i = 0;
  while (i < chars.length) {
    const char = chars[i];

    if (char === KEY_ESCAPE && chars[i + 1] === '[') {
      let end = i + 2;
      // Parameter and intermediate bytes, then one final byte in @..~
      while (end < chars.length && !/[@-~]/.test(chars[end])) end++;
      keys.push(chars.slice(i, end + 1).join(''));
      i = end + 1;
      continue;
    }

    if (char === KEY_ESCAPE && chars[i + 1] === 'O' && i + 2 < chars.length) {
      keys.push(chars.slice(i, i + 3).join(''));
      i += 3;
      continue;
    }

    keys.push(char);
    i++;
  }

  return keys;
}

/**
 * FIFO of decoded keys with awaiting readers
 */
export class KeyQueue {
  private pending: string[] = [];
  private readers: Array<(key: string) => void> = [];

  push(data: string): void {
    for (const key of splitKeys(data)) {
      const reader = this.readers.shift();
      if (reader) {
        reader(key);
      } else {
        this.pending.push(key);
      }
    }
  }

  next(): Promise<string> {
    const key = this.pending.shift();
    if (key !== undefined) return Promise.resolve(key);
    return new Promise(resolve => {
      this.readers.push(resolve);
    });
  }

  /** Drop keys typed while nobody was listening */
  clear(): void {
    this.pending = [];
  }

  get size(): number {
    return this.pending.length;
  }
}
