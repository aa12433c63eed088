import { EventEmitter } from 'node:events';
import { describe, it, expect, vi } from 'vitest';
import { createNodeTerminal } from './node';
import type { Palette } from './types';

const palette: Palette = {
  correct: '[C]',
  incorrect: '[I]',
  info: '[N]',
  default: '[D]',
};

class FakeInput extends EventEmitter {
  isTTY = true;
  setRawMode = vi.fn();
  setEncoding = vi.fn();
  resume = vi.fn();
  pause = vi.fn();
}

function setup(columns?: number) {
  const input = new FakeInput();
  const written: string[] = [];
  const output = {
    columns,
    write: (data: string) => {
      written.push(data);
    },
  };
  const terminal = createNodeTerminal(palette, { input, output, exitHook: false });
  return { input, written, terminal };
}

describe('createNodeTerminal', () => {
  it('toggles raw mode and the data listener', () => {
    const { input, terminal } = setup();

    terminal.enterRawMode();
    expect(input.setRawMode).toHaveBeenLastCalledWith(true);
    expect(input.setEncoding).toHaveBeenCalledWith('utf8');
    expect(input.listenerCount('data')).toBe(1);

    terminal.restoreMode();
    expect(input.setRawMode).toHaveBeenLastCalledWith(false);
    expect(input.pause).toHaveBeenCalledTimes(1);
    expect(input.listenerCount('data')).toBe(0);
  });

  it('ignores repeated enter and restore calls', () => {
    const { input, terminal } = setup();
    terminal.enterRawMode();
    terminal.enterRawMode();
    expect(input.listenerCount('data')).toBe(1);

    terminal.restoreMode();
    terminal.restoreMode();
    expect(input.setRawMode).toHaveBeenCalledTimes(2);
  });

  it('skips setRawMode when input is not a TTY', () => {
    const { input, terminal } = setup();
    input.isTTY = false;
    terminal.enterRawMode();
    terminal.restoreMode();
    expect(input.setRawMode).not.toHaveBeenCalled();
  });

  it('reads keys split from data chunks', async () => {
    const { input, terminal } = setup();
    terminal.enterRawMode();
    input.emit('data', 'a\x1b[B');
    expect(await terminal.readKey()).toBe('a');
    expect(await terminal.readKey()).toBe('\x1b[B');
  });

  it('wraps writes in synchronized output and maps colours', () => {
    const { written, terminal } = setup();
    terminal.write('frame');
    terminal.setColor('incorrect');
    expect(written).toEqual(['\x1b[?2026hframe\x1b[?2026l', '[I]']);
    expect(terminal.colorCode('info')).toBe('[N]');
  });

  it('resets the colour on restore', () => {
    const { written, terminal } = setup();
    terminal.enterRawMode();
    terminal.restoreMode();
    expect(written).toEqual(['[D]']);
  });

  it('reports width from the output, 80 when unknown', () => {
    expect(setup(120).terminal.getWidth()).toBe(120);
    expect(setup().terminal.getWidth()).toBe(80);
    expect(setup(0).terminal.getWidth()).toBe(80);
  });
});
