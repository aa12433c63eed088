import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { LoadError, loadWords, parseWords, wordListPath } from './words';

describe('parseWords', () => {
  it('splits on any whitespace', () => {
    expect(parseWords('one two\nthree\t four\r\n')).toEqual(['one', 'two', 'three', 'four']);
  });

  it('returns an empty list for blank content', () => {
    expect(parseWords('  \n ')).toEqual([]);
  });
});

describe('loadWords', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'typist-words-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads the list for a difficulty', () => {
    writeFileSync(join(dir, 'medium.txt'), 'apple banana\ncherry\n');
    expect(loadWords('medium', dir)).toEqual(['apple', 'banana', 'cherry']);
  });

  it('throws LoadError naming the missing file', () => {
    const path = wordListPath('hard', dir);
    expect(path).toBe(join(dir, 'hard.txt'));

    let caught: unknown;
    try {
      loadWords('hard', dir);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(LoadError);
    expect(caught).toMatchObject({ path, message: `Could not open word list ${path}` });
  });
});

describe('bundled word lists', () => {
  const wordsDir = fileURLToPath(new URL('../../words', import.meta.url));

  it.each(['light', 'medium', 'hard'] as const)('%s has enough words for a raw speed test', difficulty => {
    const words = loadWords(difficulty, wordsDir);
    expect(words.length).toBeGreaterThanOrEqual(50);
    for (const word of words) expect(word).toMatch(/^[\x21-\x7e]+$/);
  });
});
