/**
 * Word lists
 *
 * One whitespace-separated list per difficulty, read from the words
 * directory on every mode start so edited lists are picked up.
 */

import { readFileSync } from 'fs';
import { resolve } from 'path';

export type Difficulty = 'light' | 'medium' | 'hard';

export const DIFFICULTIES: readonly Difficulty[] = ['light', 'medium', 'hard'];

export const WORD_FILES: Record<Difficulty, string> = {
  light: 'light.txt',
  medium: 'medium.txt',
  hard: 'hard.txt',
};

export class LoadError extends Error {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    super(`Could not open word list ${path}`, options);
    this.name = 'LoadError';
    this.path = path;
  }
}

export function wordListPath(difficulty: Difficulty, wordsDir: string): string {
  return resolve(wordsDir, WORD_FILES[difficulty]);
}

export function parseWords(content: string): string[] {
  return content.split(/\s+/).filter(word => word.length > 0);
}

/**
 * @throws {LoadError} when the list is missing or unreadable
 */
export function loadWords(difficulty: Difficulty, wordsDir: string): string[] {
  const path = wordListPath(difficulty, wordsDir);
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new LoadError(path, { cause: error });
  }
  return parseWords(content);
}
