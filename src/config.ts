/**
 * Command-line and environment configuration
 */

import { existsSync } from 'fs';
import { dirname, resolve } from 'path';
import { homedir } from 'os';
import { fileURLToPath } from 'url';
import { getThemeNames, isValidThemeName, type ThemeName } from './themes';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const APP_DIR = resolve(homedir(), '.terminal-typist');
export const DEFAULT_USERS_FILE = resolve(APP_DIR, 'users.txt');

export interface AppConfig {
  theme: ThemeName;
  usersFile: string;
  wordsDir: string;
  help: boolean;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ---------------------------------------------------------------------------
// Bundled word lists: walk up from this file to the directory that has
// both package.json and words/ (src/ in development, dist/ when built)
// ---------------------------------------------------------------------------

export function findBundledWordsDir(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (let i = 0; i < 5; i++) {
    if (existsSync(resolve(dir, 'package.json')) && existsSync(resolve(dir, 'words'))) {
      return resolve(dir, 'words');
    }
    dir = resolve(dir, '..');
  }
  return resolve(process.cwd(), 'words');
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function takeValue(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx === -1) return undefined;
  const value = args[idx + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new ConfigError(`Missing value for ${flag}`);
  }
  args.splice(idx, 2);
  return value;
}

/**
 * Flags win over environment variables, which win over defaults.
 */
export function parseArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): AppConfig {
  const args = [...argv];

  const themeArg = takeValue(args, '--theme');
  const usersArg = takeValue(args, '--users');
  const wordsArg = takeValue(args, '--words');

  let theme: ThemeName = 'classic';
  if (themeArg !== undefined) {
    if (!isValidThemeName(themeArg)) {
      throw new ConfigError(`Unknown theme: ${themeArg} (available: ${getThemeNames().join(', ')})`);
    }
    theme = themeArg;
  }

  // https://no-color.org: any non-empty value
  if (args.includes('--no-color') || (env.NO_COLOR !== undefined && env.NO_COLOR !== '')) {
    theme = 'mono';
  }

  return {
    theme,
    usersFile: resolve(usersArg ?? env.TYPIST_USERS_FILE ?? DEFAULT_USERS_FILE),
    wordsDir: resolve(wordsArg ?? env.TYPIST_WORDS_DIR ?? findBundledWordsDir()),
    help: args.includes('--help') || args.includes('-h'),
  };
}
