/**
 * Terminal color themes
 *
 * Each theme maps the engine's logical colours to ANSI escape codes and
 * carries the three banner colours.
 */

import type { LogicalColor, Palette } from '../terminal/types';

/**
 * Available theme identifiers
 */
export type ThemeName =
  | 'classic'
  | 'cyan'
  | 'amber'
  | 'green'
  | 'highcontrast'
  | 'mono';

export interface ThemeColors {
  /** Display name */
  name: string;
  /** Correctly typed characters */
  correct: string;
  /** Mistyped characters */
  incorrect: string;
  /** Target text and status lines */
  info: string;
  /** Banner lines cycle through these */
  banner: readonly [string, string, string];
}

/**
 * ANSI reset code
 */
export const ANSI_RESET = '\x1b[0m';

export const themes: Record<ThemeName, ThemeColors> = {
  classic: {
    name: 'Classic',
    correct: '\x1b[32m',
    incorrect: '\x1b[31m',
    info: '\x1b[36m',
    banner: ['\x1b[32m', '\x1b[36m', '\x1b[33m'],
  },
  cyan: {
    name: 'Cyberpunk',
    correct: '\x1b[96m',
    incorrect: '\x1b[1;95m',
    info: '\x1b[36m',
    banner: ['\x1b[96m', '\x1b[95m', '\x1b[36m'],
  },
  amber: {
    name: 'Amber',
    correct: '\x1b[38;5;214m',
    incorrect: '\x1b[1;91m',
    info: '\x1b[38;5;208m',
    banner: ['\x1b[38;5;214m', '\x1b[38;5;208m', '\x1b[38;5;220m'],
  },
  green: {
    name: 'Green Screen',
    correct: '\x1b[92m',
    incorrect: '\x1b[1;97;41m',
    info: '\x1b[32m',
    banner: ['\x1b[92m', '\x1b[32m', '\x1b[92m'],
  },
  highcontrast: {
    name: 'High Contrast',
    correct: '\x1b[1;97m',
    incorrect: '\x1b[1;97;41m',
    info: '\x1b[1;93m',
    banner: ['\x1b[1;97m', '\x1b[1;93m', '\x1b[1;97m'],
  },
  // No colour at all; mistakes are underlined so they stay visible
  mono: {
    name: 'Monochrome',
    correct: '',
    incorrect: '\x1b[4m',
    info: '',
    banner: ['', '', ''],
  },
};

const THEME_NAMES: readonly ThemeName[] = ['classic', 'cyan', 'amber', 'green', 'highcontrast', 'mono'];

/**
 * Get all available theme names
 */
export function getThemeNames(): ThemeName[] {
  return [...THEME_NAMES];
}

const VALID_THEME_NAMES = new Set<string>(THEME_NAMES);

/**
 * Check if a string is a valid theme name
 */
export function isValidThemeName(value: string): value is ThemeName {
  return VALID_THEME_NAMES.has(value);
}

/**
 * Escape codes for the engine's logical colours. Every colour starts with a
 * reset so a previous attribute (underline, background) never leaks.
 */
export function getPalette(theme: ThemeName): Palette {
  const colors = themes[theme];
  const code = (value: string) => ANSI_RESET + value;
  return {
    correct: code(colors.correct),
    incorrect: code(colors.incorrect),
    info: code(colors.info),
    default: ANSI_RESET,
  } satisfies Record<LogicalColor, string>;
}
