/**
 * Title banner
 */

import { ANSI_RESET, themes, type ThemeName } from './themes';

// ASCII art title
const title = [
  '▀█▀ █▄█ █▀█ █ █▀▀ ▀█▀',
  ' █   █  █▀▀ █ ▄▄█  █ ',
  '  terminal typing trainer',
];

/**
 * Title lines, cycling through the theme's three banner colours
 */
export function renderBanner(theme: ThemeName): string {
  const colors = themes[theme].banner;
  return title
    .map((line, i) => `${colors[i % colors.length]}${line}${ANSI_RESET}`)
    .join('\n') + '\n';
}
