/**
 * terminal-typist
 *
 * Typing-test engine for Node terminals and xterm.js.
 *
 * Library usage (xterm.js):
 *   import { createXtermTerminal, getPalette, runSession } from 'terminal-typist';
 *   const io = createXtermTerminal(terminal, getPalette('cyan'));
 *   const outcome = await runSession('the quick brown fox', io);
 *
 * CLI usage:
 *   typist
 */

export * from './typing';
export * from './terminal';
export * from './stats';

export {
  ANSI_RESET,
  getPalette,
  getThemeNames,
  isValidThemeName,
  themes,
  type ThemeColors,
  type ThemeName,
} from './themes';

export { renderBanner } from './banner';
export { ConfigError, parseArgs, findBundledWordsDir, type AppConfig } from './config';

export type { AppContext, ModeLogger } from './app/context';
export {
  formatResult,
  runEnduranceMode,
  runRawSpeedMode,
  showLeaderboard,
  showProfile,
} from './app/modes';
