/**
 * CLI entry point for terminal-typist
 *
 * Resolves configuration, signs the player in and runs the main menu on the
 * Node stdio terminal.
 */

import * as p from '@clack/prompts';
import { ConfigError, parseArgs, type AppConfig } from './config';
import { getPalette, getThemeNames } from './themes';
import { renderBanner } from './banner';
import { createNodeTerminal } from './terminal/node';
import { loadUsers, saveUsers, signIn, type UserRecord } from './stats/users';
import { promptUsername, runMainMenu } from './app/menu';
import type { AppContext } from './app/context';

// ---------------------------------------------------------------------------
// Help
// ---------------------------------------------------------------------------

function printHelp() {
  console.log(`
  terminal-typist: terminal typing test

  Usage:
    typist                       Sign in and open the main menu
    typist --theme <theme>       Set color theme
    typist --users <file>        User profiles file (default ~/.terminal-typist/users.txt)
    typist --words <dir>         Directory with light.txt, medium.txt and hard.txt
    typist --no-color            Disable colors (also honours NO_COLOR)
    typist --help                Show this help

  Environment:
    TYPIST_USERS_FILE            Same as --users
    TYPIST_WORDS_DIR             Same as --words

  Themes:
    ${getThemeNames().join(', ')}

  Modes:
    Endurance    10-word rounds until accuracy < 85% or WPM < 30
    Raw Speed    One test of 15-50 words

  Controls while typing:
    Backspace    Correct the last character
    ESC          Cancel the test
`);
}

// ---------------------------------------------------------------------------
// Sign-in
// ---------------------------------------------------------------------------

function greet(user: UserRecord, created: boolean) {
  if (created) {
    p.log.success(`New user detected. Created profile for ${user.name}.`);
    return;
  }
  p.log.info([
    `Welcome back, ${user.name}!`,
    `Best WPM: ${user.bestWpm.toFixed(2)} | Best Accuracy: ${user.bestAccuracy.toFixed(2)}% | Tests completed: ${user.testsCompleted}`,
    ...(user.enduranceHighScore > 0 ? [`Endurance Mode High Score: ${user.enduranceHighScore} words`] : []),
  ].join('\n'));
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(config: AppConfig) {
  process.stdout.write(renderBanner(config.theme));
  p.intro('terminal-typist');

  const loaded = loadUsers(config.usersFile);
  if (loaded.created) {
    p.log.info(`Users file not found. Created ${config.usersFile}.`);
  } else {
    p.log.step(`Loaded ${loaded.users.length} user profiles.`);
  }

  const name = await promptUsername();
  if (name === null) {
    p.cancel('Cancelled.');
    return;
  }

  const { users } = loaded;
  const { user, created } = signIn(users, name);
  if (created) saveUsers(config.usersFile, users);
  greet(user, created);

  const terminal = createNodeTerminal(getPalette(config.theme));
  const ctx: AppContext = {
    config,
    terminal,
    users,
    currentUser: user,
    log: p.log,
    random: Math.random,
  };

  try {
    await runMainMenu(ctx);
  } finally {
    terminal.restoreMode();
  }

  saveUsers(config.usersFile, users);
  p.outro('User data saved. Goodbye!');
}

// ---------------------------------------------------------------------------
// Entry
// ---------------------------------------------------------------------------

function start() {
  let config: AppConfig;
  try {
    config = parseArgs(process.argv.slice(2));
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    console.error(error.message);
    console.error('Run `typist --help` for usage.');
    process.exit(1);
    return;
  }

  if (config.help) {
    printHelp();
    process.exit(0);
    return;
  }

  main(config).catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : error);
    process.exit(1);
  });
}

start();
