/**
 * Sign-in and main menu prompts
 */

import * as p from '@clack/prompts';
import type { AppContext } from './context';
import { runEnduranceMode, runRawSpeedMode, showLeaderboard, showProfile } from './modes';
import { RAW_SPEED_MAX_WORDS, RAW_SPEED_MIN_WORDS } from '../typing/rounds';
import { DIFFICULTIES, type Difficulty } from '../stats/words';
import { isValidUsername } from '../stats/users';

// ---------------------------------------------------------------------------
// Sign-in
// ---------------------------------------------------------------------------

/**
 * Ask for a username; null when the prompt is cancelled.
 */
export async function promptUsername(): Promise<string | null> {
  const name = await p.text({
    message: 'Enter your username (no spaces):',
    validate: (value) => {
      if (!value) return 'Username is required';
      if (!isValidUsername(value)) return 'Use up to 49 characters without spaces';
    },
  });
  if (p.isCancel(name)) return null;
  return name;
}

// ---------------------------------------------------------------------------
// Raw speed setup
// ---------------------------------------------------------------------------

export function parseWordCount(value: string): number | null {
  if (!/^\d+$/.test(value)) return null;
  const count = Number(value);
  if (count < RAW_SPEED_MIN_WORDS || count > RAW_SPEED_MAX_WORDS) return null;
  return count;
}

async function promptRawSpeed(): Promise<{ difficulty: Difficulty; words: number } | null> {
  const choice = await p.select({
    message: 'Choose difficulty:',
    options: [
      { value: 'light', label: 'Light', hint: 'easier words' },
      { value: 'medium', label: 'Medium', hint: 'average words' },
      { value: 'hard', label: 'Hard', hint: 'difficult words' },
    ],
  });
  if (p.isCancel(choice)) return null;
  const difficulty = DIFFICULTIES.find(d => d === choice);
  if (!difficulty) return null;

  const words = await p.text({
    message: `How many words for the test? (${RAW_SPEED_MIN_WORDS}-${RAW_SPEED_MAX_WORDS})`,
    placeholder: '25',
    validate: (value) => {
      if (parseWordCount(value) === null) {
        return `Enter a number between ${RAW_SPEED_MIN_WORDS} and ${RAW_SPEED_MAX_WORDS}`;
      }
    },
  });
  if (p.isCancel(words)) return null;

  const count = parseWordCount(words);
  return count === null ? null : { difficulty, words: count };
}

// ---------------------------------------------------------------------------
// Main menu
// ---------------------------------------------------------------------------

export async function runMainMenu(ctx: AppContext): Promise<void> {
  for (;;) {
    const action = await p.select({
      message: 'Main menu',
      options: [
        { value: 'endurance', label: 'Endurance Mode', hint: 'rounds until you slow down' },
        { value: 'raw', label: 'Raw Speed Mode', hint: `${RAW_SPEED_MIN_WORDS}-${RAW_SPEED_MAX_WORDS} words` },
        { value: 'leaderboard', label: 'Leaderboard' },
        { value: 'profile', label: 'Profile' },
        { value: 'exit', label: 'Exit' },
      ],
    });

    if (p.isCancel(action) || action === 'exit') return;

    if (action === 'endurance') {
      await runEnduranceMode(ctx);
    } else if (action === 'raw') {
      const setup = await promptRawSpeed();
      if (setup) await runRawSpeedMode(ctx, setup.difficulty, setup.words);
    } else if (action === 'leaderboard') {
      showLeaderboard(ctx);
    } else if (action === 'profile') {
      showProfile(ctx);
    }
  }
}
