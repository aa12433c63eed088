/**
 * Game modes
 *
 * Endurance, raw speed, leaderboard and profile. Each takes the app context,
 * reports through its logger and saves the user table when stats change.
 */

import type { AppContext } from './context';
import { runSession, type TypingResult } from '../typing/session';
import {
  ENDURANCE_ACCURACY_THRESHOLD,
  ENDURANCE_WPM_THRESHOLD,
  runEnduranceRound,
  runRawSpeed,
  type RawSpeedRun,
  type RoundState,
  type SessionRunner,
} from '../typing/rounds';
import { LoadError, loadWords, type Difficulty } from '../stats/words';
import { applyEnduranceOutcome, applyTypingResults, saveUsers, selectDifficulty } from '../stats/users';
import { buildLeaderboard, formatLeaderboard } from '../stats/leaderboard';
import { assessSkill, formatProfile } from '../stats/profile';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function sessionRunner(ctx: AppContext): SessionRunner {
  return target => runSession(target, ctx.terminal, { clock: ctx.clock });
}

/**
 * Word pool for a difficulty, or null (already reported) when the list
 * cannot be used.
 */
function loadPool(ctx: AppContext, difficulty: Difficulty): string[] | null {
  let words: string[];
  try {
    words = loadWords(difficulty, ctx.config.wordsDir);
  } catch (error) {
    if (!(error instanceof LoadError)) throw error;
    ctx.log.error(`${error.message}. Returning to main menu.`);
    return null;
  }

  if (words.length === 0) {
    ctx.log.error(`The ${difficulty} word list is empty. Returning to main menu.`);
    return null;
  }

  ctx.log.step(`Loaded ${words.length} words (${difficulty}).`);
  return words;
}

function persist(ctx: AppContext): boolean {
  try {
    saveUsers(ctx.config.usersFile, ctx.users);
    return true;
  } catch (error) {
    ctx.log.error(`Could not save ${ctx.config.usersFile}: ${errorMessage(error)}`);
    return false;
  }
}

export function formatResult(result: TypingResult): string[] {
  return [
    `Time taken: ${result.elapsedSeconds.toFixed(2)} seconds`,
    `Words per minute: ${result.wpm.toFixed(2)}`,
    `Accuracy: ${result.accuracy.toFixed(2)}%`,
    `Mistyped chars: ${result.breakdown.mistyped}`,
    `Missed chars: ${result.breakdown.missed}`,
    `Extra chars: ${result.breakdown.extra}`,
  ];
}

// ---------------------------------------------------------------------------
// Raw speed
// ---------------------------------------------------------------------------

/**
 * One test of `requestedWords` words. Returns null when the word list could
 * not be loaded; a cancelled run is returned but records nothing.
 */
export async function runRawSpeedMode(
  ctx: AppContext,
  difficulty: Difficulty,
  requestedWords: number,
): Promise<RawSpeedRun | null> {
  const pool = loadPool(ctx, difficulty);
  if (!pool) return null;

  if (requestedWords > pool.length) {
    ctx.log.warn(`Not enough words in the list. Using all ${pool.length} available words.`);
  }

  ctx.log.info('Type as fast and accurately as you can! Press ESC at any time to end the test.');
  const run = await runRawSpeed(pool, requestedWords, sessionRunner(ctx), { random: ctx.random });

  if (run.outcome.status === 'cancelled') {
    ctx.log.warn('Test cancelled. No stats recorded.');
    return run;
  }

  const { result } = run.outcome;
  ctx.log.message(formatResult(result).join('\n'));

  const report = applyTypingResults(ctx.currentUser, [result]);
  if (report.newBestWpm) {
    ctx.log.success(`New personal best WPM: ${report.averageWpm.toFixed(2)} (previous: ${report.previousBestWpm.toFixed(2)})`);
  }
  if (report.newBestAccuracy) {
    ctx.log.success(`New personal best accuracy: ${report.averageAccuracy.toFixed(2)}% (previous: ${report.previousBestAccuracy.toFixed(2)}%)`);
  }

  persist(ctx);
  return run;
}

// ---------------------------------------------------------------------------
// Endurance
// ---------------------------------------------------------------------------

const DIFFICULTY_LABELS: Record<Difficulty, string> = {
  light: 'LIGHT',
  medium: 'MEDIUM',
  hard: 'HARD',
};

/**
 * Rounds until accuracy or speed drops below the thresholds. The high
 * score and test count are saved even when the run ends by cancelling.
 */
export async function runEnduranceMode(ctx: AppContext): Promise<RoundState | null> {
  const { log } = ctx;

  log.info(
    `Keep typing until your accuracy falls below ${ENDURANCE_ACCURACY_THRESHOLD.toFixed(1)}% ` +
    `or WPM falls below ${ENDURANCE_WPM_THRESHOLD.toFixed(1)}. Press ESC at any time to end the test.`,
  );

  const difficulty = selectDifficulty(ctx.currentUser);
  log.info(`Starting with ${DIFFICULTY_LABELS[difficulty]} difficulty based on your profile.`);

  const pool = loadPool(ctx, difficulty);
  if (!pool) return null;

  const state = await runEnduranceRound(pool, sessionRunner(ctx), {
    random: ctx.random,
    hooks: {
      onRoundStart: (round, current) => {
        log.step([
          `Round ${round}`,
          `Words completed so far: ${current.wordsCompleted}`,
          `Current accuracy: ${current.runningAccuracy.toFixed(2)}%`,
          `Current WPM: ${current.runningWpm.toFixed(2)}`,
        ].join('\n'));
      },
      onRoundComplete: (result, current) => {
        log.message([`Round ${current.roundsCompleted} results`, ...formatResult(result)].join('\n'));
      },
      onStop: reason => {
        switch (reason) {
          case 'cancelled':
            log.warn('Test cancelled.');
            break;
          case 'accuracy':
            log.warn(`Accuracy dropped below ${ENDURANCE_ACCURACY_THRESHOLD.toFixed(1)}%. Endurance mode ended.`);
            break;
          case 'speed':
            log.warn(`WPM dropped below ${ENDURANCE_WPM_THRESHOLD.toFixed(1)}. Endurance mode ended.`);
            break;
          case 'empty-pool':
            log.error('No words to type.');
            break;
        }
      },
    },
  });

  log.message([
    'Endurance mode complete',
    `Total words completed: ${state.wordsCompleted}`,
    `Rounds completed: ${state.roundsCompleted}`,
    `Final accuracy: ${state.runningAccuracy.toFixed(2)}%`,
    `Final WPM: ${state.runningWpm.toFixed(2)}`,
  ].join('\n'));

  const report = applyEnduranceOutcome(ctx.currentUser, state);
  if (report.newHighScore) {
    log.success(`New endurance high score! Previous: ${report.previousHighScore} words`);
  }

  persist(ctx);
  return state;
}

// ---------------------------------------------------------------------------
// Leaderboard & profile
// ---------------------------------------------------------------------------

export function showLeaderboard(ctx: AppContext): string[] {
  const lines = formatLeaderboard(buildLeaderboard(ctx.users, ctx.currentUser.name));
  ctx.log.message(lines.join('\n'));
  return lines;
}

export function showProfile(ctx: AppContext): string[] {
  const user = ctx.currentUser;
  const { level } = assessSkill(user);
  const lines = [`Profile: ${user.name}`, ...formatProfile(user), `Skill assessment: ${level}`];
  ctx.log.message(lines.join('\n'));
  return lines;
}
