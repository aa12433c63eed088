/**
 * User profiles
 *
 * Persisted as one whitespace-separated line per user:
 *   name bestWpm bestAccuracy testsCompleted enduranceHighScore
 *   averageAccuracy totalCharsTyped totalCorrectChars
 * Loading is permissive: a line needs a name and three numbers.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import type { TypingResult } from '../typing/session';
import type { RoundState } from '../typing/rounds';
import type { Difficulty } from './words';

export interface UserRecord {
  name: string;
  bestWpm: number;
  bestAccuracy: number;
  testsCompleted: number;
  enduranceHighScore: number;
  averageAccuracy: number;
  totalCharsTyped: number;
  totalCorrectChars: number;
}

/** Name plus bestWpm, bestAccuracy and testsCompleted */
const MIN_FIELDS = 4;

// Characters per test assumed when back-filling totals for old files
const LEGACY_CHARS_PER_TEST = 200;

const HARD_ACCURACY = 95.0;
const MEDIUM_ACCURACY = HARD_ACCURACY - 10;

export function createUser(name: string): UserRecord {
  return {
    name,
    bestWpm: 0,
    bestAccuracy: 0,
    testsCompleted: 0,
    enduranceHighScore: 0,
    averageAccuracy: 0,
    totalCharsTyped: 0,
    totalCorrectChars: 0,
  };
}

export function isValidUsername(name: string): boolean {
  return name.length > 0 && name.length < 50 && !/\s/.test(name);
}

// ============================================================================
// Serialization
// ============================================================================

/**
 * Parse one line, or null when it has too few leading fields. Numbers are
 * read left to right and parsing stops at the first token that is not one.
 */
export function parseUserLine(line: string): UserRecord | null {
  const tokens = line.trim().split(/\s+/).filter(Boolean);
  if (tokens.length === 0) return null;

  const numbers: number[] = [];
  for (const token of tokens.slice(1, 8)) {
    const value = Number(token);
    if (!Number.isFinite(value)) break;
    numbers.push(value);
  }
  if (1 + numbers.length < MIN_FIELDS) return null;

  const field = (i: number) => numbers[i] ?? 0;
  const user: UserRecord = {
    name: tokens[0],
    bestWpm: field(0),
    bestAccuracy: field(1),
    testsCompleted: Math.trunc(field(2)),
    enduranceHighScore: Math.trunc(field(3)),
    averageAccuracy: field(4),
    totalCharsTyped: Math.trunc(field(5)),
    totalCorrectChars: Math.trunc(field(6)),
  };

  // Files written before character totals existed
  if (user.totalCharsTyped === 0 && user.testsCompleted > 0) {
    user.totalCharsTyped = LEGACY_CHARS_PER_TEST * user.testsCompleted;
    user.totalCorrectChars = Math.floor(user.totalCharsTyped * (user.bestAccuracy / 100));
    user.averageAccuracy = user.bestAccuracy * 0.9;
  }

  return user;
}

export function formatUserLine(user: UserRecord): string {
  return [
    user.name,
    user.bestWpm.toFixed(2),
    user.bestAccuracy.toFixed(2),
    user.testsCompleted,
    user.enduranceHighScore,
    user.averageAccuracy.toFixed(2),
    user.totalCharsTyped,
    user.totalCorrectChars,
  ].join(' ');
}

// ============================================================================
// Persistence
// ============================================================================

export interface LoadedUsers {
  users: UserRecord[];
  /** Non-blank lines that did not parse */
  skipped: number;
  /** The file did not exist and an empty one was written */
  created: boolean;
}

export function loadUsers(file: string): LoadedUsers {
  if (!existsSync(file)) {
    mkdirSync(dirname(file), { recursive: true });
    writeFileSync(file, '');
    return { users: [], skipped: 0, created: true };
  }

  const users: UserRecord[] = [];
  let skipped = 0;
  for (const line of readFileSync(file, 'utf-8').split(/\r?\n/)) {
    if (line.trim() === '') continue;
    const user = parseUserLine(line);
    if (user) {
      users.push(user);
    } else {
      skipped++;
    }
  }

  if (skipped > 0) {
    console.warn(`[Users] Skipped ${skipped} malformed line(s) in ${file}`);
  }
  return { users, skipped, created: false };
}

export function saveUsers(file: string, users: readonly UserRecord[]): void {
  mkdirSync(dirname(file), { recursive: true });
  writeFileSync(file, users.map(formatUserLine).map(line => `${line}\n`).join(''));
}

export function findUser(users: readonly UserRecord[], name: string): UserRecord | undefined {
  return users.find(user => user.name === name);
}

// ============================================================================
// Stats updates
// ============================================================================

/**
 * Keystroke accuracy over everything the user has typed, falling back to
 * the best single-test accuracy before anything was recorded.
 */
export function lifetimeAccuracy(user: UserRecord): number {
  if (user.totalCharsTyped > 0) {
    return (user.totalCorrectChars / user.totalCharsTyped) * 100;
  }
  return user.bestAccuracy;
}

/**
 * Endurance starting difficulty: more accurate typists start harder.
 */
export function selectDifficulty(user: UserRecord): Difficulty {
  const accuracy = lifetimeAccuracy(user);
  if (accuracy >= HARD_ACCURACY) return 'hard';
  if (accuracy >= MEDIUM_ACCURACY) return 'medium';
  return 'light';
}

export interface StatsReport {
  averageWpm: number;
  averageAccuracy: number;
  previousBestWpm: number;
  previousBestAccuracy: number;
  newBestWpm: boolean;
  newBestAccuracy: boolean;
}

/**
 * Fold completed tests into the user's record (mutates `user`).
 */
export function applyTypingResults(user: UserRecord, results: readonly TypingResult[]): StatsReport {
  const previousBestWpm = user.bestWpm;
  const previousBestAccuracy = user.bestAccuracy;

  if (results.length === 0) {
    return {
      averageWpm: 0,
      averageAccuracy: 0,
      previousBestWpm,
      previousBestAccuracy,
      newBestWpm: false,
      newBestAccuracy: false,
    };
  }

  let totalWpm = 0;
  let totalAccuracy = 0;
  for (const result of results) {
    totalWpm += result.wpm;
    totalAccuracy += result.accuracy;
    user.totalCharsTyped += result.totalKeystrokes;
    user.totalCorrectChars += result.correctChars;
  }

  const averageWpm = totalWpm / results.length;
  const averageAccuracy = totalAccuracy / results.length;

  const newBestWpm = averageWpm > user.bestWpm;
  if (newBestWpm) user.bestWpm = averageWpm;

  const newBestAccuracy = averageAccuracy > user.bestAccuracy;
  if (newBestAccuracy) user.bestAccuracy = averageAccuracy;

  user.averageAccuracy = user.totalCharsTyped > 0
    ? (user.totalCorrectChars / user.totalCharsTyped) * 100
    : 0;
  user.testsCompleted += results.length;

  return { averageWpm, averageAccuracy, previousBestWpm, previousBestAccuracy, newBestWpm, newBestAccuracy };
}

export interface EnduranceReport {
  previousHighScore: number;
  newHighScore: boolean;
}

/**
 * Record an endurance run (mutates `user`). Cancelled runs still count the
 * rounds finished before cancelling.
 */
export function applyEnduranceOutcome(user: UserRecord, state: Readonly<RoundState>): EnduranceReport {
  const previousHighScore = user.enduranceHighScore;
  const newHighScore = state.wordsCompleted > previousHighScore;
  if (newHighScore) user.enduranceHighScore = state.wordsCompleted;
  user.testsCompleted += state.roundsCompleted;
  return { previousHighScore, newHighScore };
}

/**
 * Look a user up, appending a fresh record when the name is new.
 */
export function signIn(users: UserRecord[], name: string): { user: UserRecord; created: boolean } {
  const existing = findUser(users, name);
  if (existing) return { user: existing, created: false };

  const user = createUser(name);
  users.push(user);
  return { user, created: true };
}
