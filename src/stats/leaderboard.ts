/**
 * Leaderboard
 *
 * Users ranked by best WPM. The top five are listed; the current user is
 * appended below them when ranked lower.
 */

import type { UserRecord } from './users';

export const LEADERBOARD_SIZE = 5;

export interface LeaderboardRow {
  rank: number;
  user: UserRecord;
  isCurrent: boolean;
}

export interface Leaderboard {
  rows: LeaderboardRow[];
  /** Only set when the current user is outside the top rows */
  currentRow: LeaderboardRow | null;
}

/**
 * Best WPM first; ties keep file order. Does not touch the input.
 */
export function rankUsers(users: readonly UserRecord[]): UserRecord[] {
  return [...users].sort((a, b) => b.bestWpm - a.bestWpm);
}

export function buildLeaderboard(
  users: readonly UserRecord[],
  currentName: string,
  size: number = LEADERBOARD_SIZE,
): Leaderboard {
  const ranked = rankUsers(users).map((user, i) => ({
    rank: i + 1,
    user,
    isCurrent: user.name === currentName,
  }));

  const rows = ranked.slice(0, size);
  const current = ranked.find(row => row.isCurrent);
  return {
    rows,
    currentRow: current && current.rank > size ? current : null,
  };
}

function formatRow(row: LeaderboardRow): string {
  const { user } = row;
  return [
    String(row.rank).padEnd(4),
    user.name.padEnd(20),
    user.bestWpm.toFixed(2).padEnd(6),
    user.bestAccuracy.toFixed(2).padEnd(8),
    String(user.testsCompleted).padEnd(5),
    String(user.enduranceHighScore).padEnd(5),
  ].join(' | ');
}

export function formatLeaderboard(board: Leaderboard): string[] {
  if (board.rows.length === 0) return ['No users found.'];

  const lines = [
    'Rank | Username             | WPM    | Accuracy | Tests | Endurance',
    '-----|----------------------|--------|----------|-------|----------',
    ...board.rows.map(formatRow),
  ];

  if (board.currentRow) {
    lines.push('...');
    lines.push(`${formatRow(board.currentRow)} (You)`);
  }
  return lines;
}
