/**
 * Application context
 *
 * The one object every mode receives: configuration, the terminal, the
 * loaded user table and who is signed in. Nothing is kept in module state.
 */

import type * as p from '@clack/prompts';
import type { AppConfig } from '../config';
import type { TypingTerminal } from '../terminal/types';
import type { UserRecord } from '../stats/users';

/**
 * The subset of clack's log the modes write through
 */
export type ModeLogger = Pick<typeof p.log, 'message' | 'info' | 'success' | 'step' | 'warn' | 'error'>;

export interface AppContext {
  config: AppConfig;
  terminal: TypingTerminal;
  /** Whole table; saved back as-is */
  users: UserRecord[];
  /** Element of `users` for the signed-in player */
  currentUser: UserRecord;
  log: ModeLogger;
  random: () => number;
  /** Session clock in milliseconds; performance.now() when unset */
  clock?: () => number;
}
