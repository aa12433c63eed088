/**
 * Positional accuracy scoring
 *
 * Compares the final typed text to the target character by character.
 * Separate from the session's keystroke accuracy: this one penalises what
 * is left on screen, the other penalises what was pressed.
 */

export interface ScoreBreakdown {
  /** 0..100 */
  accuracy: number;
  mistyped: number;
  missed: number;
  extra: number;
}

export function score(target: string, typed: string): ScoreBreakdown {
  const shared = Math.min(target.length, typed.length);

  let mistyped = 0;
  for (let i = 0; i < shared; i++) {
    if (typed[i] !== target[i]) mistyped++;
  }

  const missed = Math.max(0, target.length - typed.length);
  const extra = Math.max(0, typed.length - target.length);

  if (target.length === 0) {
    return { accuracy: 0, mistyped, missed, extra };
  }

  const totalErrors = mistyped + missed + extra;
  const accuracy = Math.min(100, Math.max(0, 100 * (1 - totalErrors / target.length)));

  return { accuracy, mistyped, missed, extra };
}
