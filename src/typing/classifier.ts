/**
 * Keystroke classification with charge-once mistakes
 *
 * Every redraw rescans the whole typed prefix. A wrong position is charged
 * to the ledger the first time it is seen wrong and never again, so
 * backspacing and retyping the same mistake costs one error, not many.
 * Positions past the end of the target use the same flag set.
 */

export type CharMark = 'correct' | 'incorrect';

export interface MistakeLedger {
  readonly target: string;
  /** Positions already charged; never cleared during a session */
  readonly flags: Set<number>;
  incorrect: number;
}

export function createMistakeLedger(target: string): MistakeLedger {
  return { target, flags: new Set(), incorrect: 0 };
}

/**
 * Mark each typed position and charge newly wrong ones. O(typed.length).
 */
export function classifyPrefix(ledger: MistakeLedger, typed: string): CharMark[] {
  const marks = new Array<CharMark>(typed.length);

  for (let i = 0; i < typed.length; i++) {
    if (i < ledger.target.length && typed[i] === ledger.target[i]) {
      marks[i] = 'correct';
      continue;
    }

    marks[i] = 'incorrect';
    if (!ledger.flags.has(i)) {
      ledger.flags.add(i);
      ledger.incorrect++;
    }
  }

  return marks;
}
