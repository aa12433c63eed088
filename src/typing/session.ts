/**
 * Typing session controller
 *
 * State machine: awaiting-start → typing → completed | cancelled.
 * createSession/beginTyping/applyKey are the pure core; runSession drives
 * them against a terminal and owns raw mode for the session's lifetime.
 */

import type { TypingTerminal } from '../terminal/types';
import { isBackspaceKey, isCancelKey, isPrintableKey } from '../terminal/keys';
import { classifyPrefix, createMistakeLedger, type CharMark, type MistakeLedger } from './classifier';
import { renderTypedPrefix } from './renderer';
import { score, type ScoreBreakdown } from './scorer';

/** Hard upper bound on the typed buffer, terminator slot included */
export const BUFFER_CAPACITY = 1000;

export type SessionState = 'awaiting-start' | 'typing' | 'completed' | 'cancelled';

export interface TypingSession {
  readonly target: string;
  readonly capacity: number;
  readonly ledger: MistakeLedger;
  state: SessionState;
  typed: string;
  /** Forward keystrokes only; backspaces are not counted */
  keystrokes: number;
}

export type SessionStep =
  | { kind: 'cancel' }
  | { kind: 'ignore' }
  | { kind: 'edit'; previousLength: number; marks: CharMark[] };

export interface TypingResult {
  readonly totalKeystrokes: number;
  readonly incorrectKeystrokes: number;
  readonly correctChars: number;
  /** Keystroke accuracy, 100 · correct / total */
  readonly accuracy: number;
  readonly wpm: number;
  readonly elapsedSeconds: number;
  readonly text: string;
  readonly typed: string;
  /** Positional comparison of the final buffer against the text */
  readonly breakdown: Readonly<ScoreBreakdown>;
}

export type SessionOutcome =
  | { status: 'completed'; result: TypingResult }
  | { status: 'cancelled' };

export interface SessionOptions {
  capacity?: number;
  /** Milliseconds; sampled once at the start of typing and once at the end */
  clock?: () => number;
}

export function createSession(target: string, options: Pick<SessionOptions, 'capacity'> = {}): TypingSession {
  return {
    target,
    capacity: options.capacity ?? BUFFER_CAPACITY,
    ledger: createMistakeLedger(target),
    state: 'awaiting-start',
    typed: '',
    keystrokes: 0,
  };
}

export function beginTyping(session: TypingSession): void {
  if (session.state !== 'awaiting-start') return;
  session.state = session.target.length === 0 ? 'completed' : 'typing';
}

export function applyKey(session: TypingSession, key: string): SessionStep {
  if (session.state !== 'typing') return { kind: 'ignore' };

  if (isCancelKey(key)) {
    session.state = 'cancelled';
    return { kind: 'cancel' };
  }

  const previousLength = session.typed.length;

  if (isBackspaceKey(key)) {
    if (previousLength === 0) return { kind: 'ignore' };
    session.typed = session.typed.slice(0, -1);
    return { kind: 'edit', previousLength, marks: classifyPrefix(session.ledger, session.typed) };
  }

  if (isPrintableKey(key)) {
    // At capacity the key is dropped
    if (previousLength >= session.capacity - 1) return { kind: 'ignore' };

    session.typed += key;
    session.keystrokes++;
    const marks = classifyPrefix(session.ledger, session.typed);
    if (session.typed.length === session.target.length) {
      session.state = 'completed';
    }
    return { kind: 'edit', previousLength, marks };
  }

  return { kind: 'ignore' };
}

export function buildResult(session: TypingSession, elapsedSeconds: number): TypingResult {
  const totalKeystrokes = session.keystrokes;
  const incorrectKeystrokes = session.ledger.incorrect;
  const correctChars = totalKeystrokes - incorrectKeystrokes;
  const minutes = elapsedSeconds / 60;

  return Object.freeze({
    totalKeystrokes,
    incorrectKeystrokes,
    correctChars,
    accuracy: totalKeystrokes === 0 ? 0 : (100 * correctChars) / totalKeystrokes,
    wpm: minutes > 0 ? session.typed.length / 5 / minutes : 0,
    elapsedSeconds,
    text: session.target,
    typed: session.typed,
    breakdown: Object.freeze(score(session.target, session.typed)),
  });
}

const CLEAR_SCREEN = '\x1b[2J\x1b[H';

function showTarget(terminal: TypingTerminal, target: string) {
  terminal.setColor('info');
  terminal.write(`${target}\r\n\r\n`);
  terminal.setColor('default');
}

/**
 * Run one interactive session. Resolves `cancelled` on ESC or Ctrl+C;
 * callers must not record stats for it.
 */
export async function runSession(
  target: string,
  terminal: TypingTerminal,
  options: SessionOptions = {},
): Promise<SessionOutcome> {
  const clock = options.clock ?? (() => performance.now());
  const session = createSession(target, options);

  terminal.enterRawMode();
  try {
    showTarget(terminal, target);
    terminal.write('Press any key to start typing...');
    await terminal.readKey();

    terminal.write(CLEAR_SCREEN);
    showTarget(terminal, target);
    terminal.write('Begin typing:    Press ESC at any time to cancel\r\n');

    beginTyping(session);
    const startedAt = clock();

    while (session.state === 'typing') {
      const key = await terminal.readKey();
      const step = applyKey(session, key);
      if (step.kind !== 'edit') continue;

      terminal.write(renderTypedPrefix({
        typed: session.typed,
        marks: step.marks,
        previousLength: step.previousLength,
        width: terminal.getWidth(),
      }, terminal.colorCode));
    }

    if (session.state === 'cancelled') {
      terminal.write('\r\n\r\nTest cancelled.\r\n');
      return { status: 'cancelled' };
    }

    const elapsedSeconds = (clock() - startedAt) / 1000;
    terminal.write('\r\n\r\nText completed!\r\n');
    return { status: 'completed', result: buildResult(session, elapsedSeconds) };
  } finally {
    terminal.restoreMode();
  }
}
