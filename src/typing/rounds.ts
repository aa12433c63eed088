/**
 * Round orchestration
 *
 * Builds target texts from a word pool and runs sessions through an injected
 * runner: one session for raw speed, repeated rounds for endurance.
 */

import type { SessionOutcome, TypingResult } from './session';

export const MAX_TARGET_LENGTH = 999;

export const RAW_SPEED_MIN_WORDS = 15;
export const RAW_SPEED_MAX_WORDS = 50;

export const ENDURANCE_WORDS_PER_ROUND = 10;
export const ENDURANCE_ACCURACY_THRESHOLD = 85.0;
export const ENDURANCE_WPM_THRESHOLD = 30.0;

export type SessionRunner = (target: string) => Promise<SessionOutcome>;

export interface SampleOptions {
  /** Fill past the pool size with repeats instead of stopping short */
  allowReuse?: boolean;
  random?: () => number;
}

/**
 * Draw `count` words, without replacement while the pool lasts.
 */
export function sampleWords(pool: readonly string[], count: number, options: SampleOptions = {}): string[] {
  const random = options.random ?? Math.random;
  if (pool.length === 0 || count <= 0) return [];

  const shuffled = [...pool];
  const unique = Math.min(count, shuffled.length);

  // Partial Fisher-Yates: only the first `unique` slots need settling
  for (let i = 0; i < unique; i++) {
    const j = i + Math.floor(random() * (shuffled.length - i));
    [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
  }

  const picked = shuffled.slice(0, unique);
  if (options.allowReuse) {
    while (picked.length < count) {
      picked.push(pool[Math.floor(random() * pool.length)]);
    }
  }
  return picked;
}

/**
 * Join words with single spaces, stopping before a word that would push
 * the text past `maxLength`.
 */
export function buildTargetText(words: readonly string[], maxLength: number = MAX_TARGET_LENGTH): string {
  let text = '';
  for (const word of words) {
    const next = text ? `${text} ${word}` : word;
    if (next.length > maxLength) break;
    text = next;
  }
  return text;
}

// ---------------------------------------------------------------------------
// Raw speed
// ---------------------------------------------------------------------------

export interface RawSpeedRun {
  target: string;
  wordCount: number;
  /** The request was larger than the pool */
  clamped: boolean;
  outcome: SessionOutcome;
}

export async function runRawSpeed(
  pool: readonly string[],
  requestedWords: number,
  runSession: SessionRunner,
  options: Pick<SampleOptions, 'random'> = {},
): Promise<RawSpeedRun> {
  const wordCount = Math.min(requestedWords, pool.length);
  const target = buildTargetText(sampleWords(pool, wordCount, { random: options.random }));
  const outcome = await runSession(target);
  return { target, wordCount, clamped: wordCount < requestedWords, outcome };
}

// ---------------------------------------------------------------------------
// Endurance
// ---------------------------------------------------------------------------

export interface RoundState {
  wordsCompleted: number;
  roundsCompleted: number;
  runningAccuracy: number;
  runningWpm: number;
  cancelled: boolean;
  results: TypingResult[];
}

export type EnduranceStopReason = 'cancelled' | 'accuracy' | 'speed' | 'empty-pool';

export interface EnduranceHooks {
  onRoundStart?: (round: number, state: Readonly<RoundState>) => void;
  onRoundComplete?: (result: TypingResult, state: Readonly<RoundState>) => void;
  onStop?: (reason: EnduranceStopReason, state: Readonly<RoundState>) => void;
}

export interface EnduranceOptions {
  random?: () => number;
  hooks?: EnduranceHooks;
}

export function createRoundState(): RoundState {
  return {
    wordsCompleted: 0,
    roundsCompleted: 0,
    runningAccuracy: 100.0,
    runningWpm: 100.0,
    cancelled: false,
    results: [],
  };
}

/**
 * Why the loop should stop after the latest round, or null to continue
 */
export function enduranceStopReason(state: Readonly<RoundState>): EnduranceStopReason | null {
  if (state.cancelled) return 'cancelled';
  if (state.runningAccuracy < ENDURANCE_ACCURACY_THRESHOLD) return 'accuracy';
  if (state.runningWpm < ENDURANCE_WPM_THRESHOLD) return 'speed';
  return null;
}

/**
 * Play 10-word rounds until a threshold is missed or the player cancels.
 * Every iteration either cancels or completes a round whose result is
 * checked against the thresholds, so the loop ends once performance drops.
 */
export async function runEnduranceRound(
  pool: readonly string[],
  runSession: SessionRunner,
  options: EnduranceOptions = {},
): Promise<RoundState> {
  const { hooks = {} } = options;
  const state = createRoundState();

  if (pool.length === 0) {
    hooks.onStop?.('empty-pool', state);
    return state;
  }

  let reason: EnduranceStopReason | null = null;
  while (reason === null) {
    hooks.onRoundStart?.(state.roundsCompleted + 1, state);

    const words = sampleWords(pool, ENDURANCE_WORDS_PER_ROUND, { allowReuse: true, random: options.random });
    const outcome = await runSession(buildTargetText(words));

    if (outcome.status === 'cancelled') {
      state.cancelled = true;
    } else {
      state.runningAccuracy = outcome.result.accuracy;
      state.runningWpm = outcome.result.wpm;
      state.wordsCompleted += ENDURANCE_WORDS_PER_ROUND;
      state.roundsCompleted++;
      state.results.push(outcome.result);
      hooks.onRoundComplete?.(outcome.result, state);
    }

    reason = enduranceStopReason(state);
  }

  hooks.onStop?.(reason, state);
  return state;
}
