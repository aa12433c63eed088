import { describe, it, expect, vi } from 'vitest';
import {
  buildTargetText,
  enduranceStopReason,
  createRoundState,
  runEnduranceRound,
  runRawSpeed,
  sampleWords,
  ENDURANCE_WORDS_PER_ROUND,
  type SessionRunner,
} from './rounds';
import type { SessionOutcome, TypingResult } from './session';

const POOL = ['alpha', 'bravo', 'charlie', 'delta', 'echo', 'foxtrot', 'golf', 'hotel', 'india', 'juliet'];

function finished(accuracy: number, wpm: number): SessionOutcome {
  const result: TypingResult = {
    totalKeystrokes: 10,
    incorrectKeystrokes: 0,
    correctChars: 10,
    accuracy,
    wpm,
    elapsedSeconds: 5,
    text: '',
    typed: '',
    breakdown: { accuracy: 100, mistyped: 0, missed: 0, extra: 0 },
  };
  return { status: 'completed', result };
}

function scriptedRunner(...outcomes: SessionOutcome[]) {
  const targets: string[] = [];
  const runner: SessionRunner = target => {
    targets.push(target);
    const outcome = outcomes.shift();
    if (!outcome) return Promise.reject(new Error('No more outcomes'));
    return Promise.resolve(outcome);
  };
  return { runner, targets };
}

describe('sampleWords', () => {
  it('draws distinct words while the pool lasts', () => {
    const words = sampleWords(POOL, 6);
    expect(words).toHaveLength(6);
    expect(new Set(words).size).toBe(6);
    for (const word of words) expect(POOL).toContain(word);
  });

  it('stops at the pool size without reuse', () => {
    const words = sampleWords(POOL, 15);
    expect(words).toHaveLength(10);
    expect([...words].sort()).toEqual([...POOL].sort());
  });

  it('fills with repeats when reuse is allowed', () => {
    const words = sampleWords(['only'], 4, { allowReuse: true });
    expect(words).toEqual(['only', 'only', 'only', 'only']);
  });

  it('keeps pool order when random always returns 0', () => {
    expect(sampleWords(POOL, 3, { random: () => 0 })).toEqual(['alpha', 'bravo', 'charlie']);
  });

  it('returns nothing for an empty pool or a non-positive count', () => {
    expect(sampleWords([], 5, { allowReuse: true })).toEqual([]);
    expect(sampleWords(POOL, 0)).toEqual([]);
  });

  it('does not mutate the pool', () => {
    const pool = [...POOL];
    sampleWords(pool, 5);
    expect(pool).toEqual(POOL);
  });
});

describe('buildTargetText', () => {
  it('joins words with single spaces', () => {
    expect(buildTargetText(['one', 'two', 'three'])).toBe('one two three');
  });

  it('stops before a word that would exceed the limit', () => {
    expect(buildTargetText(['abc', 'def', 'ghi'], 7)).toBe('abc def');
    expect(buildTargetText(['abc', 'def', 'ghi'], 6)).toBe('abc');
  });

  it('never exceeds 999 characters by default', () => {
    const words = Array.from({ length: 300 }, () => 'abcdefghi');
    const text = buildTargetText(words);
    // 100 words of 9 chars plus 99 spaces
    expect(text.length).toBe(999);
  });
});

describe('runRawSpeed', () => {
  it('uses every word when more are requested than the pool holds', async () => {
    const { runner, targets } = scriptedRunner(finished(100, 60));
    const run = await runRawSpeed(POOL, 15, runner);

    expect(run.wordCount).toBe(10);
    expect(run.clamped).toBe(true);
    expect(targets).toEqual([run.target]);
    expect(run.target.split(' ').sort()).toEqual([...POOL].sort());
  });

  it('builds the requested number of words', async () => {
    const { runner } = scriptedRunner(finished(100, 60));
    const run = await runRawSpeed(POOL, 4, runner, { random: () => 0 });

    expect(run.target).toBe('alpha bravo charlie delta');
    expect(run.clamped).toBe(false);
    expect(run.outcome.status).toBe('completed');
  });

  it('passes a cancelled outcome through', async () => {
    const { runner } = scriptedRunner({ status: 'cancelled' });
    const run = await runRawSpeed(POOL, 5, runner);
    expect(run.outcome).toEqual({ status: 'cancelled' });
  });
});

describe('enduranceStopReason', () => {
  it('continues at exactly the thresholds', () => {
    const state = { ...createRoundState(), runningAccuracy: 85, runningWpm: 30 };
    expect(enduranceStopReason(state)).toBeNull();
  });

  it('checks cancel, then accuracy, then speed', () => {
    expect(enduranceStopReason({ ...createRoundState(), cancelled: true, runningAccuracy: 10 })).toBe('cancelled');
    expect(enduranceStopReason({ ...createRoundState(), runningAccuracy: 84.99, runningWpm: 10 })).toBe('accuracy');
    expect(enduranceStopReason({ ...createRoundState(), runningWpm: 29.99 })).toBe('speed');
  });
});

describe('runEnduranceRound', () => {
  it('plays rounds until accuracy drops', async () => {
    const { runner, targets } = scriptedRunner(finished(98, 70), finished(90, 55), finished(80, 60));
    const state = await runEnduranceRound(POOL, runner, { random: () => 0 });

    expect(targets).toHaveLength(3);
    expect(targets[0].split(' ')).toHaveLength(ENDURANCE_WORDS_PER_ROUND);
    expect(state.roundsCompleted).toBe(3);
    expect(state.wordsCompleted).toBe(30);
    expect(state.runningAccuracy).toBe(80);
    expect(state.runningWpm).toBe(60);
    expect(state.results).toHaveLength(3);
    expect(state.cancelled).toBe(false);
  });

  it('stops on low speed after one round', async () => {
    const onStop = vi.fn();
    const { runner } = scriptedRunner(finished(100, 12));
    const state = await runEnduranceRound(POOL, runner, { hooks: { onStop } });

    expect(state.roundsCompleted).toBe(1);
    expect(state.wordsCompleted).toBe(10);
    expect(onStop).toHaveBeenCalledOnce();
    expect(onStop.mock.calls[0][0]).toBe('speed');
  });

  it('keeps earlier rounds when cancelled', async () => {
    const onRoundComplete = vi.fn();
    const onStop = vi.fn();
    const { runner } = scriptedRunner(finished(95, 50), { status: 'cancelled' });
    const state = await runEnduranceRound(POOL, runner, { hooks: { onRoundComplete, onStop } });

    expect(state.cancelled).toBe(true);
    expect(state.roundsCompleted).toBe(1);
    expect(state.wordsCompleted).toBe(10);
    expect(state.runningAccuracy).toBe(95);
    expect(onRoundComplete).toHaveBeenCalledTimes(1);
    expect(onStop.mock.calls[0][0]).toBe('cancelled');
  });

  it('reports round numbers and the running figures before each round', async () => {
    const seen: Array<[number, number, number]> = [];
    const { runner } = scriptedRunner(finished(92, 45), finished(70, 45));
    await runEnduranceRound(POOL, runner, {
      hooks: {
        onRoundStart: (round, state) => {
          seen.push([round, state.runningAccuracy, state.runningWpm]);
        },
      },
    });

    expect(seen).toEqual([
      [1, 100, 100],
      [2, 92, 45],
    ]);
  });

  it('reuses words when the pool is smaller than a round', async () => {
    const { runner, targets } = scriptedRunner(finished(50, 50));
    await runEnduranceRound(['dog'], runner);
    expect(targets).toEqual([Array.from({ length: 10 }, () => 'dog').join(' ')]);
  });

  it('stops immediately with an empty pool', async () => {
    const onStop = vi.fn();
    const { runner, targets } = scriptedRunner();
    const state = await runEnduranceRound([], runner, { hooks: { onStop } });

    expect(targets).toEqual([]);
    expect(state.roundsCompleted).toBe(0);
    expect(onStop.mock.calls[0][0]).toBe('empty-pool');
  });
});
