export { score, type ScoreBreakdown } from './scorer';
export { classifyPrefix, createMistakeLedger, type CharMark, type MistakeLedger } from './classifier';
export { linesToClear, renderTypedPrefix, type RenderFrame } from './renderer';
export {
  BUFFER_CAPACITY,
  applyKey,
  beginTyping,
  buildResult,
  createSession,
  runSession,
  type SessionOptions,
  type SessionOutcome,
  type SessionState,
  type SessionStep,
  type TypingResult,
  type TypingSession,
} from './session';
export {
  ENDURANCE_ACCURACY_THRESHOLD,
  ENDURANCE_WORDS_PER_ROUND,
  ENDURANCE_WPM_THRESHOLD,
  MAX_TARGET_LENGTH,
  RAW_SPEED_MAX_WORDS,
  RAW_SPEED_MIN_WORDS,
  buildTargetText,
  createRoundState,
  enduranceStopReason,
  runEnduranceRound,
  runRawSpeed,
  sampleWords,
  type EnduranceHooks,
  type EnduranceOptions,
  type EnduranceStopReason,
  type RawSpeedRun,
  type RoundState,
  type SampleOptions,
  type SessionRunner,
} from './rounds';
