// Session types & interfaces
import type { TargetSpan } from '../logic/target-span';
import type { RecognizerErrorCode } from '../speech/recognizer';

export interface Sentence {
  readonly text: string;
  /** false when the page cut the sentence off mid-thought */
  readonly isComplete: boolean;
}

export interface TextSource {
  currentSentence(): Sentence | null;
  /** Moves to the next sentence; false at the end of the text. */
  advance(): boolean;
  /** Fires after any navigation, including the ones advance() causes. */
  onNavigate(fn: (sentence: Sentence | null) => void): () => void;
}

export type SessionPhase = 'idle' | 'listening' | 'feedback';

export interface AttemptRecord {
  count: number; // 0..MAX_ATTEMPTS
  lastSuccess: boolean | null;
}

export interface CollaborativeSessionState {
  phase: SessionPhase;
  target: TargetSpan | null;
  attempts: AttemptRecord;
  micLevel: number; // 0..100
}

export type ReadingMode = 'collaborative' | 'plain';

// What the session is waiting on. Only one of carrier/correction/plain-reading
// (audio out) or recognizing (mic in) is ever active.
export type SessionActivity = 'none' | 'carrier' | 'recognizing' | 'dwell' | 'correction' | 'plain-reading';

export interface SessionModel extends CollaborativeSessionState {
  mode: ReadingMode;
  playing: boolean;
  sentence: Sentence | null;
  activity: SessionActivity;
  /** Bumped whenever in-flight work is abandoned; stale callbacks carry an old value. */
  epoch: number;
  disabledReported: boolean;
  /** the correction was played for the current target */
  escalated: boolean;
}

export type DwellNext = 'advance' | 'retry' | 'correct';

export type SessionEvent =
  | { type: 'play'; sentence: Sentence | null }
  | { type: 'cancel' }
  | { type: 'navigated'; sentence: Sentence | null }
  | { type: 'mode-toggled'; enabled: boolean }
  | { type: 'end-of-text' }
  | { type: 'carrier-done'; epoch: number }
  | { type: 'recognizer-ready'; epoch: number }
  | { type: 'partial'; epoch: number; text: string }
  | { type: 'result'; epoch: number; hypotheses: string[] }
  | { type: 'recognizer-error'; epoch: number; code: RecognizerErrorCode }
  | { type: 'rms'; epoch: number; rmsDb: number }
  | { type: 'dwell-elapsed'; epoch: number; next: DwellNext }
  | { type: 'correction-done'; epoch: number }
  | { type: 'plain-done'; epoch: number };

export type AttemptSignal = {
  /** 1-based within the current attempt budget */
  attempt: number;
  success: boolean;
  /** the reader heard the correction before this attempt */
  afterCorrection: boolean;
};

export type SessionSignals = {
  state: CollaborativeSessionState;
  advance: { from: Sentence };
  attempt: AttemptSignal;
  correction: { target: TargetSpan };
  skipped: { sentence: Sentence };
  'collaborative-disabled': { code: RecognizerErrorCode };
  'playback-error': { operation: 'carrier' | 'correction' | 'plain' | 'cue'; error: unknown };
  'end-of-text': Record<string, never>;
};

export type Effect =
  | { kind: 'prewarm'; epoch: number }
  | { kind: 'play-carrier'; sentence: Sentence; span: TargetSpan; epoch: number }
  | { kind: 'play-plain'; sentence: Sentence; epoch: number }
  | { kind: 'play-correction'; sentence: Sentence; target: TargetSpan; epoch: number }
  | { kind: 'start-recognition'; epoch: number }
  | { kind: 'cancel-recognition' }
  | { kind: 'destroy-recognizer' }
  | { kind: 'stop-audio' }
  | { kind: 'cue'; cue: 'success' | 'failure' }
  | { kind: 'schedule-dwell'; next: DwellNext; delayMs: number; epoch: number }
  | { kind: 'clear-timers' }
  | { kind: 'advance'; from: Sentence }
  | SignalEffect;

type SignalName = Exclude<keyof SessionSignals, 'state' | 'playback-error'>;

export type SignalEffect = {
  [K in SignalName]: { kind: 'signal'; signal: K; detail: SessionSignals[K] };
}[SignalName];
