// Speech recognizer contract, error taxonomy and mic-level scaling.
// The engine never talks to a platform recognizer directly; hosts hand it a
// factory (see engines/webspeech.ts for the Web Speech wrapper).

export type RecognizerErrorCode =
  | 'no-match'
  | 'speech-timeout'
  | 'busy'
  | 'network'
  | 'network-timeout'
  | 'server'
  | 'aborted'
  | 'audio'
  | 'insufficient-permissions'
  | 'client'
  | 'service-unavailable'
  | 'language-unavailable'
  | 'creation-failed';

/**
 * attempt   - the reader hesitated or said something else; counts as a try
 * transient - flaky recognizer/network; also counts as a try
 * fatal     - collaborative mode cannot work this session
 */
export type RecognizerErrorClass = 'attempt' | 'transient' | 'fatal';

const ERROR_CLASS: Record<RecognizerErrorCode, RecognizerErrorClass> = {
  'no-match': 'attempt',
  'speech-timeout': 'attempt',
  busy: 'transient',
  network: 'transient',
  'network-timeout': 'transient',
  server: 'transient',
  aborted: 'transient',
  audio: 'fatal',
  'insufficient-permissions': 'fatal',
  client: 'fatal',
  'service-unavailable': 'fatal',
  'language-unavailable': 'fatal',
  'creation-failed': 'fatal',
};

export function classifyRecognizerError(code: RecognizerErrorCode): RecognizerErrorClass {
  return ERROR_CLASS[code];
}

export function isFatalRecognizerError(code: RecognizerErrorCode): boolean {
  return ERROR_CLASS[code] === 'fatal';
}

export interface RecognitionListener {
  onReady(): void;
  onPartial(text: string): void;
  /** Candidate transcriptions for one utterance, best first */
  onResult(hypotheses: string[]): void;
  onError(code: RecognizerErrorCode): void;
  /** Input level in dB as reported by the platform */
  onRms?(rmsDb: number): void;
}

export interface SpeechRecognizer {
  /** Opens one listening window; ends with exactly one onResult or onError. */
  start(listener: RecognitionListener): void;
  /** Stops listening but keeps the recognizer warm for the next start(). */
  cancel(): void;
  destroy(): void;
}

export type RecognizerFactory = () => SpeechRecognizer;

export type MicRange = { floorDb: number; ceilDb: number };

/** Scales a platform RMS dB reading onto 0..100 for the level meter. */
export function toMicLevel(rmsDb: number, range: MicRange): number {
  if (!Number.isFinite(rmsDb)) return 0;
  const span = range.ceilDb - range.floorDb;
  if (!(span > 0)) return 0;
  const ratio = (rmsDb - range.floorDb) / span;
  return Math.round(Math.max(0, Math.min(1, ratio)) * 100);
}
