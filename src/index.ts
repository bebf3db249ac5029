// Public surface of the collaborative reading engine.
export { countSyllables } from './logic/syllables';
export { normTokens, normWord, stripPunctuation } from './logic/normTokens';
export { extractTargetSpan, carrierText } from './logic/target-span';
export type { TargetSpan, TargetExtractor } from './logic/target-span';

export { createHomophoneTable, englishHomophones } from './speech/homophones';
export type { HomophoneTable } from './speech/homophones';
export { createPhoneticComparator, doubleMetaphoneEncoder, defaultPhonetic } from './speech/phonetic';
export type { PhoneticComparator, PhoneticEncoder, PhoneticOptions } from './speech/phonetic';
export { createPhoneticMatcher, defaultMatcher, isMatch } from './speech/matcher';
export type { MatcherOptions, PhoneticMatcher, TokenMatchKind } from './speech/matcher';
export { classifyRecognizerError, isFatalRecognizerError, toMicLevel } from './speech/recognizer';
export type {
  MicRange,
  RecognitionListener,
  RecognizerErrorClass,
  RecognizerErrorCode,
  RecognizerFactory,
  SpeechRecognizer,
} from './speech/recognizer';
export { createWebSpeechRecognizer, fromWebSpeechError } from './speech/engines/webspeech';
export type { WebSpeechCtor, WebSpeechOptions, WebSpeechRecognition } from './speech/engines/webspeech';

export { createPlaybackClipper } from './audio/clipper';
export type { CarrierPlayback, CorrectionPlayback, PlaybackClipper } from './audio/clipper';
export { createTimestampCache, parseTimestamps } from './audio/timestamp-cache';
export type { TimestampCache, WordTimestamp } from './audio/timestamp-cache';
export type { AudioCache, SoundCues, TextToSpeech } from './audio/types';

export { createCollaborativeSession } from './session/collaborative-session';
export type { CollaborativeSession, SessionDeps } from './session/collaborative-session';
export { MAX_ATTEMPTS, createSessionModel, toPublicState, transition } from './session/transition';
export type { Step, TransitionContext } from './session/transition';
export { computeWordHighlights } from './session/highlight';
export type { WordHighlight, WordHighlightState } from './session/highlight';
export type {
  AttemptRecord,
  AttemptSignal,
  CollaborativeSessionState,
  ReadingMode,
  Sentence,
  SessionPhase,
  SessionSignals,
  TextSource,
} from './session/types';

export { DEFAULT_READER_SETTINGS, normalizeSettings, settingsFromEnv } from './settings/schema';
export type { ReaderSettings } from './settings/schema';
export { createSettingsStore } from './settings/store';
export type { SettingsStore } from './settings/store';

export { createBus } from './core/bus';
export type { Bus, BusHandler } from './core/bus';
export { getLogLevel, setLogLevel } from './env/dev-log';
