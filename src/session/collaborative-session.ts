// src/session/collaborative-session.ts
// Runtime around the pure transition function: one FIFO event queue, an
// effect executor that talks to the collaborators, dwell timers and the warm
// recognizer. Collaborator callbacks only ever enqueue events.
import { debugLog, traceLog, warnLog } from '../env/logging';
import { createPlaybackClipper } from '../audio/clipper';
import type { AudioCache, SoundCues, TextToSpeech } from '../audio/types';
import { createBus } from '../core/bus';
import { extractTargetSpan, type TargetExtractor } from '../logic/target-span';
import { createSettingsStore, type SettingsStore } from '../settings/store';
import { defaultMatcher, type PhoneticMatcher } from '../speech/matcher';
import type { RecognizerFactory, SpeechRecognizer } from '../speech/recognizer';
import { createSessionModel, toPublicState, transition, type TransitionContext } from './transition';
import type {
  CollaborativeSessionState,
  Effect,
  ReadingMode,
  SessionEvent,
  SessionModel,
  SessionSignals,
  TextSource,
} from './types';

export interface SessionDeps {
  textSource: TextSource;
  tts: TextToSpeech;
  audioCache: AudioCache;
  recognizerFactory: RecognizerFactory;
  cues: SoundCues;
  matcher?: PhoneticMatcher;
  extractTarget?: TargetExtractor;
  settings?: SettingsStore;
}

export interface CollaborativeSession {
  /** Starts reading from the text source's current sentence. */
  start(): void;
  /** Stops everything and returns to idle; safe to call repeatedly. */
  cancel(): void;
  /**
   * false when refused: kid mode keeps collaboration on, and a recognizer
   * fault keeps it off for the rest of the session
   */
  setCollaborativeMode(enabled: boolean): boolean;
  getState(): CollaborativeSessionState;
  getMode(): ReadingMode;
  isPlaying(): boolean;
  on<K extends keyof SessionSignals & string>(type: K, fn: (detail: SessionSignals[K]) => void): () => void;
  /** Cancels, tears the recognizer down and detaches from the text source. */
  dispose(): void;
}

function publicChanged(a: SessionModel, b: SessionModel): boolean {
  return (
    a.phase !== b.phase ||
    a.target !== b.target ||
    a.attempts.count !== b.attempts.count ||
    a.attempts.lastSuccess !== b.attempts.lastSuccess ||
    a.micLevel !== b.micLevel
  );
}

export function createCollaborativeSession(deps: SessionDeps): CollaborativeSession {
  const settings = deps.settings ?? createSettingsStore();
  const matcher = deps.matcher ?? defaultMatcher;
  const extractTarget = deps.extractTarget ?? extractTargetSpan;
  const clipper = createPlaybackClipper({ tts: deps.tts, cache: deps.audioCache });
  const bus = createBus<SessionSignals>();

  let model = createSessionModel(settings.get().collaborativeMode ? 'collaborative' : 'plain');
  let recognizer: SpeechRecognizer | null = null;
  const timers = new Set<ReturnType<typeof setTimeout>>();
  const queue: SessionEvent[] = [];
  let draining = false;
  let disposed = false;

  const ctx = (): TransitionContext => ({ settings: settings.get(), matcher, extractTarget });

  function dispatch(event: SessionEvent): void {
    if (disposed) return;
    queue.push(event);
    if (draining) return;
    draining = true;
    try {
      for (let next = queue.shift(); next; next = queue.shift()) handle(next);
    } finally {
      draining = false;
    }
  }

  function handle(event: SessionEvent): void {
    const before = model;
    let effects: Effect[];
    try {
      const step = transition(model, event, ctx());
      model = step.model;
      effects = step.effects;
    } catch (err) {
      warnLog('session', `transition failed on ${event.type}`, err);
      return;
    }
    if (before.phase !== model.phase || before.activity !== model.activity) {
      debugLog('session', `${before.phase}/${before.activity} -> ${model.phase}/${model.activity}`, { event: event.type });
    }
    if (publicChanged(before, model)) bus.emit('state', toPublicState(model));
    for (const effect of effects) run(effect);
  }

  function ensureRecognizer(epoch: number): SpeechRecognizer | null {
    if (recognizer) return recognizer;
    try {
      recognizer = deps.recognizerFactory();
      debugLog('session', 'recognizer warmed');
    } catch (err) {
      warnLog('session', 'recognizer creation failed', err);
      dispatch({ type: 'recognizer-error', epoch, code: 'creation-failed' });
    }
    return recognizer;
  }

  function startRecognition(epoch: number): void {
    const r = ensureRecognizer(epoch);
    if (!r) return;
    try {
      r.start({
        onReady: () => dispatch({ type: 'recognizer-ready', epoch }),
        onPartial: (text) => {
          traceLog('session', 'partial', text);
          dispatch({ type: 'partial', epoch, text });
        },
        onResult: (hypotheses) => {
          debugLog('session', 'result', hypotheses);
          dispatch({ type: 'result', epoch, hypotheses: [...hypotheses] });
        },
        onError: (code) => {
          debugLog('session', `recognizer error ${code}`);
          dispatch({ type: 'recognizer-error', epoch, code });
        },
        onRms: (rmsDb) => dispatch({ type: 'rms', epoch, rmsDb }),
      });
    } catch (err) {
      warnLog('session', 'recognizer start threw', err);
      dispatch({ type: 'recognizer-error', epoch, code: 'client' });
    }
  }

  // Audio that throws is reported and treated as finished so reading goes on.
  function playGuarded(operation: SessionSignals['playback-error']['operation'], play: () => void, done: () => void): void {
    try {
      play();
    } catch (err) {
      warnLog('session', `${operation} playback failed`, err);
      bus.emit('playback-error', { operation, error: err });
      done();
    }
  }

  function run(effect: Effect): void {
    switch (effect.kind) {
      case 'prewarm':
        ensureRecognizer(effect.epoch);
        return;
      case 'play-carrier': {
        const { sentence, span, epoch } = effect;
        const done = () => dispatch({ type: 'carrier-done', epoch });
        playGuarded('carrier', () => {
          const how = clipper.playCarrier(sentence, span, done);
          debugLog('session', `carrier ${how}`);
        }, done);
        return;
      }
      case 'play-plain': {
        const { sentence, epoch } = effect;
        const done = () => dispatch({ type: 'plain-done', epoch });
        playGuarded('plain', () => deps.tts.playFull(sentence.text, done), done);
        return;
      }
      case 'play-correction': {
        const { sentence, target, epoch } = effect;
        const done = () => dispatch({ type: 'correction-done', epoch });
        playGuarded('correction', () => {
          const how = clipper.playCorrection(sentence, target, done);
          debugLog('session', `correction ${how}`);
        }, done);
        return;
      }
      case 'start-recognition':
        startRecognition(effect.epoch);
        return;
      case 'cancel-recognition':
        try {
          recognizer?.cancel();
        } catch (err) {
          warnLog('session', 'recognizer cancel threw', err);
        }
        return;
      case 'destroy-recognizer': {
        const r = recognizer;
        recognizer = null;
        try {
          r?.destroy();
        } catch (err) {
          warnLog('session', 'recognizer destroy threw', err);
        }
        return;
      }
      case 'stop-audio':
        try {
          clipper.stop();
        } catch (err) {
          warnLog('session', 'tts stop threw', err);
        }
        return;
      case 'cue': {
        const play = effect.cue === 'success' ? deps.cues.playSuccess : deps.cues.playFailure;
        playGuarded('cue', () => play.call(deps.cues), () => {});
        return;
      }
      case 'schedule-dwell': {
        const { epoch, next, delayMs } = effect;
        const timer = setTimeout(() => {
          timers.delete(timer);
          dispatch({ type: 'dwell-elapsed', epoch, next });
        }, delayMs);
        timers.add(timer);
        return;
      }
      case 'clear-timers':
        timers.forEach((h) => clearTimeout(h));
        timers.clear();
        return;
      case 'advance': {
        bus.emit('advance', { from: effect.from });
        let moved = false;
        try {
          moved = deps.textSource.advance();
        } catch (err) {
          warnLog('session', 'text source advance threw', err);
        }
        if (!moved) dispatch({ type: 'end-of-text' });
        return;
      }
      case 'signal':
        bus.emit(effect.signal, effect.detail);
        return;
    }
  }

  const offNavigate = deps.textSource.onNavigate((sentence) => dispatch({ type: 'navigated', sentence }));
  let collaborativeSetting = settings.get().collaborativeMode;
  const offSettings = settings.subscribe((next) => {
    if (next.collaborativeMode === collaborativeSetting) return;
    collaborativeSetting = next.collaborativeMode;
    dispatch({ type: 'mode-toggled', enabled: next.collaborativeMode });
  });

  function currentSentence() {
    try {
      return deps.textSource.currentSentence();
    } catch (err) {
      warnLog('session', 'text source currentSentence threw', err);
      return null;
    }
  }

  return {
    start() {
      dispatch({ type: 'play', sentence: currentSentence() });
    },

    cancel() {
      dispatch({ type: 'cancel' });
    },

    setCollaborativeMode(enabled: boolean): boolean {
      if (!enabled && settings.get().kidMode) return false;
      if (enabled && model.disabledReported) return false;
      settings.set({ collaborativeMode: enabled });
      return true;
    },

    getState: () => toPublicState(model),
    getMode: () => model.mode,
    isPlaying: () => model.playing,
    on: (type, fn) => bus.on(type, fn),

    dispose() {
      if (disposed) return;
      dispatch({ type: 'cancel' });
      run({ kind: 'destroy-recognizer' });
      run({ kind: 'clear-timers' });
      offNavigate();
      offSettings();
      disposed = true;
    },
  };
}
