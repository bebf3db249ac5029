import { createTimestampCache } from '../../src/audio/timestamp-cache';
import { createCollaborativeSession } from '../../src/session/collaborative-session';
import type { Sentence, SessionPhase, TextSource } from '../../src/session/types';
import { createSettingsStore } from '../../src/settings/store';
import type { RecognitionListener } from '../../src/speech/recognizer';

const DOG: Sentence = { text: 'The dog ran fast.', isComplete: true };
const CAT: Sentence = { text: 'The cat sat.', isComplete: true };

function createTextSource(sentences: Sentence[]) {
  let index = 0;
  const listeners = new Set<(s: Sentence | null) => void>();
  const notify = () => listeners.forEach((fn) => fn(sentences[index] ?? null));
  const source: TextSource & { goTo(i: number): void } = {
    currentSentence: () => sentences[index] ?? null,
    advance() {
      if (index + 1 >= sentences.length) return false;
      index += 1;
      notify();
      return true;
    },
    onNavigate(fn) {
      listeners.add(fn);
      return () => {
        listeners.delete(fn);
      };
    },
    goTo(i) {
      index = i;
      notify();
    },
  };
  return source;
}

function createFakeTts() {
  const pending: Array<() => void> = [];
  const tts = {
    playCarrierUntil: jest.fn((_text: string, _ms: number, done: () => void) => {
      pending.push(done);
    }),
    playFull: jest.fn((_text: string, done: () => void) => {
      pending.push(done);
    }),
    playFrom: jest.fn((_text: string, _ms: number, done: () => void) => {
      pending.push(done);
    }),
    stop: jest.fn(),
  };
  // Completes the most recent playback.
  const finish = () => pending.pop()?.();
  return { tts, finish, pending };
}

function createFakeRecognizer() {
  let current: RecognitionListener | null = null;
  const recognizer = {
    start: jest.fn((l: RecognitionListener) => {
      current = l;
    }),
    cancel: jest.fn(),
    destroy: jest.fn(),
  };
  const listener = (): RecognitionListener => {
    if (!current) throw new Error('recognizer was never started');
    return current;
  };
  return { recognizer, listener };
}

function setup(sentences: Sentence[] = [DOG, CAT], settings = createSettingsStore({ successDwellMs: 1000, failureDwellMs: 500 })) {
  const textSource = createTextSource(sentences);
  const { tts, finish, pending } = createFakeTts();
  const { recognizer, listener } = createFakeRecognizer();
  const recognizerFactory = jest.fn(() => recognizer);
  const cues = { playSuccess: jest.fn(), playFailure: jest.fn() };
  const audioCache = createTimestampCache();
  const session = createCollaborativeSession({ textSource, tts, audioCache, recognizerFactory, cues, settings });
  const phases: SessionPhase[] = [];
  session.on('state', (s) => phases.push(s.phase));
  return { session, textSource, tts, finish, pending, recognizer, listener, recognizerFactory, cues, audioCache, phases, settings };
}

describe('collaborative session', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  test('reads the carrier, hears the target and moves on', () => {
    const t = setup();
    const advances: Sentence[] = [];
    t.session.on('advance', ({ from }) => advances.push(from));

    t.session.start();
    expect(t.recognizerFactory).toHaveBeenCalledTimes(1);
    expect(t.tts.playFull).toHaveBeenCalledWith('The dog ran fast.', expect.any(Function));
    expect(t.session.getState().target).toBeNull();

    t.finish();
    expect(t.session.getState().phase).toBe('listening');
    expect(t.session.getState().target).toEqual({ phrase: 'ran fast.', charRange: [8, 17] });
    expect(t.recognizer.start).toHaveBeenCalledTimes(1);

    t.listener().onResult(['ran fast']);
    expect(t.cues.playSuccess).toHaveBeenCalledTimes(1);
    expect(t.session.getState().attempts).toEqual({ count: 0, lastSuccess: true });

    jest.advanceTimersByTime(999);
    expect(advances).toEqual([]);
    jest.advanceTimersByTime(1);
    expect(advances).toEqual([DOG]);

    expect(t.tts.playFull).toHaveBeenLastCalledWith('The cat sat.', expect.any(Function));
    expect(t.recognizerFactory).toHaveBeenCalledTimes(1);
    expect(t.phases).toEqual(['listening', 'feedback', 'idle']);
  });

  test('clips the carrier once the sentence audio is cached', () => {
    const t = setup();
    t.audioCache.store(
      DOG.text,
      JSON.stringify([
        { word: 'The', start_time: 0, end_time: 0.25 },
        { word: 'dog', start_time: 0.25, end_time: 0.5 },
        { word: 'ran', start_time: 0.5, end_time: 0.75 },
        { word: 'fast.', start_time: 0.75, end_time: 1.25 },
      ]),
    );
    t.session.start();
    expect(t.tts.playCarrierUntil).toHaveBeenCalledWith('The dog ran fast.', 500, expect.any(Function));
    expect(t.tts.playFull).not.toHaveBeenCalled();
  });

  test('three misses play the correction and start over', () => {
    const t = setup();
    const attempts: Array<[number, boolean, boolean]> = [];
    t.session.on('attempt', (a) => attempts.push([a.attempt, a.success, a.afterCorrection]));
    const corrections = jest.fn();
    t.session.on('correction', corrections);

    t.session.start();
    t.finish();
    for (let i = 0; i < 3; i++) {
      t.listener().onResult(['run fast']);
      jest.advanceTimersByTime(500);
    }
    expect(t.cues.playFailure).toHaveBeenCalledTimes(3);
    expect(t.recognizer.start).toHaveBeenCalledTimes(3);
    expect(corrections).toHaveBeenCalledTimes(1);
    expect(t.tts.playFull).toHaveBeenLastCalledWith('ran fast.', expect.any(Function));

    t.finish();
    expect(t.session.getState()).toMatchObject({ phase: 'listening', attempts: { count: 0, lastSuccess: null } });
    expect(t.recognizer.start).toHaveBeenCalledTimes(4);

    t.listener().onResult(['ran fast']);
    expect(attempts).toEqual([
      [1, false, false],
      [2, false, false],
      [3, false, false],
      [1, true, true],
    ]);
  });

  test('late callbacks from a cancelled window are ignored', () => {
    const t = setup();
    t.session.start();
    t.finish();
    const stale = t.listener();

    t.session.cancel();
    t.session.cancel();
    expect(t.recognizer.cancel).toHaveBeenCalledTimes(1);
    expect(t.recognizer.destroy).not.toHaveBeenCalled();

    stale.onResult(['ran fast']);
    expect(t.cues.playSuccess).not.toHaveBeenCalled();
    expect(t.session.getState().phase).toBe('idle');
    expect(t.session.isPlaying()).toBe(false);
  });

  test('navigation mid-attempt starts the new sentence', () => {
    const t = setup();
    t.session.start();
    t.finish();
    t.textSource.goTo(1);

    expect(t.recognizer.cancel).toHaveBeenCalledTimes(1);
    expect(t.tts.playFull).toHaveBeenLastCalledWith('The cat sat.', expect.any(Function));
    expect(t.session.getState()).toMatchObject({ phase: 'idle', target: null });
  });

  test('a recognizer that cannot be built falls back to plain reading', () => {
    const t = setup();
    t.recognizerFactory.mockImplementation(() => {
      throw new Error('no recognizer');
    });
    const disabled = jest.fn();
    t.session.on('collaborative-disabled', disabled);

    t.session.start();
    expect(disabled).toHaveBeenCalledWith({ code: 'creation-failed' });
    expect(t.session.getMode()).toBe('plain');
    expect(t.tts.stop).toHaveBeenCalledTimes(1);
    expect(t.tts.playFull).toHaveBeenCalledTimes(2);

    t.finish();
    expect(t.session.isPlaying()).toBe(false);
    t.finish();
    expect(t.recognizer.start).not.toHaveBeenCalled();
    expect(disabled).toHaveBeenCalledTimes(1);
  });

  test('a permission error while listening disables collaboration once', () => {
    const t = setup();
    const disabled = jest.fn();
    t.session.on('collaborative-disabled', disabled);
    t.session.start();
    t.finish();
    const listener = t.listener();

    listener.onError('insufficient-permissions');
    listener.onError('audio');
    expect(disabled).toHaveBeenCalledTimes(1);
    expect(t.recognizer.destroy).toHaveBeenCalledTimes(1);
    expect(t.tts.playFull).toHaveBeenLastCalledWith('The dog ran fast.', expect.any(Function));
  });

  test('unrelated settings changes leave collaboration off after a fault', () => {
    const t = setup();
    t.session.start();
    t.finish();
    t.listener().onError('insufficient-permissions');
    expect(t.session.getMode()).toBe('plain');
    expect(t.session.isPlaying()).toBe(true);

    t.settings.set({ autoAdvance: true });
    expect(t.session.getMode()).toBe('plain');
    expect(t.session.isPlaying()).toBe(true);
    expect(t.tts.stop).not.toHaveBeenCalled();
    expect(t.session.setCollaborativeMode(true)).toBe(false);

    t.finish();
    expect(t.tts.playFull).toHaveBeenLastCalledWith('The cat sat.', expect.any(Function));
    expect(t.recognizer.start).toHaveBeenCalledTimes(1);
  });

  test('cancel during the failure dwell never reopens the mic', () => {
    const t = setup();
    t.session.start();
    t.finish();
    t.listener().onResult(['run fast']);
    t.session.cancel();

    jest.advanceTimersByTime(5000);
    expect(t.recognizer.start).toHaveBeenCalledTimes(1);
    expect(t.session.getState()).toEqual({
      phase: 'idle',
      target: null,
      attempts: { count: 0, lastSuccess: null },
      micLevel: 0,
    });
  });

  test('playback failures are reported and reading carries on', () => {
    const t = setup();
    t.tts.playFull.mockImplementationOnce(() => {
      throw new Error('tts offline');
    });
    const errors = jest.fn();
    t.session.on('playback-error', errors);

    t.session.start();
    expect(errors).toHaveBeenCalledWith({ operation: 'carrier', error: expect.any(Error) });
    expect(t.session.getState().phase).toBe('listening');
  });

  test('incomplete sentences are skipped', () => {
    const partial: Sentence = { text: 'The dog', isComplete: false };
    const t = setup([partial, CAT]);
    const skipped = jest.fn();
    t.session.on('skipped', skipped);

    t.session.start();
    expect(skipped).toHaveBeenCalledWith({ sentence: partial });
    expect(t.tts.playFull).toHaveBeenCalledTimes(1);
    expect(t.tts.playFull).toHaveBeenCalledWith('The cat sat.', expect.any(Function));
  });

  test('the last sentence ends the text', () => {
    const t = setup([CAT]);
    const ended = jest.fn();
    t.session.on('end-of-text', ended);

    t.session.start();
    t.finish();
    t.listener().onResult(['cat sat']);
    jest.advanceTimersByTime(1000);
    expect(ended).toHaveBeenCalledTimes(1);
    expect(t.session.isPlaying()).toBe(false);
  });

  test('the mic level follows rms while listening', () => {
    const t = setup();
    t.session.start();
    t.finish();
    t.listener().onRms?.(4);
    expect(t.session.getState().micLevel).toBe(50);
  });

  test('kid mode refuses to turn collaboration off', () => {
    const t = setup();
    expect(t.session.setCollaborativeMode(false)).toBe(false);
    expect(t.session.getMode()).toBe('collaborative');
  });

  test('turning collaboration off destroys the recognizer', () => {
    const t = setup([DOG, CAT], createSettingsStore({ kidMode: false }));
    t.session.start();
    t.finish();
    expect(t.session.setCollaborativeMode(false)).toBe(true);
    expect(t.session.getMode()).toBe('plain');
    expect(t.recognizer.destroy).toHaveBeenCalledTimes(1);
    expect(t.settings.get().collaborativeMode).toBe(false);
  });

  test('dispose detaches from the text source', () => {
    const t = setup();
    t.session.start();
    t.session.dispose();
    t.textSource.goTo(1);
    expect(t.tts.playFull).toHaveBeenCalledTimes(1);
    expect(t.tts.stop).toHaveBeenCalledTimes(1);
    expect(t.recognizer.destroy).toHaveBeenCalledTimes(1);
  });
});
