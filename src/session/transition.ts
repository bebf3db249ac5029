// src/session/transition.ts
// The only place session state changes. Pure: (model, event) -> (model, effects).
// Callbacks from collaborators come back in as events; anything carrying an
// epoch other than the model's belongs to abandoned work and is dropped.
import { normTokens } from '../logic/normTokens';
import type { TargetExtractor } from '../logic/target-span';
import type { ReaderSettings } from '../settings/schema';
import type { PhoneticMatcher } from '../speech/matcher';
import { classifyRecognizerError, toMicLevel, type RecognizerErrorCode } from '../speech/recognizer';
import type {
  AttemptRecord,
  CollaborativeSessionState,
  Effect,
  ReadingMode,
  SessionEvent,
  SessionModel,
  Sentence,
} from './types';

export const MAX_ATTEMPTS = 3;

export interface TransitionContext {
  settings: ReaderSettings;
  matcher: PhoneticMatcher;
  extractTarget: TargetExtractor;
}

export type Step = { model: SessionModel; effects: Effect[] };

export function emptyAttempts(): AttemptRecord {
  return { count: 0, lastSuccess: null };
}

export function createSessionModel(mode: ReadingMode = 'collaborative'): SessionModel {
  return {
    phase: 'idle',
    target: null,
    attempts: emptyAttempts(),
    micLevel: 0,
    mode,
    playing: false,
    sentence: null,
    activity: 'none',
    epoch: 0,
    disabledReported: false,
    escalated: false,
  };
}

export function toPublicState(model: SessionModel): CollaborativeSessionState {
  return {
    phase: model.phase,
    target: model.target
      ? { phrase: model.target.phrase, charRange: [model.target.charRange[0], model.target.charRange[1]] }
      : null,
    attempts: { ...model.attempts },
    micLevel: model.micLevel,
  };
}

const unchanged = (model: SessionModel): Step => ({ model, effects: [] });

// Effects that abandon whatever the model is waiting on.
function halt(model: SessionModel): Effect[] {
  const effects: Effect[] = [{ kind: 'clear-timers' }];
  if (model.activity === 'recognizing') effects.push({ kind: 'cancel-recognition' });
  if (model.activity === 'carrier' || model.activity === 'correction' || model.activity === 'plain-reading') {
    effects.push({ kind: 'stop-audio' });
  }
  return effects;
}

function reset(model: SessionModel): SessionModel {
  return {
    ...model,
    phase: 'idle',
    target: null,
    attempts: emptyAttempts(),
    micLevel: 0,
    activity: 'none',
    epoch: model.epoch + 1,
    escalated: false,
  };
}

function begin(base: SessionModel, sentence: Sentence | null, ctx: TransitionContext, effects: Effect[]): Step {
  const model: SessionModel = { ...base, sentence };
  if (!model.playing || !sentence) return { model, effects };

  // cut off at the page edge, or nothing a reader could say
  if (!sentence.isComplete || !normTokens(sentence.text).length) {
    return {
      model,
      effects: [
        ...effects,
        { kind: 'signal', signal: 'skipped', detail: { sentence } },
        { kind: 'advance', from: sentence },
      ],
    };
  }

  const epoch = model.epoch;
  if (model.mode === 'plain') {
    return {
      model: { ...model, activity: 'plain-reading' },
      effects: [...effects, { kind: 'play-plain', sentence, epoch }],
    };
  }

  const span = ctx.extractTarget(sentence.text);
  return {
    model: { ...model, activity: 'carrier' },
    effects: [...effects, { kind: 'prewarm', epoch }, { kind: 'play-carrier', sentence, span, epoch }],
  };
}

function listen(model: SessionModel, attempts: AttemptRecord, patch: Partial<SessionModel> = {}): Step {
  const epoch = model.epoch + 1;
  return {
    model: { ...model, ...patch, phase: 'listening', attempts, micLevel: 0, activity: 'recognizing', epoch },
    effects: [{ kind: 'start-recognition', epoch }],
  };
}

function succeed(model: SessionModel, ctx: TransitionContext): Step {
  const epoch = model.epoch + 1;
  return {
    model: {
      ...model,
      phase: 'feedback',
      attempts: { count: model.attempts.count, lastSuccess: true },
      micLevel: 0,
      activity: 'dwell',
      epoch,
    },
    effects: [
      { kind: 'cue', cue: 'success' },
      {
        kind: 'signal',
        signal: 'attempt',
        detail: { attempt: model.attempts.count + 1, success: true, afterCorrection: model.escalated },
      },
      { kind: 'schedule-dwell', next: 'advance', delayMs: ctx.settings.successDwellMs, epoch },
    ],
  };
}

function fail(model: SessionModel, ctx: TransitionContext): Step {
  const epoch = model.epoch + 1;
  const count = Math.min(MAX_ATTEMPTS, model.attempts.count + 1);
  return {
    model: {
      ...model,
      phase: 'feedback',
      attempts: { count, lastSuccess: false },
      micLevel: 0,
      activity: 'dwell',
      epoch,
    },
    effects: [
      { kind: 'cue', cue: 'failure' },
      {
        kind: 'signal',
        signal: 'attempt',
        detail: { attempt: count, success: false, afterCorrection: model.escalated },
      },
      {
        kind: 'schedule-dwell',
        next: count >= MAX_ATTEMPTS ? 'correct' : 'retry',
        delayMs: ctx.settings.failureDwellMs,
        epoch,
      },
    ],
  };
}

function disable(model: SessionModel, code: RecognizerErrorCode, ctx: TransitionContext): Step {
  const effects: Effect[] = [...halt(model), { kind: 'destroy-recognizer' }];
  if (!model.disabledReported) {
    effects.push({ kind: 'signal', signal: 'collaborative-disabled', detail: { code } });
  }
  const base = reset({ ...model, mode: 'plain', disabledReported: true });
  return begin(base, model.sentence, ctx, effects);
}

export function transition(model: SessionModel, event: SessionEvent, ctx: TransitionContext): Step {
  const live = (epoch: number) => epoch === model.epoch;

  switch (event.type) {
    case 'play': {
      if (model.playing && model.activity !== 'none') return unchanged(model);
      return begin(reset({ ...model, playing: true }), event.sentence, ctx, halt(model));
    }

    case 'cancel': {
      if (!model.playing && model.phase === 'idle' && model.activity === 'none') return unchanged(model);
      return { model: reset({ ...model, playing: false }), effects: halt(model) };
    }

    case 'navigated':
      return begin(reset(model), event.sentence, ctx, halt(model));

    case 'mode-toggled': {
      const mode: ReadingMode = event.enabled ? 'collaborative' : 'plain';
      if (mode === model.mode) return unchanged(model);
      // a recognizer fault turned collaboration off for the rest of the session
      if (event.enabled && model.disabledReported) return unchanged(model);
      const effects = halt(model);
      if (!event.enabled) effects.push({ kind: 'destroy-recognizer' });
      return {
        model: reset({ ...model, mode, playing: false }),
        effects,
      };
    }

    case 'end-of-text':
      return {
        model: { ...model, playing: false },
        effects: [{ kind: 'signal', signal: 'end-of-text', detail: {} }],
      };

    case 'carrier-done': {
      if (!live(event.epoch) || model.activity !== 'carrier' || !model.sentence) return unchanged(model);
      return listen(model, model.attempts, { target: ctx.extractTarget(model.sentence.text) });
    }

    case 'recognizer-ready':
    case 'partial':
      return unchanged(model);

    case 'rms': {
      if (!live(event.epoch) || model.activity !== 'recognizing') return unchanged(model);
      const micLevel = toMicLevel(event.rmsDb, { floorDb: ctx.settings.micFloorDb, ceilDb: ctx.settings.micCeilDb });
      return micLevel === model.micLevel ? unchanged(model) : { model: { ...model, micLevel }, effects: [] };
    }

    case 'result': {
      if (!live(event.epoch) || model.activity !== 'recognizing' || !model.target) return unchanged(model);
      return ctx.matcher.isMatch(event.hypotheses, model.target.phrase) ? succeed(model, ctx) : fail(model, ctx);
    }

    case 'recognizer-error': {
      const cls = classifyRecognizerError(event.code);
      if (cls === 'fatal') {
        // a broken recognizer stays broken, even if the report is late
        return model.mode === 'collaborative' ? disable(model, event.code, ctx) : unchanged(model);
      }
      if (!live(event.epoch) || model.activity !== 'recognizing') return unchanged(model);
      return fail(model, ctx);
    }

    case 'dwell-elapsed': {
      if (!live(event.epoch) || model.activity !== 'dwell') return unchanged(model);
      if (event.next === 'retry') {
        return listen(model, { count: model.attempts.count, lastSuccess: null });
      }
      if (event.next === 'correct') {
        if (!model.target || !model.sentence) return unchanged(model);
        const epoch = model.epoch + 1;
        return {
          model: { ...model, activity: 'correction', epoch },
          effects: [
            { kind: 'signal', signal: 'correction', detail: { target: model.target } },
            { kind: 'play-correction', sentence: model.sentence, target: model.target, epoch },
          ],
        };
      }
      const from = model.sentence;
      const next: SessionModel = {
        ...model,
        phase: 'idle',
        target: null,
        attempts: emptyAttempts(),
        activity: 'none',
        escalated: false,
      };
      return { model: next, effects: from ? [{ kind: 'advance', from }] : [] };
    }

    case 'correction-done': {
      if (!live(event.epoch) || model.activity !== 'correction') return unchanged(model);
      return listen(model, emptyAttempts(), { escalated: true });
    }

    case 'plain-done': {
      if (!live(event.epoch) || model.activity !== 'plain-reading') return unchanged(model);
      const next: SessionModel = { ...model, activity: 'none' };
      if (model.playing && ctx.settings.autoAdvance && model.sentence) {
        return { model: next, effects: [{ kind: 'advance', from: model.sentence }] };
      }
      return { model: { ...next, playing: false }, effects: [] };
    }
  }
}
