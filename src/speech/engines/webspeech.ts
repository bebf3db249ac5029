// =============================================================
// File: src/speech/engines/webspeech.ts
// =============================================================
import { warnLog } from '../../env/logging';
import type { RecognitionListener, RecognizerErrorCode, SpeechRecognizer } from '../recognizer';

// Structural slice of the Web Speech API that the adapter drives.
export interface WebSpeechAlternative {
  transcript: string;
}

export interface WebSpeechResult {
  readonly isFinal: boolean;
  readonly length: number;
  [index: number]: WebSpeechAlternative | undefined;
}

export interface WebSpeechResultEvent {
  resultIndex: number;
  results: { readonly length: number; [index: number]: WebSpeechResult | undefined };
}

export interface WebSpeechRecognition {
  lang: string;
  continuous: boolean;
  interimResults: boolean;
  maxAlternatives: number;
  onstart: (() => void) | null;
  onresult: ((ev: WebSpeechResultEvent) => void) | null;
  onerror: ((ev: { error: string }) => void) | null;
  onend: (() => void) | null;
  start(): void;
  abort(): void;
}

export type WebSpeechCtor = new () => WebSpeechRecognition;

export type WebSpeechOptions = {
  lang?: string;
  maxAlternatives?: number;
  interimIntervalMs?: number;
  now?: () => number;
};

export function fromWebSpeechError(error: string): RecognizerErrorCode {
  switch (error) {
    case 'no-speech':
      return 'speech-timeout';
    case 'aborted':
      return 'aborted';
    case 'audio-capture':
      return 'audio';
    case 'network':
      return 'network';
    case 'not-allowed':
      return 'insufficient-permissions';
    case 'service-not-allowed':
      return 'service-unavailable';
    case 'language-not-supported':
      return 'language-unavailable';
    default:
      return 'client';
  }
}

/**
 * Wraps a Web Speech recognition constructor. One instance is created up
 * front and reused for every listening window; each start() is one-shot.
 */
export function createWebSpeechRecognizer(Ctor: WebSpeechCtor, opts: WebSpeechOptions = {}): SpeechRecognizer {
  const lang = opts.lang || 'en-US';
  const maxAlternatives = Math.max(1, Math.floor(opts.maxAlternatives ?? 3));
  const interimIntervalMs = Math.max(0, opts.interimIntervalMs ?? 150);
  const now = opts.now ?? (() => Date.now());

  let recog: WebSpeechRecognition | null = new Ctor();
  let generation = 0;

  function detach(r: WebSpeechRecognition): void {
    r.onstart = null;
    r.onresult = null;
    r.onerror = null;
    r.onend = null;
  }

  function start(listener: RecognitionListener): void {
    if (!recog) {
      listener.onError('client');
      return;
    }
    const r = recog;
    const runGeneration = ++generation;
    const live = () => runGeneration === generation;
    let settled = false;
    let lastInterimAt = 0;

    const settle = (fn: () => void) => {
      if (settled || !live()) return;
      settled = true;
      fn();
    };

    r.continuous = false;
    r.interimResults = true;
    r.lang = lang;
    r.maxAlternatives = maxAlternatives;

    r.onstart = () => {
      if (live()) listener.onReady();
    };
    r.onresult = (e) => {
      if (!live()) return;
      for (let i = e.resultIndex; i < e.results.length; i++) {
        const res = e.results[i];
        if (!res) continue;
        if (res.isFinal) {
          const hyps: string[] = [];
          for (let k = 0; k < res.length; k++) {
            const text = res[k]?.transcript.trim();
            if (text) hyps.push(text);
          }
          settle(() => (hyps.length ? listener.onResult(hyps) : listener.onError('no-match')));
          return;
        }
        const interim = res[0]?.transcript.trim() ?? '';
        const t = now();
        if (interim && t - lastInterimAt >= interimIntervalMs) {
          lastInterimAt = t;
          listener.onPartial(interim);
        }
      }
    };
    r.onerror = (ev) => {
      settle(() => listener.onError(fromWebSpeechError(ev.error)));
    };
    // ended without a final result or an error: nothing was understood
    r.onend = () => {
      settle(() => listener.onError('no-match'));
    };

    try {
      r.start();
    } catch {
      settle(() => listener.onError('busy'));
    }
  }

  function cancel(): void {
    generation++;
    if (!recog) return;
    detach(recog);
    try {
      recog.abort();
    } catch (err) {
      warnLog('webspeech', 'abort failed', err);
    }
  }

  function destroy(): void {
    cancel();
    recog = null;
  }

  return { start, cancel, destroy };
}
