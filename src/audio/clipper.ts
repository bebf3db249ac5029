// src/audio/clipper.ts
// Plays the carrier (everything before the target) by cutting the cached
// full-sentence audio at the first target word, so revisiting a sentence never
// re-synthesizes it. A cold cache degrades to reading the whole sentence.
import { debugLog } from '../env/logging';
import { carrierText, type TargetSpan } from '../logic/target-span';
import { normTokens } from '../logic/normTokens';
import type { Sentence } from '../session/types';
import type { AudioCache, TextToSpeech } from './types';

export type CarrierPlayback = 'skipped' | 'clipped' | 'full';
export type CorrectionPlayback = 'cached' | 'synthesized';

export interface PlaybackClipper {
  playCarrier(sentence: Sentence, target: TargetSpan, onCarrierDone: () => void): CarrierPlayback;
  playCorrection(sentence: Sentence, target: TargetSpan, onDone: () => void): CorrectionPlayback;
  stop(): void;
}

export function createPlaybackClipper(deps: { tts: TextToSpeech; cache: AudioCache }): PlaybackClipper {
  const { tts, cache } = deps;

  // The target is trailing, so its first word is the n-th occurrence from the
  // end, where n counts that word inside the target ("go go." -> 2).
  function targetStartMs(sentence: Sentence, target: TargetSpan): number | undefined {
    const words = normTokens(target.phrase);
    const firstWord = words[0];
    if (!firstWord) return undefined;
    const occurrence = words.filter((w) => w === firstWord).length;
    return cache.findWordTimestampMs(sentence.text, firstWord, occurrence);
  }

  function playCarrier(sentence: Sentence, target: TargetSpan, onCarrierDone: () => void): CarrierPlayback {
    if (!carrierText(sentence.text, target)) {
      onCarrierDone();
      return 'skipped';
    }
    const stopAtMs = targetStartMs(sentence, target);
    if (stopAtMs !== undefined) {
      debugLog('clipper', `carrier from cache until ${stopAtMs}ms`);
      tts.playCarrierUntil(sentence.text, stopAtMs, onCarrierDone);
      return 'clipped';
    }
    // First visit: the reader also hears the target this once; the cache is
    // warm for the next attempt.
    debugLog('clipper', 'carrier cache miss; reading full sentence');
    tts.playFull(sentence.text, onCarrierDone);
    return 'full';
  }

  function playCorrection(sentence: Sentence, target: TargetSpan, onDone: () => void): CorrectionPlayback {
    const fromMs = targetStartMs(sentence, target);
    if (fromMs !== undefined) {
      tts.playFrom(sentence.text, fromMs, onDone);
      return 'cached';
    }
    tts.playFull(target.phrase, onDone);
    return 'synthesized';
  }

  return { playCarrier, playCorrection, stop: () => tts.stop() };
}
