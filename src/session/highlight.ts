// src/session/highlight.ts
// Per-word highlight states for a host to paint the current sentence.
import { extractTargetSpan, type TargetSpan } from '../logic/target-span';
import type { CollaborativeSessionState } from './types';

export type WordHighlightState = 'idle' | 'tts-speaking' | 'user-turn' | 'listening' | 'success' | 'error';

export interface WordHighlight {
  word: string;
  /** [start, end) into the sentence text */
  start: number;
  end: number;
  state: WordHighlightState;
}

function targetState(state: CollaborativeSessionState): WordHighlightState {
  if (state.phase === 'idle') return 'user-turn';
  if (state.phase === 'listening') return 'listening';
  if (state.attempts.lastSuccess === true) return 'success';
  if (state.attempts.lastSuccess === false) return 'error';
  return 'listening';
}

/**
 * While the carrier plays the session has no target yet; the trailing words
 * still show as the reader's upcoming turn.
 */
export function computeWordHighlights(
  text: string,
  state: CollaborativeSessionState,
  speakingRange?: readonly [number, number],
): WordHighlight[] {
  const target: TargetSpan = state.target ?? extractTargetSpan(text);
  const [targetStart, targetEnd] = target.charRange;
  const out: WordHighlight[] = [];

  for (const m of String(text).matchAll(/\S+/g)) {
    const start = m.index ?? 0;
    const end = start + m[0].length;
    let wordState: WordHighlightState = 'idle';
    if (targetEnd > targetStart && start >= targetStart && end <= targetEnd) {
      wordState = targetState(state);
    } else if (speakingRange && start < speakingRange[1] && end > speakingRange[0]) {
      wordState = 'tts-speaking';
    }
    out.push({ word: m[0], start, end, state: wordState });
  }
  return out;
}
