// src/audio/timestamp-cache.ts
// In-memory word timestamp index fed by the JSON sidecar a synthesis call
// returns: [{ "word": "ran", "start_time": 0.84, "end_time": 1.1 }, ...]
import { warnLog } from '../env/logging';
import { normWord } from '../logic/normTokens';
import type { AudioCache } from './types';

export interface WordTimestamp {
  word: string;
  startMs: number;
  endMs: number;
}

export interface TimestampCache extends AudioCache {
  /** Returns how many entries were stored; 0 for malformed sidecars. */
  store(sentenceText: string, timestampsJson: string): number;
  entries(sentenceText: string): WordTimestamp[] | undefined;
  has(sentenceText: string): boolean;
  delete(sentenceText: string): boolean;
  clear(): void;
}

const cacheKey = (sentenceText: string) => String(sentenceText).trim();

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function parseTimestamps(json: string): WordTimestamp[] | null {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    warnLog('timestamps', 'unparseable sidecar', err);
    return null;
  }
  if (!Array.isArray(raw)) return null;
  const out: WordTimestamp[] = [];
  for (const item of raw) {
    if (!isRecord(item)) return null;
    const { word, start_time, end_time } = item;
    if (typeof word !== 'string' || typeof start_time !== 'number' || typeof end_time !== 'number') return null;
    out.push({ word, startMs: Math.round(start_time * 1000), endMs: Math.round(end_time * 1000) });
  }
  return out;
}

export function createTimestampCache(): TimestampCache {
  const bySentence = new Map<string, WordTimestamp[]>();

  return {
    store(sentenceText, timestampsJson) {
      const parsed = parseTimestamps(timestampsJson);
      if (!parsed) return 0;
      bySentence.set(cacheKey(sentenceText), parsed);
      return parsed.length;
    },

    entries(sentenceText) {
      const list = bySentence.get(cacheKey(sentenceText));
      return list ? list.map((e) => ({ ...e })) : undefined;
    },

    // Counted from the end: the target always sits at the end of the sentence.
    findWordTimestampMs(sentenceText, word, occurrenceFromEnd = 1) {
      const list = bySentence.get(cacheKey(sentenceText));
      const wanted = normWord(word);
      if (!list || !wanted || occurrenceFromEnd < 1) return undefined;
      let seen = 0;
      for (let i = list.length - 1; i >= 0; i--) {
        if (normWord(list[i].word) !== wanted) continue;
        seen += 1;
        if (seen === occurrenceFromEnd) return list[i].startMs;
      }
      return undefined;
    },

    has(sentenceText) {
      return bySentence.has(cacheKey(sentenceText));
    },

    delete(sentenceText) {
      return bySentence.delete(cacheKey(sentenceText));
    },

    clear() {
      bySentence.clear();
    },
  };
}
