// src/speech/phonetic.ts
// Phonetic-code comparison for words a recognizer spelled differently than
// the book did ("wounded" heard as "when did").
/// <reference path="../types/double-metaphone.d.ts" />
import doubleMetaphone from 'double-metaphone';

export interface PhoneticEncoder {
  /** [primary, alternate]; either may be '' for words with no consonant sounds */
  encode(word: string): readonly [string, string];
}

export interface PhoneticComparator {
  soundsAlike(a: string, b: string): boolean;
}

export type PhoneticOptions = {
  /**
   * Shortest word compared by code. The codes drop non-initial vowels, so
   * below this "run" and "ran" would collide.
   */
  minLength?: number;
  cacheSize?: number;
};

export const doubleMetaphoneEncoder: PhoneticEncoder = {
  encode(word: string) {
    return doubleMetaphone(word);
  },
};

export function createPhoneticComparator(
  encoder: PhoneticEncoder = doubleMetaphoneEncoder,
  opts: PhoneticOptions = {},
): PhoneticComparator {
  const minLength = Math.max(1, Math.floor(opts.minLength ?? 4));
  const cacheSize = Math.max(16, Math.floor(opts.cacheSize ?? 512));
  const cache = new Map<string, readonly [string, string]>();

  function codes(word: string): readonly [string, string] {
    const hit = cache.get(word);
    if (hit) return hit;
    const out = encoder.encode(word);
    if (cache.size >= cacheSize) cache.clear();
    cache.set(word, out);
    return out;
  }

  return {
    soundsAlike(a: string, b: string): boolean {
      if (a.length < minLength || b.length < minLength) return false;
      const [pa, aa] = codes(a);
      const [pb, ab] = codes(b);
      for (const x of [pa, aa]) {
        if (!x) continue;
        if (x === pb || x === ab) return true;
      }
      return false;
    },
  };
}

export const defaultPhonetic: PhoneticComparator = createPhoneticComparator();
