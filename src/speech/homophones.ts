// src/speech/homophones.ts
// Homophone equivalence classes. Swappable per locale; the matcher only needs
// areHomophones().
import englishClasses from '../data/homophones-en.json';
import { normWord } from '../logic/normTokens';

export interface HomophoneTable {
  areHomophones(a: string, b: string): boolean;
}

/**
 * Builds a word→class lookup. Entries pass through the same normalizer as
 * spoken tokens, so "they're" is stored as "theyre". A word listed in several
 * classes belongs to their union.
 */
export function createHomophoneTable(classes: ReadonlyArray<ReadonlyArray<string>>): HomophoneTable {
  const index = new Map<string, Set<string>>();
  for (const cls of classes) {
    const words = cls.map((w) => normWord(w)).filter(Boolean);
    const merged = new Set<string>(words);
    for (const w of words) {
      const existing = index.get(w);
      if (existing) existing.forEach((x) => merged.add(x));
    }
    for (const w of merged) index.set(w, merged);
  }

  return {
    areHomophones(a: string, b: string): boolean {
      const cls = index.get(a);
      return !!cls && cls.has(b);
    },
  };
}

export const englishHomophones: HomophoneTable = createHomophoneTable(englishClasses);
