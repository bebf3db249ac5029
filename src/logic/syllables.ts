// src/logic/syllables.ts
// Vowel-group syllable estimate. Only needs to separate short function words
// ("it", "the") from longer content words; not a dictionary lookup.

const VOWELS = new Set(['a', 'e', 'i', 'o', 'u', 'y']);

export function countSyllables(word: string): number {
  const w = String(word).toLowerCase();
  let count = 0;
  let prevVowel = false;
  for (const ch of w) {
    const isVowel = VOWELS.has(ch);
    if (isVowel && !prevVowel) count += 1;
    prevVowel = isVowel;
  }
  // silent trailing e: "make", "stone"
  if (w.endsWith('e') && count > 1) count -= 1;
  return Math.max(1, count);
}
