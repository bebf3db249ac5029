// src/logic/normTokens.ts
// Pure token normalization shared by the extractor, matcher, clipper and cache.

// . ! ? , ; : " ' ( ) [ ] plus typographic quotes and the ellipsis glyph
const SENTENCE_PUNCTUATION = /[.!?,;:"'()[\]\u2018\u2019\u201B\u201C\u201D\u201F\u2026]/g;

/** Removes sentence punctuation, keeping case and inner hyphens. */
export function stripPunctuation(word: string): string {
  return String(word).replace(SENTENCE_PUNCTUATION, '');
}

/**
 * Tokenize and normalize text for matching: lowercase, hyphens and dash
 * variants split words, sentence punctuation dropped.
 */
export function normTokens(text: string): string[] {
  const t = String(text)
    .toLowerCase()
    .replace(/[\u2010-\u2015-]/g, ' ')
    .replace(SENTENCE_PUNCTUATION, '')
    .replace(/\s+/g, ' ')
    .trim();
  if (!t) return [];
  return t.split(' ');
}

/** First normalized token of a word or phrase, or '' when nothing survives. */
export function normWord(text: string): string {
  return normTokens(text)[0] ?? '';
}

export default normTokens;
