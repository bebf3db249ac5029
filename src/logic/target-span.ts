// src/logic/target-span.ts
// Picks the trailing word(s) the reader says aloud; everything before them is
// the carrier that TTS reads.
import { stripPunctuation } from './normTokens';
import { countSyllables } from './syllables';

export interface TargetSpan {
  phrase: string;
  /** [start, end) into the untrimmed sentence text */
  charRange: [number, number];
}

export type TargetExtractor = (sentenceText: string) => TargetSpan;

const isSpace = (ch: string | undefined): boolean => ch !== undefined && /\s/.test(ch);

// Index where the `count`-th token from the end starts.
function tokenStartFromEnd(trimmed: string, count: number): number {
  let i = trimmed.length;
  for (let n = 0; n < count; n++) {
    while (i > 0 && !isSpace(trimmed[i - 1])) i--;
    if (n < count - 1) {
      while (i > 0 && isSpace(trimmed[i - 1])) i--;
    }
  }
  return i;
}

/**
 * A single-syllable last word is stretched to the last two tokens since
 * recognizers do poorly on one short word alone.
 */
export function extractTargetSpan(sentenceText: string): TargetSpan {
  const text = String(sentenceText);
  const lead = text.length - text.trimStart().length;
  const trimmed = text.trim();
  const end = lead + trimmed.length;
  if (!trimmed) return { phrase: '', charRange: [lead, lead] };

  const tokens = trimmed.split(/\s+/);
  let take = 1;
  if (tokens.length > 1) {
    const last = stripPunctuation(tokens[tokens.length - 1]);
    if (countSyllables(last) === 1) take = 2;
  }

  const start = lead + tokenStartFromEnd(trimmed, take);
  return { phrase: text.slice(start, end), charRange: [start, end] };
}

/** Text TTS reads before the reader's turn; '' when the target is the whole sentence. */
export function carrierText(sentenceText: string, span: TargetSpan): string {
  return String(sentenceText).slice(0, span.charRange[0]).trim();
}
