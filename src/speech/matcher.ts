// Matcher: decides whether a spoken attempt reads the target phrase.
// Tolerates recognizer noise; tokenMatch lists the per-word rules.
import { normTokens } from '../logic/normTokens';
import { englishHomophones, type HomophoneTable } from './homophones';
import { defaultPhonetic, type PhoneticComparator } from './phonetic';

export type TokenMatchKind = 'exact' | 'homophone' | 'contains' | 'phonetic';

export interface PhoneticMatcher {
  isMatch(hypotheses: readonly string[], target: string): boolean;
  alignTokens(spoken: readonly string[], target: readonly string[]): boolean;
  tokenMatch(spoken: string, target: string): boolean;
  explainTokenMatch(spoken: string, target: string): TokenMatchKind | null;
}

export type MatcherOptions = {
  homophones?: HomophoneTable;
  phonetic?: PhoneticComparator;
  /** Shortest target token eligible for substring containment */
  minContainLength?: number;
};

const DEFAULT_MIN_CONTAIN_LENGTH = 3;

export function createPhoneticMatcher(opts: MatcherOptions = {}): PhoneticMatcher {
  const homophones = opts.homophones ?? englishHomophones;
  const phonetic = opts.phonetic ?? defaultPhonetic;
  const minContain = Math.max(1, Math.floor(opts.minContainLength ?? DEFAULT_MIN_CONTAIN_LENGTH));

  // Order is fixed: exact, homophone, containment, phonetic.
  function explainTokenMatch(spoken: string, target: string): TokenMatchKind | null {
    if (spoken === target) return 'exact';
    if (homophones.areHomophones(spoken, target)) return 'homophone';
    if (target.length >= minContain && spoken.includes(target)) return 'contains';
    if (phonetic.soundsAlike(spoken, target)) return 'phonetic';
    return null;
  }

  function tokenMatch(spoken: string, target: string): boolean {
    return explainTokenMatch(spoken, target) !== null;
  }

  function alignTokens(spoken: readonly string[], target: readonly string[]): boolean {
    const width = target.length + 1;
    const failed = new Set<number>();

    const step = (s: number, t: number): boolean => {
      if (t >= target.length) return true;
      if (s >= spoken.length) return false;
      const key = s * width + t;
      if (failed.has(key)) return false;

      const ok =
        (tokenMatch(spoken[s], target[t]) && step(s + 1, t + 1)) ||
        // one word split in two by the recognizer
        (s + 1 < spoken.length && tokenMatch(spoken[s] + spoken[s + 1], target[t]) && step(s + 2, t + 1)) ||
        // leading filler; never once the first target word has matched
        (t === 0 && s + 1 < spoken.length && step(s + 1, 0));

      if (!ok) failed.add(key);
      return ok;
    };

    return step(0, 0);
  }

  function isMatch(hypotheses: readonly string[], target: string): boolean {
    const targetTokens = normTokens(target);
    // nothing sayable: punctuation-only targets never match
    if (!hypotheses.length || !targetTokens.length) return false;
    // Some recognizers report one word per entry; also try them as one utterance.
    const candidates = hypotheses.length > 1 ? [...hypotheses, hypotheses.join(' ')] : hypotheses;
    return candidates.some((h) => alignTokens(normTokens(h), targetTokens));
  }

  return { isMatch, alignTokens, tokenMatch, explainTokenMatch };
}

export const defaultMatcher: PhoneticMatcher = createPhoneticMatcher();

export function isMatch(hypotheses: readonly string[], target: string): boolean {
  return defaultMatcher.isMatch(hypotheses, target);
}
