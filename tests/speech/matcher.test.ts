import { createHomophoneTable } from '../../src/speech/homophones';
import { createPhoneticMatcher, defaultMatcher, isMatch } from '../../src/speech/matcher';

describe('isMatch', () => {
  test('exact attempt matches regardless of case and punctuation', () => {
    expect(isMatch(['ran fast'], 'ran fast.')).toBe(true);
    expect(isMatch(['RAN FAST!'], 'ran fast.')).toBe(true);
  });

  test('a different short word does not match', () => {
    expect(isMatch(['run fast'], 'ran fast.')).toBe(false);
  });

  test('no hypotheses never match', () => {
    expect(isMatch([], 'ran fast.')).toBe(false);
  });

  test('any hypothesis may match', () => {
    expect(isMatch(['run fast', 'ran fast'], 'ran fast.')).toBe(true);
  });

  test('leading filler is skipped', () => {
    expect(isMatch(['um the dog ran fast'], 'ran fast')).toBe(true);
  });

  test('homophones match', () => {
    expect(isMatch(['two'], 'to')).toBe(true);
    expect(isMatch(['I want 4'], 'want four')).toBe(true);
  });

  test('one word heard as two still matches', () => {
    expect(isMatch(['sun flower'], 'sunflower')).toBe(true);
  });

  test('hyphenated targets split into words', () => {
    expect(isMatch(['ice cream'], 'ice-cream.')).toBe(true);
  });

  test('phonetically close split words match', () => {
    expect(isMatch(['when did'], 'wounded')).toBe(true);
  });

  test('one word per hypothesis is also tried as one utterance', () => {
    expect(isMatch(['when', 'did'], 'wounded')).toBe(true);
  });

  test('containment needs a target of three letters', () => {
    expect(isMatch(['dogs'], 'dog')).toBe(true);
  });

  test('a long target matches itself', () => {
    const target = Array.from({ length: 30 }, (_, i) => `word${i}`).join(' ');
    expect(isMatch([target], target)).toBe(true);
  });

  test('a correct attempt followed by a long tail still matches', () => {
    const tail = Array.from({ length: 30 }, () => 'and').join(' ');
    expect(isMatch([`ran fast ${tail}`], 'ran fast.')).toBe(true);
  });

  test('a punctuation-only target never matches', () => {
    expect(isMatch([''], '\u2026')).toBe(false);
    expect(isMatch(['anything'], '...')).toBe(false);
  });
});

describe('alignTokens', () => {
  test('filler is only skipped before the first target word', () => {
    expect(defaultMatcher.alignTokens(['um', 'go', 'up'], ['go', 'up'])).toBe(true);
    expect(defaultMatcher.alignTokens(['go', 'now', 'up'], ['go', 'up'])).toBe(false);
  });

  test('an empty target always aligns', () => {
    expect(defaultMatcher.alignTokens([], [])).toBe(true);
  });
});

describe('explainTokenMatch', () => {
  test('reports the first rule that applies', () => {
    expect(defaultMatcher.explainTokenMatch('the', 'the')).toBe('exact');
    expect(defaultMatcher.explainTokenMatch('there', 'their')).toBe('homophone');
    expect(defaultMatcher.explainTokenMatch('dogs', 'dog')).toBe('contains');
    expect(defaultMatcher.explainTokenMatch('night', 'knight')).toBe('homophone');
    expect(defaultMatcher.explainTokenMatch('cat', 'dog')).toBeNull();
  });
});

describe('createPhoneticMatcher', () => {
  test('uses the injected strategies', () => {
    const soundsAlike = jest.fn(() => false);
    const m = createPhoneticMatcher({
      homophones: createHomophoneTable([['colour', 'color']]),
      phonetic: { soundsAlike },
    });
    expect(m.isMatch(['color'], 'colour')).toBe(true);
    expect(m.isMatch(['harbor'], 'harbour')).toBe(false);
    expect(soundsAlike).toHaveBeenCalledWith('harbor', 'harbour');
  });
});
