import {
  RHYME_STRESS_DIGITS,
  STRESS_DIGITS,
  VOWEL_PHONEMES,
} from "../constants/phonemes";
import type { Pronunciation } from "../entities/pronunciation";

export function hasStressMark(phoneme: string): boolean {
  return STRESS_DIGITS.has(phoneme.slice(-1));
}

/**
 * True for a vowel phoneme carrying primary or secondary stress (`AE1`, `OW2`).
 * Unstressed vowels (`AH0`) and consonants are not.
 */
export function isStressedVowel(phoneme: string): boolean {
  const stress = phoneme.slice(-1);
  if (!RHYME_STRESS_DIGITS.has(stress)) {
    return false;
  }
  return VOWEL_PHONEMES.has(phoneme.slice(0, -1));
}

/** Each stress-marked phoneme is one vowel sound, so one syllable. */
export function countPronunciationSyllables(
  pronunciation: Pronunciation,
): number {
  let count = 0;
  for (const phoneme of pronunciation) {
    if (hasStressMark(phoneme)) {
      count += 1;
    }
  }
  return count;
}

/**
 * The suffix starting at the first stressed vowel, or `undefined` when the
 * pronunciation has none.
 */
export function extractRhymePart(
  pronunciation: Pronunciation,
): Pronunciation | undefined {
  const index = pronunciation.findIndex(isStressedVowel);
  if (index === -1) {
    return undefined;
  }
  return pronunciation.slice(index);
}

export function endsWithRhymePart(
  pronunciation: Pronunciation,
  rhymePart: Pronunciation,
): boolean {
  const offset = pronunciation.length - rhymePart.length;
  if (offset < 0) {
    return false;
  }

  for (let i = 0; i < rhymePart.length; i += 1) {
    if (pronunciation[offset + i] !== rhymePart[i]) {
      return false;
    }
  }
  return true;
}
