/**
 * An ordered sequence of ARPAbet phoneme tokens, e.g. `["K", "AE1", "T"]`.
 * Vowel tokens carry a trailing stress digit; consonants carry none.
 */
export type Pronunciation = readonly string[];

export const RHYME_BUCKETS = ["1_syllable", "2_syllable", "3_syllable"] as const;

export type RhymeBucket = (typeof RHYME_BUCKETS)[number];

export type RhymeGroups = Record<RhymeBucket, string[]>;

export interface RhymeLookupError {
  readonly error: string;
}
