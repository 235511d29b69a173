/** ARPAbet vowel phonemes, without stress digits. */
export const VOWEL_PHONEMES: ReadonlySet<string> = new Set([
  "AA",
  "AE",
  "AH",
  "AO",
  "AW",
  "AY",
  "EH",
  "ER",
  "EY",
  "IH",
  "IY",
  "OW",
  "OY",
  "UH",
  "UW",
]);

export const STRESS_DIGITS: ReadonlySet<string> = new Set(["0", "1", "2"]);

/** Primary and secondary stress. */
export const RHYME_STRESS_DIGITS: ReadonlySet<string> = new Set(["1", "2"]);
