/**
 * A token is either a run of letters, digits and apostrophes, or a run of
 * anything else that is not whitespace (punctuation, symbols).
 */
export const WORD_TOKEN = /[\p{L}\p{N}']+|[^\p{L}\p{N}'\s]+/gu;

/** Unicode line boundaries: CRLF, LF, VT, FF, CR, FS, GS, RS, NEL, LS and PS. */
export const LINE_BREAK = /\r\n|[\n\v\f\r\x1c-\x1e\x85\u2028\u2029]/u;

export const WHITESPACE = /\s+/u;

/** Letters counted by the syllable fallback for words missing from the dictionary. */
export const FALLBACK_VOWEL_LETTERS: ReadonlySet<string> = new Set([
  "a",
  "e",
  "i",
  "o",
  "u",
  "y",
]);
