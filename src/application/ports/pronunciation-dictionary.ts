import type { Pronunciation } from "../../domain/entities/pronunciation";

export interface PronunciationDictionary {
  /** Pronunciation variants of a lowercase word; empty when the word is unknown. */
  lookup(word: string): readonly Pronunciation[];
  entries(): Iterable<readonly [string, readonly Pronunciation[]]>;
}
