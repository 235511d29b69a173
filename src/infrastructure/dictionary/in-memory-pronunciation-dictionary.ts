import type { PronunciationDictionary } from "../../application/ports/pronunciation-dictionary";
import type { Pronunciation } from "../../domain/entities/pronunciation";

const NO_PRONUNCIATIONS: readonly Pronunciation[] = Object.freeze([]);

export class InMemoryPronunciationDictionary implements PronunciationDictionary {
  private readonly words: ReadonlyMap<string, readonly Pronunciation[]>;

  constructor(words: Iterable<readonly [string, readonly Pronunciation[]]>) {
    const frozen = new Map<string, readonly Pronunciation[]>();
    for (const [word, variants] of words) {
      if (variants.length === 0) {
        continue;
      }
      frozen.set(
        word,
        Object.freeze(variants.map((variant) => Object.freeze([...variant]))),
      );
    }
    this.words = frozen;
  }

  static fromRecord(
    words: Readonly<Record<string, readonly Pronunciation[]>>,
  ): InMemoryPronunciationDictionary {
    return new InMemoryPronunciationDictionary(Object.entries(words));
  }

  lookup(word: string): readonly Pronunciation[] {
    return this.words.get(word) ?? NO_PRONUNCIATIONS;
  }

  entries(): Iterable<readonly [string, readonly Pronunciation[]]> {
    return this.words.entries();
  }
}
