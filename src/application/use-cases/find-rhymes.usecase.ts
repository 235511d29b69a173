import { WHITESPACE } from "../../domain/constants/text-processing";
import {
  RHYME_BUCKETS,
  type Pronunciation,
  type RhymeBucket,
  type RhymeGroups,
} from "../../domain/entities/pronunciation";
import {
  countPronunciationSyllables,
  endsWithRhymePart,
  extractRhymePart,
} from "../../domain/services/phoneme-analysis";
import { Result } from "../../infrastructure/result/result";
import type { PronunciationDictionary } from "../ports/pronunciation-dictionary";

interface FindRhymesUseCaseDependencies {
  readonly dictionary: PronunciationDictionary;
}

interface FindRhymesRequest {
  readonly input: string;
}

export const MAX_RHYMES_PER_BUCKET = 20;

const BUCKET_BY_SYLLABLES: ReadonlyMap<number, RhymeBucket> = new Map(
  RHYME_BUCKETS.map((bucket, index) => [index + 1, bucket] as const),
);

export class WordNotFoundError extends Error {
  constructor(readonly word: string) {
    super(`'${word}' not found in dictionary. Cannot find rhymes.`);
    this.name = "WordNotFoundError";
  }
}

export class FindRhymesUseCase {
  private readonly dictionary: PronunciationDictionary;

  constructor({ dictionary }: FindRhymesUseCaseDependencies) {
    this.dictionary = dictionary;
  }

  /**
   * Perfect rhymes for the last word of `input`: dictionary words whose
   * pronunciation ends with the same sounds from the stressed vowel onward,
   * grouped by their syllable count.
   */
  execute({ input }: FindRhymesRequest): Result<RhymeGroups> {
    const target = lastWord(input);
    if (!target) {
      return Result.failure(
        new Error("No word provided. Cannot find rhymes."),
      );
    }

    const word = target.toLowerCase();
    const pronunciations = this.dictionary.lookup(word);
    if (pronunciations.length === 0) {
      return Result.failure(new WordNotFoundError(target));
    }

    const collector = new RhymeCollector();
    for (const pronunciation of pronunciations) {
      const rhymePart = extractRhymePart(pronunciation);
      if (!rhymePart) {
        continue;
      }
      this.collectMatches(word, rhymePart, collector);
    }

    return Result.success(collector.toGroups());
  }

  private collectMatches(
    word: string,
    rhymePart: Pronunciation,
    collector: RhymeCollector,
  ): void {
    for (const [candidate, variants] of this.dictionary.entries()) {
      if (candidate === word) {
        continue;
      }

      for (const variant of variants) {
        if (endsWithRhymePart(variant, rhymePart)) {
          collector.add(candidate, countPronunciationSyllables(variant));
        }
      }
    }
  }
}

class RhymeCollector {
  private readonly buckets = new Map<RhymeBucket, Set<string>>(
    RHYME_BUCKETS.map((bucket) => [bucket, new Set<string>()] as const),
  );

  add(word: string, syllables: number): void {
    const bucket = BUCKET_BY_SYLLABLES.get(syllables);
    if (!bucket) {
      return;
    }

    const words = this.buckets.get(bucket);
    if (!words || words.size >= MAX_RHYMES_PER_BUCKET) {
      return;
    }
    words.add(word);
  }

  toGroups(): RhymeGroups {
    const list = (bucket: RhymeBucket) =>
      Array.from(this.buckets.get(bucket) ?? []);

    return {
      "1_syllable": list("1_syllable"),
      "2_syllable": list("2_syllable"),
      "3_syllable": list("3_syllable"),
    };
  }
}

function lastWord(input: string): string | undefined {
  const tokens = input.trim().split(WHITESPACE).filter(Boolean);
  return tokens[tokens.length - 1];
}
