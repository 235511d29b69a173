import {
  FALLBACK_VOWEL_LETTERS,
  LINE_BREAK,
} from "../../domain/constants/text-processing";
import { countPronunciationSyllables } from "../../domain/services/phoneme-analysis";
import type { WordTokenizer } from "../../domain/services/word-tokenizer";
import type { PronunciationDictionary } from "../ports/pronunciation-dictionary";

interface CountSyllablesUseCaseDependencies {
  readonly dictionary: PronunciationDictionary;
  readonly tokenizer: WordTokenizer;
}

interface CountSyllablesRequest {
  readonly input: string;
}

export class CountSyllablesUseCase {
  private readonly dictionary: PronunciationDictionary;
  private readonly tokenizer: WordTokenizer;

  constructor({ dictionary, tokenizer }: CountSyllablesUseCaseDependencies) {
    this.dictionary = dictionary;
    this.tokenizer = tokenizer;
  }

  execute({ input }: CountSyllablesRequest): number[] {
    return splitLines(input).map((line) => this.countLine(line));
  }

  countWord(word: string): number {
    const [primary] = this.dictionary.lookup(word);
    if (primary) {
      return countPronunciationSyllables(primary);
    }

    // Out-of-vocabulary: approximate by vowel letters.
    let vowels = 0;
    for (const char of word) {
      if (FALLBACK_VOWEL_LETTERS.has(char)) {
        vowels += 1;
      }
    }
    return vowels;
  }

  private countLine(line: string): number {
    return this.tokenizer
      .tokenize(line)
      .reduce((total, word) => total + this.countWord(word), 0);
  }
}

/** A trailing line break ends the last line instead of opening a new one. */
function splitLines(input: string): string[] {
  const lines = input.split(LINE_BREAK);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}
