import type { PronunciationDictionary } from "../application/ports/pronunciation-dictionary";
import { CountSyllablesUseCase } from "../application/use-cases/count-syllables.usecase";
import { FindRhymesUseCase } from "../application/use-cases/find-rhymes.usecase";
import { WordTokenizer } from "../domain/services/word-tokenizer";
import { loadCmuPronunciations } from "../infrastructure/data/cmu-dictionary.adapter";
import { InMemoryPronunciationDictionary } from "../infrastructure/dictionary/in-memory-pronunciation-dictionary";

export interface LyricUseCases {
  readonly countSyllables: CountSyllablesUseCase;
  readonly findRhymes: FindRhymesUseCase;
}

export type LyricUseCasesProvider = () => Promise<LyricUseCases>;

let cachedUseCases: Promise<LyricUseCases> | null = null;

/** Builds the dictionary once; concurrent first callers share the same load. */
export function getLyricUseCases(): Promise<LyricUseCases> {
  if (!cachedUseCases) {
    cachedUseCases = buildUseCases().catch((error: unknown) => {
      cachedUseCases = null;
      throw error;
    });
  }
  return cachedUseCases;
}

export function createLyricUseCases(
  dictionary: PronunciationDictionary,
): LyricUseCases {
  return {
    countSyllables: new CountSyllablesUseCase({
      dictionary,
      tokenizer: new WordTokenizer(),
    }),
    findRhymes: new FindRhymesUseCase({ dictionary }),
  };
}

async function buildUseCases(): Promise<LyricUseCases> {
  const pronunciations = await loadCmuPronunciations();
  return createLyricUseCases(
    new InMemoryPronunciationDictionary(pronunciations),
  );
}
