import { WORD_TOKEN } from "../constants/text-processing";

export class WordTokenizer {
  tokenize(line: string): string[] {
    if (!line || line.trim().length === 0) {
      return [];
    }

    return Array.from(line.toLowerCase().matchAll(WORD_TOKEN), (match) =>
      match[0],
    );
  }
}
