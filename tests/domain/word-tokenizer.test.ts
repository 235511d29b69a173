import { describe, expect, it } from "vitest";
import { WordTokenizer } from "../../src/domain/services/word-tokenizer";

describe("WordTokenizer", () => {
  const tokenizer = new WordTokenizer();

  it("lowercases words and splits punctuation into its own tokens", () => {
    expect(tokenizer.tokenize("Hello, World!")).toEqual([
      "hello",
      ",",
      "world",
      "!",
    ]);
  });

  it("keeps apostrophes inside words", () => {
    expect(tokenizer.tokenize("Don't stop rock'n'roll")).toEqual([
      "don't",
      "stop",
      "rock'n'roll",
    ]);
  });

  it("groups a run of punctuation into one token", () => {
    expect(tokenizer.tokenize("wait...?!")).toEqual(["wait", "...?!"]);
  });

  it("handles accented letters", () => {
    expect(tokenizer.tokenize("Café Naïve")).toEqual(["café", "naïve"]);
  });

  it("returns no tokens for blank lines", () => {
    expect(tokenizer.tokenize("")).toEqual([]);
    expect(tokenizer.tokenize("   \t")).toEqual([]);
  });
});
