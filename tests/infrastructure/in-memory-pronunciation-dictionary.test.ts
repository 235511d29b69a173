import { describe, expect, it } from "vitest";
import { InMemoryPronunciationDictionary } from "../../src/infrastructure/dictionary/in-memory-pronunciation-dictionary";

describe("InMemoryPronunciationDictionary", () => {
  const dictionary = InMemoryPronunciationDictionary.fromRecord({
    cat: [["K", "AE1", "T"]],
    that: [
      ["DH", "AE1", "T"],
      ["DH", "AH0", "T"],
    ],
    ghost: [],
  });

  it("returns every variant of a known word", () => {
    expect(dictionary.lookup("that")).toEqual([
      ["DH", "AE1", "T"],
      ["DH", "AH0", "T"],
    ]);
  });

  it("returns no variants for an unknown word", () => {
    expect(dictionary.lookup("zzqx")).toEqual([]);
  });

  it("drops words without pronunciations", () => {
    expect(dictionary.lookup("ghost")).toEqual([]);
  });

  it("iterates in insertion order", () => {
    expect(Array.from(dictionary.entries(), ([word]) => word)).toEqual([
      "cat",
      "that",
    ]);
  });

  it("is not affected by later changes to its source", () => {
    const source = [["B", "AE1", "T"]];
    const copy = new InMemoryPronunciationDictionary([["bat", source]]);
    source[0]?.push("S");
    expect(copy.lookup("bat")).toEqual([["B", "AE1", "T"]]);
    expect(Object.isFrozen(copy.lookup("bat")[0])).toBe(true);
  });
});
