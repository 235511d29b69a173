import type { Pronunciation } from "../../src/domain/entities/pronunciation";
import { InMemoryPronunciationDictionary } from "../../src/infrastructure/dictionary/in-memory-pronunciation-dictionary";

const p = (phonemes: string): Pronunciation => phonemes.split(" ");

export const SAMPLE_PRONUNCIATIONS: Record<string, Pronunciation[]> = {
  a: [p("AH0"), p("EY1")],
  the: [p("DH AH0"), p("DH AH1"), p("DH IY0")],
  "don't": [p("D OW1 N T")],
  cat: [p("K AE1 T")],
  bat: [p("B AE1 T")],
  hat: [p("HH AE1 T")],
  sat: [p("S AE1 T")],
  that: [p("DH AE1 T"), p("DH AH0 T")],
  kat: [p("K AE1 T")],
  combat: [p("K AH0 M B AE1 T")],
  acrobat: [p("AE1 K R AH0 B AE2 T")],
  hello: [p("HH AH0 L OW1"), p("HH EH0 L OW1")],
  world: [p("W ER1 L D")],
  low: [p("L OW1")],
  go: [p("G OW1")],
  below: [p("B IH0 L OW1")],
  bellow: [p("B EH1 L OW0")],
  although: [p("AO2 L DH OW1")],
  undergo: [p("AH2 N D ER0 G OW1")],
  nation: [p("N EY1 SH AH0 N")],
  station: [p("S T EY1 SH AH0 N")],
  creation: [p("K R IY0 EY1 SH AH0 N")],
  relation: [p("R IH0 L EY1 SH AH0 N")],
  information: [p("IH2 N F ER0 M EY1 SH AH0 N")],
  hmm: [p("HH M")],
};

export function createSampleDictionary(): InMemoryPronunciationDictionary {
  return InMemoryPronunciationDictionary.fromRecord(SAMPLE_PRONUNCIATIONS);
}
