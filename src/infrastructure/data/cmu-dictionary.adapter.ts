import type { Pronunciation } from "../../domain/entities/pronunciation";

export type RawPronouncingTable = Readonly<Record<string, string>>;

/** `word(2)` names the second pronunciation of `word`. */
const VARIANT_KEY = /^(.+)\((\d+)\)$/u;

interface IndexedVariant {
  readonly index: number;
  readonly phonemes: Pronunciation;
}

/**
 * Groups CMU-style entries by word, variants ordered by their number
 * (the bare key counts as variant 1). Words keep first-seen order.
 */
export function parsePronouncingTable(
  table: RawPronouncingTable,
): Map<string, Pronunciation[]> {
  const grouped = new Map<string, IndexedVariant[]>();

  for (const [key, value] of Object.entries(table)) {
    const phonemes = value.trim().toUpperCase().split(/\s+/u).filter(Boolean);
    if (phonemes.length === 0) {
      continue;
    }

    const variant = VARIANT_KEY.exec(key);
    const word = (variant?.[1] ?? key).toLowerCase();
    const index = variant?.[2] ? Number.parseInt(variant[2], 10) : 1;

    const variants = grouped.get(word) ?? [];
    variants.push({ index, phonemes });
    grouped.set(word, variants);
  }

  const result = new Map<string, Pronunciation[]>();
  for (const [word, variants] of grouped) {
    result.set(
      word,
      [...variants]
        .sort((a, b) => a.index - b.index)
        .map((variant) => variant.phonemes),
    );
  }
  return result;
}

export async function loadCmuPronunciations(): Promise<
  Map<string, Pronunciation[]>
> {
  // Deferred so the server can answer the handshake before the table loads.
  const { dictionary } = await import("cmu-pronouncing-dictionary");
  return parsePronouncingTable(dictionary);
}
