const WORD_SEPARATOR = /[^\p{L}\p{N}]+/u;

/**
 * Trigram set of a string, built the way pg_trgm builds it:
 * lowercase, split into alphanumeric words, pad each word with two
 * leading spaces and one trailing space, collect every 3-char window.
 */
export function trigrams(value: string): Set<string> {
  const result = new Set<string>();
  const words = value.toLowerCase().split(WORD_SEPARATOR).filter(Boolean);

  for (const word of words) {
    const padded = `  ${word} `;
    for (let i = 0; i + 3 <= padded.length; i += 1) {
      result.add(padded.slice(i, i + 3));
    }
  }

  return result;
}

/**
 * Jaccard overlap of the two trigram sets, in [0, 1].
 * Same value as pg_trgm's similarity(a, b).
 */
export function trigramSimilarity(a: string, b: string): number {
  const left = trigrams(a);
  const right = trigrams(b);
  if (left.size === 0 || right.size === 0) return 0;

  let shared = 0;
  for (const trigram of left) {
    if (right.has(trigram)) shared += 1;
  }

  return shared / (left.size + right.size - shared);
}
