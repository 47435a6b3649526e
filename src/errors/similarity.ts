/**
 * Suggestion Ranking
 *
 * Cosine similarity over character bigram frequencies, used to propose
 * corrections for mistyped subcommand and option names.
 */

type NgramVector = Map<string, number>;

function countNgrams(sequence: string, degree: number): NgramVector {
  const grams: NgramVector = new Map();
  for (let i = 0; i + degree <= sequence.length; i++) {
    const gram = sequence.slice(i, i + degree);
    grams.set(gram, (grams.get(gram) ?? 0) + 1);
  }
  return grams;
}

function dotProduct(a: NgramVector, b: NgramVector): number {
  let result = 0;
  for (const [gram, count] of a) {
    result += count * (b.get(gram) ?? 0);
  }
  return result;
}

/**
 * Cosine similarity of two strings' n-gram frequency vectors.
 * Returns NaN when either string is shorter than `degree`.
 */
export function similarity(first: string, second: string, degree = 2): number {
  const a = countNgrams(first, degree);
  const b = countNgrams(second, degree);
  return dotProduct(a, b) / Math.sqrt(dotProduct(a, a) * dotProduct(b, b));
}

/**
 * Rank candidates by similarity to `pattern`, most similar first.
 *
 * Comparison is case-insensitive. Only candidates scoring above `threshold`
 * are returned; equal scores keep their input order.
 */
export function mostSimilar(pattern: string, candidates: Iterable<string>, threshold = 0): string[] {
  const needle = pattern.toLowerCase();
  const scored: { candidate: string; score: number }[] = [];

  for (const candidate of candidates) {
    const score = similarity(needle, candidate.toLowerCase(), 2);
    if (score > threshold) {
      scored.push({ candidate, score });
    }
  }

  scored.sort((a, b) => b.score - a.score);
  return scored.map((entry) => entry.candidate);
}
