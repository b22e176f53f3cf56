/**
 * Cosine similarity in [-1, 1]. Zero vectors score 0.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i += 1) {
    const left = a[i] ?? 0;
    const right = b[i] ?? 0;
    dotProduct += left * right;
    normA += left * left;
    normB += right * right;
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  if (denominator === 0) {
    return 0;
  }

  return dotProduct / denominator;
}

/**
 * Ranks candidates by cosine similarity to `query`, skipping rows without a vector
 * or with a different dimension.
 */
export function rankBySimilarity<T>(
  candidates: readonly T[],
  vectorOf: (candidate: T) => readonly number[] | null,
  query: readonly number[],
  limit: number,
  minSimilarity = -1,
): Array<{ item: T; similarity: number }> {
  return candidates
    .flatMap((item) => {
      const vector = vectorOf(item);
      if (!vector || vector.length !== query.length) {
        return [];
      }
      return [{ item, similarity: cosineSimilarity(vector, query) }];
    })
    .filter((match) => match.similarity >= minSimilarity)
    .sort((left, right) => right.similarity - left.similarity)
    .slice(0, Math.max(0, limit));
}
