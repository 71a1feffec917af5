type Fused<T> = {
  hit: T;
  score: number;
  bestRank: number;
  textRank?: number;
  vectorRank?: number;
};

/**
 * Merge hybrid search results using weighted Reciprocal Rank Fusion (RRF).
 * Hits are keyed by `id`; an id present in both lists keeps the hit from the
 * list where it ranked better and sums both contributions.
 */
export function mergeWithRRF<T extends { id: string }>(params: {
  textHits: readonly T[];
  vectorHits: readonly T[];
  k?: number;
  textWeight?: number;
  vectorWeight?: number;
}): Array<{ hit: T; score: number; textRank?: number; vectorRank?: number }> {
  const k = params.k ?? 60;
  const textWeight = params.textWeight ?? 0.6;
  const vectorWeight = params.vectorWeight ?? 0.4;

  const scores = new Map<string, Fused<T>>();

  const add = (hits: readonly T[], weight: number, list: 'textRank' | 'vectorRank') => {
    hits.forEach((hit, i) => {
      const rank = i + 1;
      const rrf = weight / (k + rank);
      const existing = scores.get(hit.id);
      if (!existing) {
        const entry: Fused<T> = { hit, score: rrf, bestRank: rank };
        entry[list] = rank;
        scores.set(hit.id, entry);
        return;
      }
      // duplicates inside one list only count once
      if (existing[list] !== undefined) return;
      existing.score += rrf;
      existing[list] = rank;
      if (rank < existing.bestRank) {
        existing.hit = hit;
        existing.bestRank = rank;
      }
    });
  };

  add(params.textHits, textWeight, 'textRank');
  add(params.vectorHits, vectorWeight, 'vectorRank');

  return Array.from(scores.values()).map(({ hit, score, textRank, vectorRank }) => ({
    hit,
    score,
    textRank,
    vectorRank,
  }));
}
