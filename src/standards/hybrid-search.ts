/**
 * Reciprocal Rank Fusion over the vector and lexical result lists.
 *
 * For each item at zero-based rank i in a list: score += 1 / (k + i).
 * Items found by both searches get the sum. Ties keep first-seen order
 * (vector list first), so the merge is deterministic.
 */

export type HybridHit<T> = {
  item: T;
  vectorRank: number | null;
  lexicalRank: number | null;
  score: number;
};

export const DEFAULT_RRF_K = 60;

export function mergeHybridResults<T>(params: {
  vectorResults: T[];
  lexicalResults: T[];
  getKey: (item: T) => string;
  k?: number;
  topK?: number;
}): HybridHit<T>[] {
  const { vectorResults, lexicalResults, getKey, k = DEFAULT_RRF_K, topK } = params;

  const merged = new Map<string, HybridHit<T> & { order: number }>();

  vectorResults.forEach((item, rank) => {
    const key = getKey(item);
    if (merged.has(key)) return;
    merged.set(key, {
      item,
      vectorRank: rank,
      lexicalRank: null,
      score: 1 / (k + rank),
      order: merged.size,
    });
  });

  lexicalResults.forEach((item, rank) => {
    const key = getKey(item);
    const existing = merged.get(key);
    if (existing) {
      if (existing.lexicalRank !== null) return;
      existing.lexicalRank = rank;
      existing.score += 1 / (k + rank);
      return;
    }
    merged.set(key, {
      item,
      vectorRank: null,
      lexicalRank: rank,
      score: 1 / (k + rank),
      order: merged.size,
    });
  });

  const ranked = Array.from(merged.values())
    .sort((a, b) => b.score - a.score || a.order - b.order)
    .map(({ order: _order, ...hit }) => hit);

  return topK !== undefined ? ranked.slice(0, topK) : ranked;
}
