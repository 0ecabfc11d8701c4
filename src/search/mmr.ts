import { maximalMarginalRelevance } from '@langchain/core/utils/math';
import type { VectorSearchHit } from '../db/vector-store';

export const MMR_FETCH_MULTIPLIER = 4;
export const MMR_LAMBDA = 0.5;

/**
 * Re-rank candidates by maximal marginal relevance and keep `k`.
 * lambda = 1 is pure relevance, 0 is pure diversity.
 */
export function selectByMmr(
  queryEmbedding: number[],
  candidates: VectorSearchHit[],
  k: number,
  lambda = MMR_LAMBDA
): VectorSearchHit[] {
  if (candidates.length === 0 || k <= 0) return [];

  const indexes = maximalMarginalRelevance(
    queryEmbedding,
    candidates.map(hit => hit.embedding),
    lambda,
    Math.min(k, candidates.length)
  );
  return indexes.map(i => candidates[i]);
}

export function distanceToSimilarity(distance: number): number {
  return 1 - distance;
}
