/**
 * Vector Math - cosine similarity and semantic re-ranking
 *
 * Pure functions used by the embedded store to rank a filtered candidate set
 * against a query embedding. Brute force over the candidates, no index.
 *
 * Consumers: sqlite-store.ts (search re-rank)
 */

import type { FeedbackItem } from '../feedback/types.js';

/**
 * Cosine similarity between two vectors.
 * Returns a value between -1 and 1 (1 = identical direction), and 0 when
 * either vector is all zeros or the lengths differ.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) return 0;

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  if (denominator === 0) return 0;

  return dotProduct / denominator;
}

export interface RankedItem {
  item: FeedbackItem;
  /** 0 for items without an embedding */
  similarity: number;
}

/**
 * Order items by similarity to the query, highest first.
 *
 * Items without an embedding score 0 and always sort after items that have
 * one. The sort is stable, so equal scores keep their incoming order.
 */
export function rankBySimilarity(
  items: readonly FeedbackItem[],
  queryEmbedding: readonly number[],
): RankedItem[] {
  const scored = items.map((item) => ({
    item,
    similarity: item.embedding ? cosineSimilarity(queryEmbedding, item.embedding) : 0,
    embedded: item.embedding !== null,
  }));

  scored.sort((a, b) => {
    if (a.embedded !== b.embedded) return a.embedded ? -1 : 1;
    return b.similarity - a.similarity;
  });

  return scored.map(({ item, similarity }) => ({ item, similarity }));
}
