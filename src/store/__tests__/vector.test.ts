/**
 * Tests for cosine similarity and semantic re-ranking
 */

import { describe, it, expect } from 'vitest';
import { cosineSimilarity, rankBySimilarity } from '../vector.js';
import type { FeedbackItem } from '../../feedback/types.js';

function item(id: string, embedding: number[] | null): FeedbackItem {
  return {
    id,
    text: `feedback ${id}`,
    source: 'other',
    createdAt: '2026-01-01T00:00:00.000Z',
    userProfile: null,
    classification: null,
    embedding,
    npsScore: null,
    ticketId: null,
    ticketPriority: null,
  };
}

describe('cosineSimilarity', () => {
  it('returns 1 for identical direction', () => {
    expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1);
  });

  it('returns 0 for orthogonal vectors', () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it('returns -1 for opposite vectors', () => {
    expect(cosineSimilarity([1, 0], [-1, 0])).toBeCloseTo(-1);
  });

  it('returns 0 when either vector is all zeros', () => {
    expect(cosineSimilarity([0, 0, 0], [1, 2, 3])).toBe(0);
    expect(cosineSimilarity([1, 2, 3], [0, 0, 0])).toBe(0);
  });

  it('returns 0 for mismatched lengths', () => {
    expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
  });
});

describe('rankBySimilarity', () => {
  it('orders by similarity, highest first', () => {
    const ranked = rankBySimilarity(
      [item('far', [0, 1, 0]), item('near', [1, 0, 0]), item('mid', [1, 1, 0])],
      [1, 0, 0],
    );

    expect(ranked.map(r => r.item.id)).toEqual(['near', 'mid', 'far']);
    expect(ranked[0].similarity).toBeCloseTo(1);
    expect(ranked[1].similarity).toBeCloseTo(Math.SQRT1_2);
    expect(ranked[2].similarity).toBe(0);
  });

  it('puts items without an embedding after every embedded item', () => {
    const ranked = rankBySimilarity(
      [item('none', null), item('opposite', [-1, 0, 0]), item('same', [1, 0, 0])],
      [1, 0, 0],
    );

    expect(ranked.map(r => r.item.id)).toEqual(['same', 'opposite', 'none']);
    expect(ranked[2].similarity).toBe(0);
  });

  it('keeps incoming order for equal scores', () => {
    const ranked = rankBySimilarity(
      [item('a', [0, 1, 0]), item('b', [0, 0, 1]), item('c', null), item('d', null)],
      [1, 0, 0],
    );

    expect(ranked.map(r => r.item.id)).toEqual(['a', 'b', 'c', 'd']);
  });

  it('returns an empty list for no candidates', () => {
    expect(rankBySimilarity([], [1, 0, 0])).toEqual([]);
  });
});
