/**
 * Tests for SqliteFeedbackStore
 *
 * Runs against an in-memory database with 3-dimension embeddings.
 *
 * Tests cover:
 * - insert / get round trip, including the joined profile
 * - embedding dimension enforcement
 * - every filter field, empty lists, pagination and totalCount
 * - similarity ranking (only with free text), unembedded items last
 * - profile upsert, classification update, reclassification batches
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SqliteFeedbackStore, buildWhereClause } from '../sqlite-store.js';
import { EmbeddingDimensionError, StoreError } from '../errors.js';
import { createSearchQuery, type NewFeedbackItem } from '../../feedback/types.js';
import { makeClassification, makeItem, makeProfile } from '../../__tests__/fixtures/feedback.js';

let store: SqliteFeedbackStore;

beforeEach(async () => {
  store = new SqliteFeedbackStore({ filename: ':memory:', embeddingDimensions: 3 });
  await store.initialize();
});

afterEach(async () => {
  await store.close();
});

// ---------------------------------------------------------------------------
// Seed data: four items, newest first is c, b, a, d
// ---------------------------------------------------------------------------

const seed: NewFeedbackItem[] = [
  makeItem({
    id: 'a',
    source: 'nps',
    createdAt: '2026-03-10T12:00:00.000Z',
    classification: makeClassification({ sentiment: 'negative', topics: ['billing', 'pricing'], urgency: 'high', intent: 'churn_risk' }),
    userProfile: makeProfile({ userId: 'user-1', subscriptionType: 'pro', mrr: 250, industry: 'retail' }),
    npsScore: 3,
    embedding: [1, 0, 0],
  }),
  makeItem({
    id: 'b',
    source: 'zendesk',
    createdAt: '2026-03-11T12:00:00.000Z',
    classification: makeClassification({ sentiment: 'positive', topics: ['ux'], urgency: 'low', intent: 'feature_advocacy' }),
    userProfile: makeProfile({ userId: 'user-2', subscriptionType: 'free', mrr: 0, industry: 'education' }),
    embedding: [0, 1, 0],
  }),
  makeItem({
    id: 'c',
    source: 'nps',
    createdAt: '2026-03-12T12:00:00.000Z',
    classification: makeClassification({ sentiment: 'neutral', topics: ['performance'], urgency: 'medium', intent: 'general_feedback' }),
    npsScore: 9,
    embedding: [0.9, 0.1, 0],
  }),
  makeItem({
    id: 'd',
    source: 'email',
    createdAt: '2026-03-09T12:00:00.000Z',
    classification: makeClassification({ sentiment: 'negative', topics: ['bug', 'performance'], urgency: 'high', intent: 'support_needed' }),
    userProfile: makeProfile({ userId: 'user-3', subscriptionType: 'enterprise', mrr: 5000, industry: 'finance' }),
    embedding: null,
  }),
];

async function seedStore(): Promise<void> {
  for (const item of seed) {
    await store.insertFeedback(item);
  }
}

async function searchIds(fields: Parameters<typeof createSearchQuery>[0], embedding: number[] | null = null) {
  const result = await store.search(createSearchQuery(fields), embedding);
  return { ids: result.items.map(i => i.id), totalCount: result.totalCount };
}

// ---------------------------------------------------------------------------
// Insert / get
// ---------------------------------------------------------------------------

describe('insertFeedback / getFeedback', () => {
  it('round-trips every field, including the profile', async () => {
    const item = makeItem({
      id: 'round-trip',
      npsScore: 4,
      ticketId: 'T-100',
      ticketPriority: 'urgent',
      userProfile: makeProfile({
        signupDate: '2025-06-01T00:00:00.000Z',
        customTraits: { seats: 5, region: 'emea' },
      }),
    });

    const id = await store.insertFeedback(item);

    expect(id).toBe('round-trip');
    expect(await store.getFeedback(id)).toEqual({ ...item, id: 'round-trip' });
  });

  it('assigns a UUID when the item has no id', async () => {
    const { id: _omit, ...rest } = makeItem({ id: 'ignored' });
    const id = await store.insertFeedback(rest);

    expect(id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
    expect((await store.getFeedback(id))?.text).toBe('I was charged twice this month');
  });

  it('stores an item with no embedding and no classification', async () => {
    const id = await store.insertFeedback(makeItem({ id: 'bare', embedding: null, classification: null }));
    const stored = await store.getFeedback(id);

    expect(stored?.embedding).toBeNull();
    expect(stored?.classification).toBeNull();
  });

  it('returns null for an unknown id', async () => {
    expect(await store.getFeedback('missing')).toBeNull();
  });

  it('rejects an embedding of the wrong length', async () => {
    await expect(store.insertFeedback(makeItem({ embedding: [1, 0] })))
      .rejects.toBeInstanceOf(EmbeddingDimensionError);
  });

  it('wraps a duplicate id in StoreError', async () => {
    await store.insertFeedback(makeItem({ id: 'dup' }));

    const error = await store.insertFeedback(makeItem({ id: 'dup' })).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(StoreError);
    expect(error).toMatchObject({ operation: 'insertFeedback' });
  });

  it('can be initialized more than once', async () => {
    await store.initialize();
    await store.insertFeedback(makeItem({ id: 'after-reinit' }));
    expect(await store.getFeedback('after-reinit')).not.toBeNull();
  });
});

// ---------------------------------------------------------------------------
// Search filters
// ---------------------------------------------------------------------------

describe('search filters', () => {
  beforeEach(seedStore);

  it('returns everything newest first without filters', async () => {
    expect(await searchIds({})).toEqual({ ids: ['c', 'b', 'a', 'd'], totalCount: 4 });
  });

  it('treats empty lists as no constraint', async () => {
    expect(await searchIds({ sources: [], topics: [], sentiments: [] })).toEqual({ ids: ['c', 'b', 'a', 'd'], totalCount: 4 });
  });

  it('filters by source', async () => {
    expect(await searchIds({ sources: ['nps'] })).toEqual({ ids: ['c', 'a'], totalCount: 2 });
  });

  it('matches any requested topic', async () => {
    expect(await searchIds({ topics: ['performance'] })).toEqual({ ids: ['c', 'd'], totalCount: 2 });
    expect(await searchIds({ topics: ['ux', 'pricing'] })).toEqual({ ids: ['b', 'a'], totalCount: 2 });
  });

  it('ANDs across fields and ORs within one', async () => {
    expect(await searchIds({ sentiments: ['negative'], urgencyLevels: ['high'] })).toEqual({ ids: ['a', 'd'], totalCount: 2 });
    expect(await searchIds({ sentiments: ['negative', 'positive'], sources: ['zendesk', 'email'] })).toEqual({ ids: ['b', 'd'], totalCount: 2 });
  });

  it('filters by intent', async () => {
    expect(await searchIds({ intents: ['churn_risk'] })).toEqual({ ids: ['a'], totalCount: 1 });
  });

  it('filters by MRR range, excluding items without a profile', async () => {
    expect(await searchIds({ minMrr: 100 })).toEqual({ ids: ['a', 'd'], totalCount: 2 });
    expect(await searchIds({ maxMrr: 250 })).toEqual({ ids: ['b', 'a'], totalCount: 2 });
    expect(await searchIds({ minMrr: 250, maxMrr: 250 })).toEqual({ ids: ['a'], totalCount: 1 });
  });

  it('filters by NPS range', async () => {
    expect(await searchIds({ minNps: 0, maxNps: 6 })).toEqual({ ids: ['a'], totalCount: 1 });
    expect(await searchIds({ minNps: 9 })).toEqual({ ids: ['c'], totalCount: 1 });
  });

  it('filters by subscription type and industry', async () => {
    expect(await searchIds({ subscriptionTypes: ['enterprise', 'free'] })).toEqual({ ids: ['b', 'd'], totalCount: 2 });
    expect(await searchIds({ industries: ['finance'] })).toEqual({ ids: ['d'], totalCount: 1 });
  });

  it('filters by an inclusive date range', async () => {
    expect(await searchIds({ startDate: new Date('2026-03-10T12:00:00.000Z') })).toEqual({ ids: ['c', 'b', 'a'], totalCount: 3 });
    expect(await searchIds({ endDate: new Date('2026-03-10T12:00:00.000Z') })).toEqual({ ids: ['a', 'd'], totalCount: 2 });
  });

  it('paginates while reporting the full count', async () => {
    expect(await searchIds({ limit: 2, offset: 1 })).toEqual({ ids: ['b', 'a'], totalCount: 4 });
    expect(await searchIds({ limit: 2, offset: 10 })).toEqual({ ids: [], totalCount: 4 });
  });
});

// ---------------------------------------------------------------------------
// Ranking
// ---------------------------------------------------------------------------

describe('search ranking', () => {
  beforeEach(seedStore);

  it('ranks by similarity when free text and an embedding are given', async () => {
    expect(await searchIds({ queryText: 'billing', limit: 10 }, [1, 0, 0])).toEqual({ ids: ['a', 'c', 'b', 'd'], totalCount: 4 });
  });

  it('paginates after ranking', async () => {
    expect(await searchIds({ queryText: 'billing', limit: 2, offset: 1 }, [1, 0, 0])).toEqual({ ids: ['c', 'b'], totalCount: 4 });
  });

  it('ranks only within the filtered set', async () => {
    expect(await searchIds({ queryText: 'slow', sources: ['nps', 'email'] }, [0, 0, 1])).toEqual({ ids: ['c', 'a', 'd'], totalCount: 3 });
  });

  it('ignores the embedding when the query has no text', async () => {
    expect(await searchIds({}, [0, 1, 0])).toEqual({ ids: ['c', 'b', 'a', 'd'], totalCount: 4 });
  });

  it('rejects a ranking embedding of the wrong length', async () => {
    await expect(store.search(createSearchQuery({ queryText: 'billing' }), [1, 0]))
      .rejects.toBeInstanceOf(EmbeddingDimensionError);
  });
});

// ---------------------------------------------------------------------------
// Updates
// ---------------------------------------------------------------------------

describe('profiles and classification updates', () => {
  beforeEach(seedStore);

  it('overwrites a profile on upsert (last write wins)', async () => {
    await store.upsertUserProfile(makeProfile({ userId: 'user-1', subscriptionType: 'enterprise', mrr: 900, email: null }));

    const item = await store.getFeedback('a');
    expect(item?.userProfile).toMatchObject({ userId: 'user-1', subscriptionType: 'enterprise', mrr: 900, email: null });
  });

  it('overwrites the profile when a later item references the same user', async () => {
    await store.insertFeedback(makeItem({ id: 'e', userProfile: makeProfile({ userId: 'user-2', mrr: 75 }) }));

    expect((await store.getFeedback('b'))?.userProfile?.mrr).toBe(75);
  });

  it('updates only the classification', async () => {
    const next = makeClassification({ sentiment: 'positive', topics: ['support'], confidence: 0.5 });

    expect(await store.updateClassification('a', next)).toBe(true);

    const item = await store.getFeedback('a');
    expect(item?.classification).toEqual(next);
    expect(item?.npsScore).toBe(3);
    expect(item?.embedding).toEqual([1, 0, 0]);
  });

  it('returns false when updating an unknown id', async () => {
    expect(await store.updateClassification('missing', makeClassification())).toBe(false);
  });

  it('returns the newest items for reclassification', async () => {
    const items = await store.getAllForReclassification(2);
    expect(items.map(i => i.id)).toEqual(['c', 'b']);
    expect(items[1].userProfile?.userId).toBe('user-2');
  });
});

describe('ordering of identical timestamps', () => {
  beforeEach(async () => {
    // Inserted out of id order so insertion order and id order disagree
    await store.insertFeedback(makeItem({ id: 'tie-a', createdAt: '2026-03-14T08:00:00.000Z' }));
    await store.insertFeedback(makeItem({ id: 'tie-c', createdAt: '2026-03-14T08:00:00.000Z' }));
    await store.insertFeedback(makeItem({ id: 'tie-b', createdAt: '2026-03-14T08:00:00.000Z' }));
  });

  it('breaks ties by id, newest id first, in search', async () => {
    const result = await store.search(createSearchQuery());
    expect(result.items.map(i => i.id)).toEqual(['tie-c', 'tie-b', 'tie-a']);
  });

  it('breaks ties the same way for reclassification batches', async () => {
    const items = await store.getAllForReclassification(2);
    expect(items.map(i => i.id)).toEqual(['tie-c', 'tie-b']);
  });
});

// ---------------------------------------------------------------------------
// WHERE clause
// ---------------------------------------------------------------------------

describe('buildWhereClause', () => {
  it('is empty for an unconstrained query', () => {
    expect(buildWhereClause(createSearchQuery())).toEqual({ sql: '', params: [] });
  });

  it('binds list values and bounds in order', () => {
    const where = buildWhereClause(createSearchQuery({
      sources: ['nps', 'email'],
      minMrr: 100,
      startDate: new Date('2026-01-01T00:00:00.000Z'),
    }));

    expect(where.sql).toBe('WHERE f.source IN (?, ?) AND u.mrr >= ? AND f.created_at >= ?');
    expect(where.params).toEqual(['nps', 'email', 100, '2026-01-01T00:00:00.000Z']);
  });
});
