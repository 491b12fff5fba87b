/**
 * Postgres Feedback Store - Supabase client over Postgres + pgvector
 *
 * Ranking is pushed down to the database: the search_feedback SQL function
 * filters, orders by cosine distance (`<=>`) when a query embedding is given,
 * paginates, and reports the pre-pagination count. Inserts go through the
 * insert_feedback_item function so the profile upsert and the feedback row
 * commit together.
 *
 * Schema: migrations/postgres/001_feedback.sql (applied out of band).
 *
 * Consumers: store/index.ts (createStore)
 */

import { createClient, type PostgrestError, type SupabaseClient } from '@supabase/supabase-js';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { storeConfig } from './config.js';
import { StoreError, assertEmbeddingDimensions } from './errors.js';
import { feedbackToColumns, parseFeedbackRow, profileToColumns } from './rows.js';
import type { FeedbackStore } from './types.js';
import type {
  Classification,
  FeedbackItem,
  NewFeedbackItem,
  SearchQuery,
  SearchResult,
  UserProfile,
} from '../feedback/types.js';

export interface PostgresStoreOptions {
  url: string;
  apiKey: string;
  embeddingDimensions: number;
}

const UNIQUE_VIOLATION = '23505';

const SearchPayloadSchema = z.object({
  total_count: z.number(),
  items: z.array(z.unknown()),
});

function nonEmpty<T>(values: T[] | null): T[] | null {
  return values && values.length > 0 ? values : null;
}

/** Arguments for the search_feedback SQL function */
export function toSearchArgs(query: SearchQuery, queryEmbedding: number[] | null) {
  return {
    p_sources: nonEmpty(query.sources),
    p_sentiments: nonEmpty(query.sentiments),
    p_topics: nonEmpty(query.topics),
    p_urgency_levels: nonEmpty(query.urgencyLevels),
    p_intents: nonEmpty(query.intents),
    p_subscription_types: nonEmpty(query.subscriptionTypes),
    p_industries: nonEmpty(query.industries),
    p_min_mrr: query.minMrr,
    p_max_mrr: query.maxMrr,
    p_min_nps: query.minNps,
    p_max_nps: query.maxNps,
    p_start_date: query.startDate ? query.startDate.toISOString() : null,
    p_end_date: query.endDate ? query.endDate.toISOString() : null,
    p_query_embedding: queryEmbedding,
    p_limit: query.limit,
    p_offset: query.offset,
  };
}

export class PostgresFeedbackStore implements FeedbackStore {
  readonly backend = 'postgres' as const;
  readonly embeddingDimensions: number;

  private readonly client: SupabaseClient;

  constructor(options: PostgresStoreOptions) {
    this.client = createClient(options.url, options.apiKey, {
      db: {
        schema: 'public',
      },
      auth: {
        persistSession: false,
      },
    });
    this.embeddingDimensions = options.embeddingDimensions;
  }

  async initialize(): Promise<void> {
    const { error } = await this.client
      .from('feedback')
      .select('id', { count: 'exact', head: true });

    if (error) {
      throw new StoreError(
        'initialize',
        `feedback table is not reachable (${error.message}). ` +
        `Apply ${storeConfig.postgresMigrationsDir}/001_feedback.sql first.`,
        error,
      );
    }
  }

  async insertFeedback(item: NewFeedbackItem): Promise<string> {
    assertEmbeddingDimensions('insertFeedback', item.embedding, this.embeddingDimensions);
    const id = item.id ?? randomUUID();

    const { error } = await this.client.rpc('insert_feedback_item', {
      p_profile: item.userProfile ? profileToColumns(item.userProfile) : null,
      p_feedback: feedbackToColumns({ ...item, id }),
    });

    if (error) {
      if (error.code === UNIQUE_VIOLATION) {
        throw new StoreError('insertFeedback', `feedback ${id} already exists`, error);
      }
      throw this.failure('insertFeedback', error);
    }

    return id;
  }

  async upsertUserProfile(profile: UserProfile): Promise<void> {
    const { error } = await this.client
      .from('user_profiles')
      .upsert(profileToColumns(profile), { onConflict: 'user_id' });

    if (error) throw this.failure('upsertUserProfile', error);
  }

  async getFeedback(id: string): Promise<FeedbackItem | null> {
    const { data, error } = await this.client
      .from('feedback_with_profiles')
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) throw this.failure('getFeedback', error);
    return data ? parseFeedbackRow(data) : null;
  }

  async search(query: SearchQuery, queryEmbedding: number[] | null = null): Promise<SearchResult> {
    const rankWith = queryEmbedding && query.queryText?.trim() ? queryEmbedding : null;
    if (rankWith) {
      assertEmbeddingDimensions('search', rankWith, this.embeddingDimensions);
    }

    const { data, error } = await this.client.rpc('search_feedback', toSearchArgs(query, rankWith));
    if (error) throw this.failure('search', error);

    const payload = SearchPayloadSchema.parse(data);
    return {
      items: payload.items.map(parseFeedbackRow),
      totalCount: payload.total_count,
      query,
    };
  }

  async updateClassification(id: string, classification: Classification): Promise<boolean> {
    const { data, error } = await this.client
      .from('feedback')
      .update({
        sentiment: classification.sentiment,
        topics: classification.topics,
        urgency: classification.urgency,
        intent: classification.intent,
        summary: classification.summary,
        confidence: classification.confidence,
      })
      .eq('id', id)
      .select('id');

    if (error) throw this.failure('updateClassification', error);
    return Array.isArray(data) && data.length > 0;
  }

  async getAllForReclassification(batchSize: number): Promise<FeedbackItem[]> {
    const { data, error } = await this.client
      .from('feedback_with_profiles')
      .select('*')
      .order('created_at', { ascending: false })
      .order('id', { ascending: false })
      .limit(batchSize);

    if (error) throw this.failure('getAllForReclassification', error);
    return (data ?? []).map(parseFeedbackRow);
  }

  async close(): Promise<void> {
    // Stateless HTTP client; nothing to release
  }

  private failure(operation: string, error: PostgrestError): StoreError {
    return new StoreError(operation, error.message, error);
  }
}
