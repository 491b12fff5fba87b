/**
 * Store Contract
 *
 * Persistence for feedback items and user profiles plus compound filtered
 * search with optional similarity re-ranking. Implemented by the embedded
 * SQLite store and the Postgres (Supabase + pgvector) store.
 *
 * Consumers: query-service.ts, ingester.ts, api/server.ts, cli.ts
 */

import type {
  Classification,
  FeedbackItem,
  NewFeedbackItem,
  SearchQuery,
  SearchResult,
  UserProfile,
} from '../feedback/types.js';

export interface FeedbackStore {
  readonly backend: 'sqlite' | 'postgres';
  /** Vector length every stored and query embedding must have */
  readonly embeddingDimensions: number;

  /** Create or verify the schema. Safe to call repeatedly. */
  initialize(): Promise<void>;

  /**
   * Persist a feedback item, assigning a UUID when it has none.
   * The referenced profile is upserted in the same transaction.
   */
  insertFeedback(item: NewFeedbackItem): Promise<string>;

  /** Insert or overwrite a profile by userId */
  upsertUserProfile(profile: UserProfile): Promise<void>;

  /** Null when no item has this id */
  getFeedback(id: string): Promise<FeedbackItem | null>;

  /**
   * Filter, optionally rank by similarity to `queryEmbedding` (only when the
   * query also carries free text), then paginate. `totalCount` ignores
   * pagination.
   */
  search(query: SearchQuery, queryEmbedding?: number[] | null): Promise<SearchResult>;

  /** Overwrite the classification only. False when the id is unknown. */
  updateClassification(id: string, classification: Classification): Promise<boolean>;

  /** Newest items first, profiles joined */
  getAllForReclassification(batchSize: number): Promise<FeedbackItem[]>;

  close(): Promise<void>;
}
