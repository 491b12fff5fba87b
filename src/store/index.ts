/**
 * Store Module - Barrel Export + backend factory
 */

import { appConfig } from '../config.js';
import { PostgresFeedbackStore } from './postgres-store.js';
import { SqliteFeedbackStore } from './sqlite-store.js';
import type { FeedbackStore } from './types.js';

export type { FeedbackStore } from './types.js';
export { SqliteFeedbackStore, buildWhereClause } from './sqlite-store.js';
export { PostgresFeedbackStore, toSearchArgs } from './postgres-store.js';
export { StoreError, EmbeddingDimensionError } from './errors.js';
export { cosineSimilarity, rankBySimilarity } from './vector.js';

/**
 * Build the configured backend and apply or verify its schema.
 */
export async function createStore(config = appConfig.storage): Promise<FeedbackStore> {
  const store: FeedbackStore = config.backend === 'postgres'
    ? new PostgresFeedbackStore({
      url: config.supabaseUrl,
      apiKey: config.supabaseKey,
      embeddingDimensions: config.embeddingDimensions,
    })
    : new SqliteFeedbackStore({
      filename: config.sqlitePath,
      embeddingDimensions: config.embeddingDimensions,
    });

  await store.initialize();
  console.log('[store] Ready', { backend: store.backend, dimensions: store.embeddingDimensions });
  return store;
}
