/**
 * Classification Gateway Contract
 *
 * The external service that turns text into embeddings and structured
 * labels. `classify` and `matchCriteria` degrade to fixed fallbacks instead
 * of throwing; `embed`, `embedBatch` and `answer` propagate errors.
 *
 * Consumers: ingestion, query, api, cli (and test stubs)
 */

import type { Classification, FeedbackItem, FeedbackSource, UserProfile } from '../feedback/types.js';

export interface ClassifyContext {
  userProfile?: UserProfile | null;
  npsScore?: number | null;
  source?: FeedbackSource;
}

export interface CriteriaMatch {
  matches: boolean;
  reason: string;
}

/** Result of one classification attempt, before the fallback is applied */
export type ClassificationOutcome =
  | { ok: true; classification: Classification }
  | { ok: false; reason: string };

export interface ClassificationGateway {
  embed(text: string): Promise<number[]>;
  /** Same length and order as `texts` */
  embedBatch(texts: string[]): Promise<number[][]>;
  /** Never rejects; returns the failed-classification placeholder instead */
  classify(text: string, context?: ClassifyContext): Promise<Classification>;
  answer(question: string, items: FeedbackItem[], extraContext?: string): Promise<string>;
  /** Never rejects; `{ matches: false, reason: 'classification failed' }` on failure */
  matchCriteria(itemText: string, criteria: string): Promise<CriteriaMatch>;
}

// ============================================================================
// Gateway Error Types
// ============================================================================

export class GatewayError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GatewayError';
  }
}
