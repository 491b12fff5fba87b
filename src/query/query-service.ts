/**
 * Feedback Query Service
 *
 * Composes the store and the classification gateway into the read side of
 * the system:
 * - search: validated filters plus optional semantic ranking
 * - ask / getTopicSummary: retrieval followed by answer synthesis
 * - alert presets: churn risks, urgent issues, upsell, detractors, promoters
 * - reclassifyAll / findByCustomCriteria: per-item gateway calls that degrade
 *   to the failure placeholder instead of aborting the run
 * - getStatistics: aggregate counts over a time window
 *
 * Consumers: api/server.ts, cli.ts
 */

import { buildSearchQuery, MAX_SEARCH_LIMIT, type SearchParams } from './params.js';
import { FAILED_CLASSIFICATION_SUMMARY, failedClassification } from '../feedback/types.js';
import type {
  Classification,
  FeedbackItem,
  FeedbackSource,
  Intent,
  SearchResult,
  Sentiment,
  Urgency,
} from '../feedback/types.js';
import type { FeedbackStore } from '../store/types.js';
import type { ClassificationGateway } from '../gateway/types.js';

export const NO_MATCHING_FEEDBACK = 'No matching feedback found for your query.';

const ASK_RETRIEVAL_LIMIT = 30;
const TOPIC_SUMMARY_LIMIT = 50;
const STATISTICS_PAGE_SIZE = 500;

// ---------------------------------------------------------------------------
// Result types
// ---------------------------------------------------------------------------

export interface ReclassifyResult {
  /** Items classified and written back */
  processed: number;
  /** Items that now hold the failure placeholder */
  failed: number;
}

export interface CriteriaResult {
  item: FeedbackItem;
  matches: boolean;
  reason: string;
}

export interface FeedbackStatistics {
  totalCount: number;
  bySentiment: Record<Sentiment, number>;
  bySource: Partial<Record<FeedbackSource, number>>;
  byTopic: Record<string, number>;
  byUrgency: Record<Urgency, number>;
  byIntent: Partial<Record<Intent, number>>;
  /** Mean over items that carry a score; null when none do */
  avgNps: number | null;
}

export interface WindowOptions {
  daysBack?: number;
  limit?: number;
}

export type AskFilters = Omit<SearchParams, 'query' | 'limit' | 'offset'>;

export interface AskResult {
  answer: string;
  /** Total items matching the question's filters, not just those retrieved */
  feedbackCount: number;
}

function countInto<K extends string>(counts: Partial<Record<K, number>>, key: K): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

// ---------------------------------------------------------------------------
// Service
// ---------------------------------------------------------------------------

export class FeedbackQueryService {
  constructor(
    private readonly store: FeedbackStore,
    private readonly gateway: ClassificationGateway,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async getFeedback(id: string): Promise<FeedbackItem | null> {
    return this.store.getFeedback(id);
  }

  /**
   * Filtered search. Free text is embedded and used to rank the filtered set.
   */
  async search(params: SearchParams = {}): Promise<SearchResult> {
    const query = buildSearchQuery(params, this.now());
    const queryEmbedding = query.queryText ? await this.gateway.embed(query.queryText) : null;
    return this.store.search(query, queryEmbedding);
  }

  /**
   * Answer a natural-language question from the most relevant feedback.
   * The gateway is not called when nothing matches.
   */
  async ask(question: string, filters: AskFilters = {}): Promise<AskResult> {
    const result = await this.search({ ...filters, query: question, limit: ASK_RETRIEVAL_LIMIT });
    if (result.items.length === 0) {
      return { answer: NO_MATCHING_FEEDBACK, feedbackCount: 0 };
    }
    const answer = await this.gateway.answer(question, result.items);
    return { answer, feedbackCount: result.totalCount };
  }

  // ========== Alert presets ==========

  /** Negative churn-risk feedback from customers at or above an MRR floor */
  async getChurnRisks(options: WindowOptions & { minMrr?: number } = {}): Promise<SearchResult> {
    return this.search({
      sentiments: ['negative'],
      intents: ['churn_risk'],
      minMrr: options.minMrr ?? 100,
      daysBack: options.daysBack ?? 30,
      limit: options.limit,
    });
  }

  async getUrgentIssues(options: WindowOptions & { subscriptionTypes?: string[] } = {}): Promise<SearchResult> {
    return this.search({
      urgencyLevels: ['high'],
      subscriptionTypes: options.subscriptionTypes,
      daysBack: options.daysBack ?? 7,
      limit: options.limit,
    });
  }

  /** Upsell intent, by default from free and starter tiers */
  async getUpsellOpportunities(options: WindowOptions & { subscriptionTypes?: string[] } = {}): Promise<SearchResult> {
    const tiers = options.subscriptionTypes && options.subscriptionTypes.length > 0
      ? options.subscriptionTypes
      : ['free', 'starter'];
    return this.search({
      intents: ['upsell_opportunity'],
      subscriptionTypes: tiers,
      daysBack: options.daysBack ?? 30,
      limit: options.limit,
    });
  }

  async getDetractorFeedback(options: WindowOptions & { maxNps?: number } = {}): Promise<SearchResult> {
    return this.search({
      sources: ['nps'],
      maxNps: options.maxNps ?? 6,
      daysBack: options.daysBack ?? 30,
      limit: options.limit,
    });
  }

  async getPromoterFeedback(options: WindowOptions & { minNps?: number } = {}): Promise<SearchResult> {
    return this.search({
      sources: ['nps'],
      minNps: options.minNps ?? 9,
      daysBack: options.daysBack ?? 30,
      limit: options.limit,
    });
  }

  async getTopicSummary(topic: string, daysBack = 30): Promise<string> {
    const result = await this.search({ topics: [topic], daysBack, limit: TOPIC_SUMMARY_LIMIT });
    if (result.items.length === 0) {
      return `No feedback found for topic: ${topic}`;
    }
    return this.gateway.answer(
      `Summarize the key themes and issues in feedback about ${topic}. ` +
      'Include specific examples and prioritize by frequency and impact.',
      result.items,
    );
  }

  // ========== Reclassification ==========

  /**
   * Re-run classification over the newest `batchSize` items and write the
   * results back. One item's failure stores the placeholder for that item only.
   */
  async reclassifyAll(
    batchSize = 100,
    onProgress?: (done: number, total: number) => void,
  ): Promise<ReclassifyResult> {
    const items = await this.store.getAllForReclassification(batchSize);
    let processed = 0;
    let failed = 0;

    for (const item of items) {
      const classification = await this.classifySafely(item);
      await this.store.updateClassification(item.id, classification);
      processed++;
      if (classification.confidence === 0) failed++;
      onProgress?.(processed, items.length);
    }

    console.log('[query] Reclassification complete', { processed, failed });
    return { processed, failed };
  }

  /**
   * Evaluate an ad-hoc yes/no question against the newest `limit` items.
   * Every item gets a verdict; failures read as no match.
   */
  async findByCustomCriteria(criteria: string, limit = 50): Promise<CriteriaResult[]> {
    const items = await this.store.getAllForReclassification(limit);
    const results: CriteriaResult[] = [];

    for (const item of items) {
      try {
        const verdict = await this.gateway.matchCriteria(item.text, criteria);
        results.push({ item, matches: verdict.matches, reason: verdict.reason });
      } catch (err) {
        console.error('[query] Criteria evaluation failed', {
          feedbackId: item.id,
          error: err instanceof Error ? err.message : String(err),
        });
        results.push({ item, matches: false, reason: FAILED_CLASSIFICATION_SUMMARY });
      }
    }

    return results;
  }

  // ========== Analytics ==========

  /** Aggregate counts over every item in the window, read page by page */
  async getStatistics(daysBack = 30): Promise<FeedbackStatistics> {
    const stats: FeedbackStatistics = {
      totalCount: 0,
      bySentiment: { positive: 0, neutral: 0, negative: 0 },
      bySource: {},
      byTopic: {},
      byUrgency: { low: 0, medium: 0, high: 0 },
      byIntent: {},
      avgNps: null,
    };

    let npsTotal = 0;
    let npsCount = 0;
    let offset = 0;

    for (;;) {
      const page = await this.search({
        daysBack,
        limit: Math.min(STATISTICS_PAGE_SIZE, MAX_SEARCH_LIMIT),
        offset,
      });
      stats.totalCount = page.totalCount;

      for (const item of page.items) {
        countInto(stats.bySource, item.source);
        if (item.npsScore !== null) {
          npsTotal += item.npsScore;
          npsCount++;
        }
        if (item.classification) {
          stats.bySentiment[item.classification.sentiment]++;
          stats.byUrgency[item.classification.urgency]++;
          countInto(stats.byIntent, item.classification.intent);
          for (const topic of item.classification.topics) {
            countInto(stats.byTopic, topic);
          }
        }
      }

      offset += page.items.length;
      if (page.items.length === 0 || offset >= page.totalCount) break;
    }

    stats.avgNps = npsCount > 0 ? npsTotal / npsCount : null;
    return stats;
  }

  private async classifySafely(item: FeedbackItem): Promise<Classification> {
    try {
      return await this.gateway.classify(item.text, {
        userProfile: item.userProfile,
        npsScore: item.npsScore,
        source: item.source,
      });
    } catch (err) {
      console.error('[query] Reclassification failed, storing placeholder', {
        feedbackId: item.id,
        error: err instanceof Error ? err.message : String(err),
      });
      return failedClassification();
    }
  }
}
