/**
 * Feedback Domain Type Definitions
 *
 * Types shared across every module:
 * - FEEDBACK_SOURCES / SENTIMENTS / URGENCY_LEVELS / INTENTS / TOPICS: closed vocabularies
 * - UserProfile: customer attributes joined onto feedback for filtering
 * - Classification: structured labels produced by the gateway
 * - FeedbackItem: the persisted, enriched feedback record
 * - SearchQuery / SearchResult: the store's query value object and its answer
 *
 * Consumers: store, gateway, query, ingestion, jobs, api, cli
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Vocabularies
// ---------------------------------------------------------------------------

export const FEEDBACK_SOURCES = ['nps', 'zendesk', 'intercom', 'email', 'other'] as const;
export type FeedbackSource = typeof FEEDBACK_SOURCES[number];

export const SENTIMENTS = ['positive', 'neutral', 'negative'] as const;
export type Sentiment = typeof SENTIMENTS[number];

export const URGENCY_LEVELS = ['low', 'medium', 'high'] as const;
export type Urgency = typeof URGENCY_LEVELS[number];

export const INTENTS = [
  'churn_risk',
  'upsell_opportunity',
  'support_needed',
  'feature_advocacy',
  'general_feedback',
] as const;
export type Intent = typeof INTENTS[number];

/** Topic taxonomy the classifier picks from */
export const TOPICS = [
  'bug',
  'feature_request',
  'pricing',
  'ux',
  'performance',
  'onboarding',
  'support',
  'documentation',
  'integration',
  'security',
  'billing',
  'mobile',
  'api',
] as const;

export const FeedbackSourceSchema = z.enum(FEEDBACK_SOURCES);
export const SentimentSchema = z.enum(SENTIMENTS);
export const UrgencySchema = z.enum(URGENCY_LEVELS);
export const IntentSchema = z.enum(INTENTS);
export const TopicSchema = z.enum(TOPICS);

// ---------------------------------------------------------------------------
// User Profile
// ---------------------------------------------------------------------------

export interface UserProfile {
  /** Unique customer identifier, the upsert key */
  userId: string;
  email: string | null;
  /** free / starter / pro / enterprise, or a custom tier */
  subscriptionType: string | null;
  /** Monthly recurring revenue, never negative */
  mrr: number | null;
  companyName: string | null;
  industry: string | null;
  /** ISO-8601 timestamp */
  signupDate: string | null;
  customTraits: Record<string, unknown>;
}

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

export interface Classification {
  sentiment: Sentiment;
  /** Tags from TOPICS; order carries no meaning */
  topics: string[];
  urgency: Urgency;
  intent: Intent;
  /** One-sentence summary */
  summary: string;
  /** 0.0 to 1.0; 0 marks an unclassified item */
  confidence: number;
}

export const FAILED_CLASSIFICATION_SUMMARY = 'classification failed';

/**
 * The placeholder stored when classification could not be produced.
 * A fresh object each call, so callers may mutate their copy.
 */
export function failedClassification(): Classification {
  return {
    sentiment: 'neutral',
    topics: [],
    urgency: 'low',
    intent: 'general_feedback',
    summary: FAILED_CLASSIFICATION_SUMMARY,
    confidence: 0,
  };
}

// ---------------------------------------------------------------------------
// Feedback Item
// ---------------------------------------------------------------------------

export interface FeedbackItem {
  /** UUID assigned at creation */
  id: string;
  /** Raw feedback text, never empty */
  text: string;
  source: FeedbackSource;
  /** ISO-8601 UTC timestamp */
  createdAt: string;
  userProfile: UserProfile | null;
  classification: Classification | null;
  /** Fixed length per store instance */
  embedding: number[] | null;
  /** 0-10 survey score */
  npsScore: number | null;
  ticketId: string | null;
  ticketPriority: string | null;
}

/** A feedback item before the store has assigned its id */
export type NewFeedbackItem = Omit<FeedbackItem, 'id'> & { id?: string };

// ---------------------------------------------------------------------------
// Search
// ---------------------------------------------------------------------------

/**
 * Compound filter plus pagination. Null fields impose no constraint.
 * Values inside one list are OR'd; fields are AND'd; ranges are inclusive.
 */
export interface SearchQuery {
  queryText: string | null;
  sources: FeedbackSource[] | null;
  sentiments: Sentiment[] | null;
  /** Matches when the item shares at least one topic */
  topics: string[] | null;
  urgencyLevels: Urgency[] | null;
  intents: Intent[] | null;
  subscriptionTypes: string[] | null;
  industries: string[] | null;
  minMrr: number | null;
  maxMrr: number | null;
  minNps: number | null;
  maxNps: number | null;
  startDate: Date | null;
  endDate: Date | null;
  limit: number;
  offset: number;
}

export const DEFAULT_SEARCH_LIMIT = 20;

export function createSearchQuery(fields: Partial<SearchQuery> = {}): SearchQuery {
  return {
    queryText: null,
    sources: null,
    sentiments: null,
    topics: null,
    urgencyLevels: null,
    intents: null,
    subscriptionTypes: null,
    industries: null,
    minMrr: null,
    maxMrr: null,
    minNps: null,
    maxNps: null,
    startDate: null,
    endDate: null,
    limit: DEFAULT_SEARCH_LIMIT,
    offset: 0,
    ...fields,
  };
}

export interface SearchResult {
  /** One page, in rank order */
  items: FeedbackItem[];
  /** Matches before pagination */
  totalCount: number;
  query: SearchQuery;
}
