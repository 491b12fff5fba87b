/**
 * Search Parameter Parsing
 *
 * Turns loosely-typed filter input (HTTP query strings, CLI flags, JSON
 * bodies) into a validated SearchQuery. List filters accept arrays or
 * comma-separated strings; numeric fields accept numbers or numeric strings;
 * a positive `daysBack` becomes a start date relative to `now`.
 *
 * Consumers: query-service.ts, api/server.ts, cli.ts
 */

import { z } from 'zod';
import {
  FeedbackSourceSchema,
  IntentSchema,
  SentimentSchema,
  TopicSchema,
  UrgencySchema,
  createSearchQuery,
  DEFAULT_SEARCH_LIMIT,
} from '../feedback/types.js';
import type { SearchQuery } from '../feedback/types.js';
import { FeedbackValidationError } from '../feedback/errors.js';
import { firstIssue, optionalDate, optionalList, optionalNumber, optionalText } from '../feedback/coerce.js';

export const MAX_SEARCH_LIMIT = 1000;
const DAY_MS = 24 * 60 * 60 * 1000;

/** Raw filter input; every field optional */
export interface SearchParams {
  query?: string | null;
  sources?: string | string[] | null;
  sentiments?: string | string[] | null;
  topics?: string | string[] | null;
  urgencyLevels?: string | string[] | null;
  intents?: string | string[] | null;
  subscriptionTypes?: string | string[] | null;
  industries?: string | string[] | null;
  minMrr?: number | string | null;
  maxMrr?: number | string | null;
  minNps?: number | string | null;
  maxNps?: number | string | null;
  daysBack?: number | string | null;
  startDate?: Date | string | null;
  endDate?: Date | string | null;
  limit?: number | string | null;
  offset?: number | string | null;
}

const SearchParamsSchema = z.object({
  query: optionalText,
  sources: optionalList(FeedbackSourceSchema),
  sentiments: optionalList(SentimentSchema),
  topics: optionalList(TopicSchema),
  urgencyLevels: optionalList(UrgencySchema),
  intents: optionalList(IntentSchema),
  subscriptionTypes: optionalList(z.string()),
  industries: optionalList(z.string()),
  minMrr: optionalNumber(z.number().min(0)),
  maxMrr: optionalNumber(z.number().min(0)),
  minNps: optionalNumber(z.number().int().min(0).max(10)),
  maxNps: optionalNumber(z.number().int().min(0).max(10)),
  daysBack: optionalNumber(z.number().int().min(0)),
  startDate: optionalDate,
  endDate: optionalDate,
  limit: optionalNumber(z.number().int().min(1).max(MAX_SEARCH_LIMIT)),
  offset: optionalNumber(z.number().int().min(0)),
});

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Validate raw params and build the store query.
 * Throws FeedbackValidationError naming the first offending field.
 */
export function buildSearchQuery(params: SearchParams, now: Date = new Date()): SearchQuery {
  const parsed = SearchParamsSchema.safeParse(params);
  if (!parsed.success) {
    const { field, message } = firstIssue(parsed.error);
    throw new FeedbackValidationError(
      field ? `Invalid ${field}: ${message}` : `Invalid search parameters: ${message}`,
      field,
    );
  }

  const p = parsed.data;
  let startDate = p.startDate;
  // daysBack 0 means no window
  if (p.daysBack) {
    const windowStart = new Date(now.getTime() - p.daysBack * DAY_MS);
    // An explicit start date later than the window wins
    startDate = startDate && startDate > windowStart ? startDate : windowStart;
  }

  return createSearchQuery({
    queryText: p.query,
    sources: p.sources,
    sentiments: p.sentiments,
    topics: p.topics,
    urgencyLevels: p.urgencyLevels,
    intents: p.intents,
    subscriptionTypes: p.subscriptionTypes,
    industries: p.industries,
    minMrr: p.minMrr,
    maxMrr: p.maxMrr,
    minNps: p.minNps,
    maxNps: p.maxNps,
    startDate,
    endDate: p.endDate,
    limit: p.limit ?? DEFAULT_SEARCH_LIMIT,
    offset: p.offset ?? 0,
  });
}
