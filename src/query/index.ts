/**
 * Query Module - Barrel Export
 */

export type { SearchParams } from './params.js';
export { buildSearchQuery, MAX_SEARCH_LIMIT } from './params.js';
export type {
  AskFilters,
  AskResult,
  CriteriaResult,
  FeedbackStatistics,
  ReclassifyResult,
  WindowOptions,
} from './query-service.js';
export { FeedbackQueryService, NO_MATCHING_FEEDBACK } from './query-service.js';
