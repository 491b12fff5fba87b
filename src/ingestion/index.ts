/**
 * Ingestion Module - Barrel Export
 */

export type {
  BatchProgress,
  IngestBatchOptions,
  IngestBatchResult,
  IngestInput,
  RecordError,
} from './ingester.js';
export { FeedbackIngester, DEFAULT_BATCH_SIZE } from './ingester.js';
export type { CanonicalRecord, FeedbackRecordInput, NormalizedRecord } from './records.js';
export { normalizeRecord, recordProfile } from './records.js';
export type { NpsCsvColumns, ParsedProfiles, ParsedTickets, RowError, TableContent } from './parsers.js';
export {
  DEFAULT_NPS_COLUMNS,
  parseFeedbackJson,
  parseNpsCsv,
  parseUserProfilesCsv,
  parseZendeskJson,
  readTable,
} from './parsers.js';
