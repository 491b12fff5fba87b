/**
 * Bulk Import Jobs
 *
 * Runs a file import as a tracked background job. The payload is parsed
 * inside the task, so a malformed file fails the job rather than the request
 * that started it.
 *
 * Consumers: api/server.ts, cli.ts
 */

import { z } from 'zod';
import {
  parseFeedbackJson,
  parseNpsCsv,
  parseUserProfilesCsv,
  parseZendeskJson,
  type TableContent,
} from '../ingestion/parsers.js';
import { FeedbackSourceSchema, type FeedbackSource } from '../feedback/types.js';
import type { BatchProgress, FeedbackIngester } from '../ingestion/ingester.js';
import type { FeedbackRecordInput } from '../ingestion/records.js';
import type { Job, JobContext, JobTracker } from './job-tracker.js';

export const IMPORT_JOB_TYPE = 'import';
export const IMPORT_FORMATS = ['nps_csv', 'zendesk_json', 'feedback_json', 'profiles_csv'] as const;
export type ImportFormat = typeof IMPORT_FORMATS[number];

/** Error messages kept on the job result */
const MAX_ERROR_MESSAGES = 10;

export const ImportRequestSchema = z.object({
  format: z.enum(IMPORT_FORMATS),
  content: z.string().min(1, 'content must not be empty'),
  source: FeedbackSourceSchema.optional(),
  skipClassification: z.boolean().optional(),
});

export interface ImportRequest {
  format: ImportFormat;
  content: TableContent;
  /** Overrides the format's default source */
  source?: FeedbackSource;
  skipClassification?: boolean;
}

export interface ImportResult {
  imported: number;
  skipped: number;
  errors: number;
  errorMessages: string[];
}

export interface ImportDeps {
  tracker: JobTracker;
  ingester: FeedbackIngester;
}

const DEFAULT_SOURCES: Record<Exclude<ImportFormat, 'profiles_csv'>, FeedbackSource> = {
  nps_csv: 'nps',
  zendesk_json: 'zendesk',
  feedback_json: 'other',
};

function asText(content: TableContent): string {
  return typeof content === 'string' ? content : content.toString('utf-8');
}

interface ParsedPayload {
  records: FeedbackRecordInput[];
  /** Entries rejected while parsing, already labelled */
  errorMessages: string[];
}

function parseRecords(format: Exclude<ImportFormat, 'profiles_csv'>, content: TableContent): ParsedPayload {
  switch (format) {
    case 'nps_csv':
      return { records: parseNpsCsv(content), errorMessages: [] };
    case 'zendesk_json': {
      const parsed = parseZendeskJson(asText(content));
      return {
        records: parsed.records,
        errorMessages: parsed.errors.map(e => `ticket ${e.row}: ${e.message}`),
      };
    }
    case 'feedback_json':
      return { records: parseFeedbackJson(asText(content)), errorMessages: [] };
  }
}

function mirrorProgress(context: JobContext, parseErrors: number) {
  return (progress: BatchProgress) => {
    context.updateProgress({
      current: progress.processed,
      total: progress.total,
      successful: progress.successful,
      errors: parseErrors + progress.errors,
      message: `Processed ${progress.processed}/${progress.total}`,
    });
  };
}

/**
 * Start an import in the background and return its pending job.
 */
export function startImportJob(deps: ImportDeps, request: ImportRequest): Job {
  const { tracker, ingester } = deps;

  return tracker.runInBackground<ImportResult>(IMPORT_JOB_TYPE, async (context) => {
    context.updateProgress({ message: `Parsing ${request.format}` });

    if (request.format === 'profiles_csv') {
      const parsed = parseUserProfilesCsv(request.content);
      context.updateProgress({ total: parsed.profiles.length, errors: parsed.errors.length });

      const imported = await ingester.importUserProfiles(parsed.profiles, {
        isCancelled: context.isCancelled,
        onProgress: (progress) => {
          context.updateProgress({
            current: progress.processed,
            successful: progress.successful,
            message: `Imported ${progress.processed}/${progress.total} profiles`,
          });
        },
      });

      return {
        imported,
        skipped: 0,
        errors: parsed.errors.length,
        errorMessages: parsed.errors
          .slice(0, MAX_ERROR_MESSAGES)
          .map(e => `row ${e.row}: ${e.message}`),
      };
    }

    const { records, errorMessages: parseErrors } = parseRecords(request.format, request.content);
    context.updateProgress({
      total: records.length,
      errors: parseErrors.length,
      message: `Importing ${records.length} records`,
    });

    const result = await ingester.ingestBatch(records, request.source ?? DEFAULT_SOURCES[request.format], {
      skipClassification: request.skipClassification,
      isCancelled: context.isCancelled,
      onProgress: mirrorProgress(context, parseErrors.length),
    });

    return {
      imported: result.items.length,
      skipped: result.skipped,
      errors: parseErrors.length + result.errors.length,
      errorMessages: [
        ...parseErrors,
        ...result.errors.map(e => `record ${e.index}: ${e.message}`),
      ].slice(0, MAX_ERROR_MESSAGES),
    };
  });
}
