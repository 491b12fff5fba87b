/**
 * Express API Server
 *
 * HTTP layer over the query service, the ingester and the job tracker.
 * Request fields (query strings and JSON bodies) are snake_case, matching the
 * import record format; responses are camelCase.
 *
 * Status codes:
 * - 400 for FeedbackValidationError (bad filters, bad bodies, bad records)
 * - 404 for unknown feedback or job ids
 * - 202 for work handed to the job tracker (imports, reclassification)
 * - 500 for everything else, via the global error handler
 *
 * Feedback text and emails are never logged; bodies go through sanitizeForLog.
 */

import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { healthHandler } from './health.js';
import { FeedbackValidationError } from '../feedback/errors.js';
import { firstIssue } from '../feedback/coerce.js';
import { FeedbackSourceSchema } from '../feedback/types.js';
import type { FeedbackItem } from '../feedback/types.js';
import { normalizeRecord, recordProfile } from '../ingestion/records.js';
import { ImportRequestSchema, startImportJob } from '../jobs/import-jobs.js';
import { progressPercentage } from '../jobs/job-tracker.js';
import { sanitizeForLog } from '../sanitize.js';
import type { FeedbackIngester } from '../ingestion/ingester.js';
import type { Job, JobTracker } from '../jobs/job-tracker.js';
import type { FeedbackQueryService, ReclassifyResult } from '../query/query-service.js';
import type { SearchParams } from '../query/params.js';

export const API_VERSION = '1.0.0';
export const RECLASSIFY_JOB_TYPE = 'reclassify';

export interface ApiDeps {
  queryService: FeedbackQueryService;
  ingester: FeedbackIngester;
  tracker: JobTracker;
}

// ---------------------------------------------------------------------------
// Request helpers
// ---------------------------------------------------------------------------

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/** Route async handlers' rejections to the error handler */
function route(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.output<T> {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const { field, message } = firstIssue(parsed.error);
    throw new FeedbackValidationError(field ? `Invalid ${field}: ${message}` : message, field);
  }
  return parsed.data;
}

/** A query-string value as one string; repeated keys are joined with commas */
function queryValue(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) {
    const strings = value.filter((v): v is string => typeof v === 'string');
    return strings.length > 0 ? strings.join(',') : undefined;
  }
  return undefined;
}

function searchParamsFromQuery(query: Request['query']): SearchParams {
  return {
    query: queryValue(query.query),
    sources: queryValue(query.sources),
    sentiments: queryValue(query.sentiments),
    topics: queryValue(query.topics),
    urgencyLevels: queryValue(query.urgency),
    intents: queryValue(query.intents),
    subscriptionTypes: queryValue(query.subscription_types),
    industries: queryValue(query.industries),
    minMrr: queryValue(query.min_mrr),
    maxMrr: queryValue(query.max_mrr),
    minNps: queryValue(query.min_nps),
    maxNps: queryValue(query.max_nps),
    daysBack: queryValue(query.days_back),
    startDate: queryValue(query.start_date),
    endDate: queryValue(query.end_date),
    limit: queryValue(query.limit),
    offset: queryValue(query.offset),
  };
}

/** Query-string integer with a default; rejects anything else */
function intParam(value: unknown, field: string, fallback: number): number {
  const raw = queryValue(value);
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new FeedbackValidationError(`Invalid ${field}: expected a non-negative integer`, field);
  }
  return parsed;
}

function optionalNumberParam(value: unknown, field: string): number | undefined {
  const raw = queryValue(value);
  if (raw === undefined || raw.trim() === '') return undefined;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new FeedbackValidationError(`Invalid ${field}: expected a non-negative number`, field);
  }
  return parsed;
}

function listParam(value: unknown): string[] | undefined {
  const raw = queryValue(value);
  if (raw === undefined) return undefined;
  const items = raw.split(',').map(s => s.trim()).filter(Boolean);
  return items.length > 0 ? items : undefined;
}

// ---------------------------------------------------------------------------
// Response shapes
// ---------------------------------------------------------------------------

/** Items go out without their embedding vector */
export function toResponseItem(item: FeedbackItem): Omit<FeedbackItem, 'embedding'> & { hasEmbedding: boolean } {
  const { embedding, ...rest } = item;
  return { ...rest, hasEmbedding: embedding !== null };
}

export function toResponseJob(job: Job): Job & { percentage: number } {
  return { ...job, percentage: progressPercentage(job.progress) };
}

// ---------------------------------------------------------------------------
// Body schemas
// ---------------------------------------------------------------------------

const IngestBodySchema = z.object({
  source: FeedbackSourceSchema.default('nps'),
  skip_classification: z.boolean().optional(),
}).passthrough();

const AskBodySchema = z.object({
  question: z.string().trim().min(1, 'question must not be empty'),
  sources: z.array(z.string()).optional(),
  sentiments: z.array(z.string()).optional(),
  topics: z.array(z.string()).optional(),
  subscription_types: z.array(z.string()).optional(),
  min_mrr: z.number().min(0).optional(),
  max_mrr: z.number().min(0).optional(),
  days_back: z.number().int().min(0).optional(),
});

const CustomSearchBodySchema = z.object({
  criteria: z.string().trim().min(1, 'criteria must not be empty'),
  limit: z.number().int().min(1).max(1000).default(50),
});

const ImportBodySchema = ImportRequestSchema.extend({
  skip_classification: z.boolean().optional(),
}).omit({ skipClassification: true });

const ReclassifyBodySchema = z.object({
  batch_size: z.number().int().min(1).default(100),
});

// ---------------------------------------------------------------------------
// App
// ---------------------------------------------------------------------------

/**
 * Create the Express application with all routes configured.
 *
 * Dependencies are injected so tests can run against in-memory stores and
 * stub gateways.
 */
export function createApp(deps: ApiDeps) {
  const { queryService, ingester, tracker } = deps;
  const app = express();
  app.use(express.json({ limit: '10mb' }));

  app.get('/', (_req: Request, res: Response) => {
    res.json({
      name: 'Feedback Radar API',
      version: API_VERSION,
      endpoints: {
        '/ingest': 'POST - Ingest and classify new feedback',
        '/feedback/:id': 'GET - Fetch one feedback item',
        '/search': 'GET - Search feedback with filters',
        '/ask': 'POST - Ask natural language questions about feedback',
        '/alerts/churn-risks': 'GET - Churn risk alerts',
        '/alerts/urgent': 'GET - Urgent issues',
        '/alerts/upsell': 'GET - Upsell opportunities',
        '/alerts/detractors': 'GET - NPS detractor feedback',
        '/alerts/promoters': 'GET - NPS promoter feedback',
        '/topics/:topic/summary': 'GET - AI summary of one topic',
        '/custom-search': 'POST - Match feedback against custom criteria',
        '/reclassify': 'POST - Reclassify feedback in the background',
        '/stats': 'GET - Feedback statistics',
        '/imports': 'POST - Start a bulk import job',
        '/jobs': 'GET - List background jobs',
      },
    });
  });

  app.get('/health', healthHandler);

  // ========== Ingestion ==========

  app.post('/ingest', route(async (req, res) => {
    const body = parseBody(IngestBodySchema, req.body);
    const normalized = normalizeRecord(body);
    if (normalized.kind === 'skipped') {
      throw new FeedbackValidationError('Feedback text must not be empty', 'text');
    }
    if (normalized.kind === 'invalid') {
      console.warn('[api] Rejected ingest body', { error: normalized.message, body: sanitizeForLog(body) });
      throw new FeedbackValidationError(`Invalid ${normalized.message}`, normalized.field);
    }

    const { record } = normalized;
    const item = await ingester.ingestSingle({
      text: record.text,
      source: body.source,
      userProfile: recordProfile(record),
      npsScore: record.npsScore,
      ticketId: record.ticketId,
      ticketPriority: record.ticketPriority,
      createdAt: record.createdAt,
      skipClassification: body.skip_classification,
    });

    res.status(201).json({
      id: item.id,
      classification: item.classification,
      message: item.classification
        ? 'Feedback ingested and classified successfully'
        : 'Feedback ingested without classification',
    });
  }));

  app.post('/imports', route(async (req, res) => {
    const body = parseBody(ImportBodySchema, req.body);
    const job = startImportJob({ tracker, ingester }, {
      format: body.format,
      content: body.content,
      source: body.source,
      skipClassification: body.skip_classification,
    });
    console.log('[api] Import job started', { jobId: job.id, format: body.format });
    res.status(202).json({ job: toResponseJob(job) });
  }));

  // ========== Retrieval ==========

  app.get('/feedback/:id', route(async (req, res) => {
    const item = await queryService.getFeedback(req.params.id);
    if (!item) {
      res.status(404).json({ error: 'Feedback not found' });
      return;
    }
    res.json(toResponseItem(item));
  }));

  app.get('/search', route(async (req, res) => {
    const result = await queryService.search(searchParamsFromQuery(req.query));
    res.json({ items: result.items.map(toResponseItem), totalCount: result.totalCount });
  }));

  app.post('/ask', route(async (req, res) => {
    const body = parseBody(AskBodySchema, req.body);
    const filters: SearchParams = {
      sources: body.sources,
      sentiments: body.sentiments,
      topics: body.topics,
      subscriptionTypes: body.subscription_types,
      minMrr: body.min_mrr,
      maxMrr: body.max_mrr,
      daysBack: body.days_back ?? 30,
    };

    res.json(await queryService.ask(body.question, filters));
  }));

  // ========== Alerts ==========

  app.get('/alerts/churn-risks', route(async (req, res) => {
    const result = await queryService.getChurnRisks({
      minMrr: optionalNumberParam(req.query.min_mrr, 'min_mrr'),
      daysBack: intParam(req.query.days_back, 'days_back', 30),
      limit: intParam(req.query.limit, 'limit', 20),
    });
    res.json({ items: result.items.map(toResponseItem), totalCount: result.totalCount });
  }));

  app.get('/alerts/urgent', route(async (req, res) => {
    const result = await queryService.getUrgentIssues({
      subscriptionTypes: listParam(req.query.subscription_types),
      daysBack: intParam(req.query.days_back, 'days_back', 7),
      limit: intParam(req.query.limit, 'limit', 20),
    });
    res.json({ items: result.items.map(toResponseItem), totalCount: result.totalCount });
  }));

  app.get('/alerts/upsell', route(async (req, res) => {
    const result = await queryService.getUpsellOpportunities({
      subscriptionTypes: listParam(req.query.subscription_types),
      daysBack: intParam(req.query.days_back, 'days_back', 30),
      limit: intParam(req.query.limit, 'limit', 20),
    });
    res.json({ items: result.items.map(toResponseItem), totalCount: result.totalCount });
  }));

  app.get('/alerts/detractors', route(async (req, res) => {
    const result = await queryService.getDetractorFeedback({
      maxNps: optionalNumberParam(req.query.max_nps, 'max_nps'),
      daysBack: intParam(req.query.days_back, 'days_back', 30),
      limit: intParam(req.query.limit, 'limit', 20),
    });
    res.json({ items: result.items.map(toResponseItem), totalCount: result.totalCount });
  }));

  app.get('/alerts/promoters', route(async (req, res) => {
    const result = await queryService.getPromoterFeedback({
      minNps: optionalNumberParam(req.query.min_nps, 'min_nps'),
      daysBack: intParam(req.query.days_back, 'days_back', 30),
      limit: intParam(req.query.limit, 'limit', 20),
    });
    res.json({ items: result.items.map(toResponseItem), totalCount: result.totalCount });
  }));

  // ========== Analysis ==========

  app.get('/topics/:topic/summary', route(async (req, res) => {
    const topic = req.params.topic;
    const summary = await queryService.getTopicSummary(topic, intParam(req.query.days_back, 'days_back', 30));
    res.json({ topic, summary });
  }));

  app.post('/custom-search', route(async (req, res) => {
    const body = parseBody(CustomSearchBodySchema, req.body);
    const results = await queryService.findByCustomCriteria(body.criteria, body.limit);
    res.json({
      criteria: body.criteria,
      matches: results
        .filter(r => r.matches)
        .map(r => ({ feedback: toResponseItem(r.item), matches: r.matches, reason: r.reason })),
    });
  }));

  app.post('/reclassify', route(async (req, res) => {
    const { batch_size: batchSize } = parseBody(ReclassifyBodySchema, req.body);
    const job = tracker.runInBackground<ReclassifyResult>(RECLASSIFY_JOB_TYPE, (context) =>
      queryService.reclassifyAll(batchSize, (done, total) => {
        context.updateProgress({ current: done, total, message: `Reclassified ${done}/${total}` });
      }),
    );
    console.log('[api] Reclassification job started', { jobId: job.id, batchSize });
    res.status(202).json({ job: toResponseJob(job) });
  }));

  app.get('/stats', route(async (req, res) => {
    res.json(await queryService.getStatistics(intParam(req.query.days_back, 'days_back', 30)));
  }));

  // ========== Jobs ==========

  app.get('/jobs', (req: Request, res: Response) => {
    res.json({ jobs: tracker.listJobs(queryValue(req.query.type)).map(toResponseJob) });
  });

  app.get('/jobs/:id', (req: Request, res: Response) => {
    const job = tracker.getJob(req.params.id);
    if (!job) {
      res.status(404).json({ error: 'Job not found' });
      return;
    }
    res.json(toResponseJob(job));
  });

  app.post('/jobs/:id/cancel', (req: Request, res: Response) => {
    const id = req.params.id;
    if (!tracker.getJob(id)) {
      res.status(404).json({ error: 'Job not found' });
      return;
    }
    const cancelled = tracker.cancelJob(id);
    const job = tracker.getJob(id);
    res.status(cancelled ? 200 : 409).json({ cancelled, job: job ? toResponseJob(job) : null });
  });

  // Global error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof FeedbackValidationError) {
      res.status(400).json({ error: err.message, field: err.field });
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body', field: null });
      return;
    }
    console.error('[server] Unhandled error:', err.message);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
