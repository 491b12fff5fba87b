import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { z } from 'zod';
import { ImportRequestSchema, startImportJob, type ImportResult } from '../import-jobs.js';
import { JobTracker } from '../job-tracker.js';
import { FeedbackIngester } from '../../ingestion/ingester.js';
import { SqliteFeedbackStore } from '../../store/sqlite-store.js';
import { createStubGateway } from '../../__tests__/fixtures/feedback.js';

let store: SqliteFeedbackStore;
let tracker: JobTracker;
let ingester: FeedbackIngester;

beforeEach(async () => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);

  store = new SqliteFeedbackStore({ filename: ':memory:', embeddingDimensions: 3 });
  await store.initialize();
  tracker = new JobTracker();
  let next = 0;
  ingester = new FeedbackIngester(store, createStubGateway(), { idFactory: () => `fb-${++next}` });
});

afterEach(async () => {
  await store.close();
  vi.restoreAllMocks();
});

const ImportResultShape = z.object({
  imported: z.number(),
  skipped: z.number(),
  errors: z.number(),
  errorMessages: z.array(z.string()),
});

function resultOf(value: unknown): ImportResult {
  return ImportResultShape.parse(value);
}

describe('startImportJob', () => {
  it('imports an NPS export and mirrors batch progress onto the job', async () => {
    const job = startImportJob({ tracker, ingester }, {
      format: 'nps_csv',
      content: 'response,score\nLove it,10\nMeh,abc\n',
    });
    expect(job.type).toBe('import');

    const finished = await tracker.waitForJob(job.id);

    expect(finished?.status).toBe('completed');
    const result = resultOf(finished?.result);
    expect(result.imported).toBe(1);
    expect(result.skipped).toBe(0);
    expect(result.errors).toBe(1);
    expect(result.errorMessages).toHaveLength(1);
    expect(result.errorMessages[0]).toMatch(/^record 1: nps_score: /);
    expect(finished?.progress).toEqual({ current: 2, total: 2, successful: 1, errors: 1, message: 'Processed 2/2' });
    expect((await store.getFeedback('fb-1'))?.source).toBe('nps');
  });

  it('uses an explicit source over the format default', async () => {
    const job = startImportJob({ tracker, ingester }, {
      format: 'feedback_json',
      content: JSON.stringify([{ text: 'Please add SSO' }]),
      source: 'email',
      skipClassification: true,
    });

    await tracker.waitForJob(job.id);

    const stored = await store.getFeedback('fb-1');
    expect(stored?.source).toBe('email');
    expect(stored?.classification).toBeNull();
  });

  it('fails the job, not the caller, on a malformed file', async () => {
    const job = startImportJob({ tracker, ingester }, { format: 'zendesk_json', content: '{oops' });

    expect(job.status).toBe('pending');
    const finished = await tracker.waitForJob(job.id);
    expect(finished?.status).toBe('failed');
    expect(finished?.error).toMatch(/^Zendesk import is not valid JSON: /);
  });

  it('imports the valid tickets of a Zendesk export with one malformed ticket', async () => {
    const job = startImportJob({ tracker, ingester }, {
      format: 'zendesk_json',
      content: JSON.stringify([
        { id: 1, description: 'Cannot export reports' },
        { id: 2, description: 'Search is slow', priority: 2 },
        { id: 3, description: 'Invoice is missing' },
      ]),
    });

    const finished = await tracker.waitForJob(job.id);

    expect(finished?.status).toBe('completed');
    expect(resultOf(finished?.result)).toEqual({
      imported: 2,
      skipped: 0,
      errors: 1,
      errorMessages: ['ticket 1: priority: Expected string, received number'],
    });
    expect(finished?.progress).toMatchObject({ current: 2, total: 2, successful: 2, errors: 1 });
    expect((await store.getFeedback('fb-2'))).toMatchObject({ text: 'Invoice is missing', source: 'zendesk', ticketId: '3' });
  });

  it('imports user profiles and reports bad rows', async () => {
    const job = startImportJob({ tracker, ingester }, {
      format: 'profiles_csv',
      content: 'user_id,mrr\nu1,10\nu2,bad\n',
    });

    const finished = await tracker.waitForJob(job.id);

    const result = resultOf(finished?.result);
    expect(result.imported).toBe(1);
    expect(result.errors).toBe(1);
    expect(result.errorMessages[0]).toMatch(/^row 2: mrr: /);
    expect(finished?.progress).toMatchObject({ current: 1, total: 1, successful: 1, errors: 1, message: 'Imported 1/1 profiles' });
  });
});

describe('ImportRequestSchema', () => {
  it('accepts known formats with content', () => {
    expect(ImportRequestSchema.safeParse({ format: 'nps_csv', content: 'a' }).success).toBe(true);
  });

  it('rejects unknown formats and empty content', () => {
    expect(ImportRequestSchema.safeParse({ format: 'xml', content: 'a' }).success).toBe(false);
    expect(ImportRequestSchema.safeParse({ format: 'nps_csv', content: '' }).success).toBe(false);
  });
});
