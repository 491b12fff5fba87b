/**
 * Feedback Ingester
 *
 * Normalizes incoming feedback, enriches it through the classification
 * gateway (embedding always, classification unless skipped) and writes it
 * through the store.
 *
 * Batch ingestion:
 * - Blank text is skipped; malformed records are reported and skipped
 * - Valid records are embedded `batchSize` at a time (one gateway call per chunk)
 * - Records are classified and stored one by one; a store failure is recorded
 *   against that record and the batch continues
 * - `isCancelled` is checked before every chunk and every record
 *
 * Consumers: jobs/import-jobs.ts, api/server.ts, cli.ts
 */

import { randomUUID } from 'node:crypto';
import { FeedbackValidationError } from '../feedback/errors.js';
import { failedClassification } from '../feedback/types.js';
import { GatewayError } from '../gateway/types.js';
import { sanitizeForLog } from '../sanitize.js';
import { normalizeRecord, recordProfile, type CanonicalRecord } from './records.js';
import type {
  Classification,
  FeedbackItem,
  FeedbackSource,
  UserProfile,
} from '../feedback/types.js';
import type { ClassificationGateway, ClassifyContext } from '../gateway/types.js';
import type { FeedbackStore } from '../store/types.js';

export const DEFAULT_BATCH_SIZE = 10;

export interface IngestInput {
  text: string;
  source: FeedbackSource;
  userProfile?: UserProfile | null;
  npsScore?: number | null;
  ticketId?: string | null;
  ticketPriority?: string | null;
  createdAt?: Date | string | null;
  skipClassification?: boolean;
}

export interface BatchProgress {
  /** Records finished in any way (stored, skipped or failed) */
  processed: number;
  total: number;
  successful: number;
  errors: number;
  skipped: number;
}

export interface IngestBatchOptions {
  skipClassification?: boolean;
  batchSize?: number;
  onProgress?: (progress: BatchProgress) => void;
  isCancelled?: () => boolean;
}

export interface RecordError {
  /** Position in the input array */
  index: number;
  message: string;
}

export interface IngestBatchResult {
  items: FeedbackItem[];
  skipped: number;
  errors: RecordError[];
  /** True when the run stopped early on cancellation */
  cancelled: boolean;
}

export interface IngesterOptions {
  now?: () => Date;
  idFactory?: () => string;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class FeedbackIngester {
  private readonly now: () => Date;
  private readonly idFactory: () => string;

  constructor(
    private readonly store: FeedbackStore,
    private readonly gateway: ClassificationGateway,
    options: IngesterOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
    this.idFactory = options.idFactory ?? randomUUID;
  }

  /**
   * Validate, embed, classify (unless skipped) and store one item.
   *
   * @throws FeedbackValidationError for blank text, a bad NPS score or date
   */
  async ingestSingle(input: IngestInput): Promise<FeedbackItem> {
    const text = input.text.trim();
    if (!text) {
      throw new FeedbackValidationError('Feedback text must not be empty', 'text');
    }

    const npsScore = input.npsScore ?? null;
    if (npsScore !== null && (!Number.isInteger(npsScore) || npsScore < 0 || npsScore > 10)) {
      throw new FeedbackValidationError(`NPS score must be an integer from 0 to 10, got ${npsScore}`, 'npsScore');
    }

    const createdAt = input.createdAt ? new Date(input.createdAt) : this.now();
    if (Number.isNaN(createdAt.getTime())) {
      throw new FeedbackValidationError('createdAt is not a valid date', 'createdAt');
    }

    const userProfile = input.userProfile ?? null;
    const embedding = await this.gateway.embed(text);
    const classification = input.skipClassification
      ? null
      : await this.classifySafely(text, { userProfile, npsScore, source: input.source });

    const item: FeedbackItem = {
      id: this.idFactory(),
      text,
      source: input.source,
      createdAt: createdAt.toISOString(),
      userProfile,
      classification,
      embedding,
      npsScore,
      ticketId: input.ticketId ?? null,
      ticketPriority: input.ticketPriority ?? null,
    };

    await this.store.insertFeedback(item);
    console.log('[ingestion] Stored feedback', {
      id: item.id,
      source: item.source,
      sentiment: classification?.sentiment ?? null,
      confidence: classification?.confidence ?? null,
    });
    return item;
  }

  /**
   * Ingest raw records from one source. Embedding failures abort the batch;
   * per-record store failures do not.
   */
  async ingestBatch(
    records: readonly unknown[],
    source: FeedbackSource,
    options: IngestBatchOptions = {},
  ): Promise<IngestBatchResult> {
    const batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
    const isCancelled = options.isCancelled ?? (() => false);

    const items: FeedbackItem[] = [];
    const errors: RecordError[] = [];
    let skipped = 0;
    let processed = 0;

    const report = () => options.onProgress?.({
      processed,
      total: records.length,
      successful: items.length,
      errors: errors.length,
      skipped,
    });
    const stop = () => {
      console.log('[ingestion] Batch cancelled', { source, processed, total: records.length });
      return { items, skipped, errors, cancelled: true };
    };

    // Normalize everything up front so chunks only hold embeddable text
    const valid: { index: number; record: CanonicalRecord }[] = [];
    records.forEach((raw, index) => {
      const normalized = normalizeRecord(raw);
      if (normalized.kind === 'valid') {
        valid.push({ index, record: normalized.record });
        return;
      }
      processed++;
      if (normalized.kind === 'skipped') {
        skipped++;
      } else {
        errors.push({ index, message: normalized.message });
        console.warn('[ingestion] Invalid record', { index, error: normalized.message, record: sanitizeForLog(raw) });
      }
    });
    if (processed > 0) report();

    for (let start = 0; start < valid.length; start += batchSize) {
      if (isCancelled()) return stop();

      const chunk = valid.slice(start, start + batchSize);
      const embeddings = await this.gateway.embedBatch(chunk.map(entry => entry.record.text));
      if (embeddings.length !== chunk.length) {
        throw new GatewayError(`Batch embedding returned ${embeddings.length} vectors for ${chunk.length} texts`);
      }

      for (let j = 0; j < chunk.length; j++) {
        if (isCancelled()) return stop();

        const { index, record } = chunk[j];
        try {
          items.push(await this.storeRecord(record, source, embeddings[j], options.skipClassification ?? false));
        } catch (err) {
          errors.push({ index, message: errorMessage(err) });
          console.error('[ingestion] Failed to store record (non-fatal)', { index, error: errorMessage(err) });
        }
        processed++;
        report();
      }
    }

    console.log('[ingestion] Batch complete', {
      source,
      total: records.length,
      stored: items.length,
      skipped,
      errors: errors.length,
    });
    return { items, skipped, errors, cancelled: false };
  }

  /** Upsert profiles for enrichment; returns how many were written */
  async importUserProfiles(
    profiles: readonly UserProfile[],
    options: Pick<IngestBatchOptions, 'onProgress' | 'isCancelled'> = {},
  ): Promise<number> {
    let count = 0;
    for (const profile of profiles) {
      if (options.isCancelled?.()) break;
      await this.store.upsertUserProfile(profile);
      count++;
      options.onProgress?.({ processed: count, total: profiles.length, successful: count, errors: 0, skipped: 0 });
    }
    console.log('[ingestion] Imported user profiles', { count });
    return count;
  }

  private async storeRecord(
    record: CanonicalRecord,
    source: FeedbackSource,
    embedding: number[],
    skipClassification: boolean,
  ): Promise<FeedbackItem> {
    const userProfile = recordProfile(record);
    const classification = skipClassification
      ? null
      : await this.classifySafely(record.text, { userProfile, npsScore: record.npsScore, source });

    const item: FeedbackItem = {
      id: this.idFactory(),
      text: record.text,
      source,
      createdAt: (record.createdAt ?? this.now()).toISOString(),
      userProfile,
      classification,
      embedding,
      npsScore: record.npsScore,
      ticketId: record.ticketId,
      ticketPriority: record.ticketPriority,
    };

    await this.store.insertFeedback(item);
    return item;
  }

  // A throwing gateway still yields a stored record holding the placeholder
  private async classifySafely(text: string, context: ClassifyContext): Promise<Classification> {
    try {
      return await this.gateway.classify(text, context);
    } catch (err) {
      console.error('[ingestion] Classification threw, storing placeholder', { error: errorMessage(err) });
      return failedClassification();
    }
  }
}
