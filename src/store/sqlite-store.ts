/**
 * SQLite Feedback Store - embedded backend on better-sqlite3
 *
 * Filters run as SQL against feedback LEFT JOIN user_profiles. Semantic
 * re-ranking materializes the whole filtered set and sorts it in process
 * (brute-force cosine), so pagination happens after ranking.
 *
 * The driver is synchronous; every public method finishes its database work
 * in one tick and wraps driver failures in StoreError.
 *
 * Consumers: store/index.ts (createStore), query/ingestion tests
 */

import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { storeConfig } from './config.js';
import { StoreError, assertEmbeddingDimensions, describeError } from './errors.js';
import { feedbackToColumns, parseFeedbackRow, profileToColumns } from './rows.js';
import { rankBySimilarity } from './vector.js';
import type { FeedbackStore } from './types.js';
import type {
  Classification,
  FeedbackItem,
  NewFeedbackItem,
  SearchQuery,
  SearchResult,
  UserProfile,
} from '../feedback/types.js';

export interface SqliteStoreOptions {
  /** Database file, or ':memory:' */
  filename: string;
  embeddingDimensions: number;
  migrationsDir?: string;
}

// ---------------------------------------------------------------------------
// SQL fragments
// ---------------------------------------------------------------------------

const SELECT_JOINED = `
  SELECT
    f.*,
    u.user_id AS u_user_id,
    u.email AS u_email,
    u.subscription_type AS u_subscription_type,
    u.mrr AS u_mrr,
    u.company_name AS u_company_name,
    u.industry AS u_industry,
    u.signup_date AS u_signup_date,
    u.custom_traits AS u_custom_traits
  FROM feedback f
  LEFT JOIN user_profiles u ON u.user_id = f.user_id`;

const COUNT_JOINED = `
  SELECT COUNT(*) AS count
  FROM feedback f
  LEFT JOIN user_profiles u ON u.user_id = f.user_id`;

/** Newest first; id breaks ties between identical timestamps, as in search_feedback */
const DEFAULT_ORDER = 'ORDER BY f.created_at DESC, f.id DESC';

const UPSERT_PROFILE = `
  INSERT INTO user_profiles (
    user_id, email, subscription_type, mrr, company_name, industry, signup_date, custom_traits
  ) VALUES (
    @user_id, @email, @subscription_type, @mrr, @company_name, @industry, @signup_date, @custom_traits
  )
  ON CONFLICT(user_id) DO UPDATE SET
    email = excluded.email,
    subscription_type = excluded.subscription_type,
    mrr = excluded.mrr,
    company_name = excluded.company_name,
    industry = excluded.industry,
    signup_date = excluded.signup_date,
    custom_traits = excluded.custom_traits`;

const INSERT_FEEDBACK = `
  INSERT INTO feedback (
    id, text, source, created_at, user_id, sentiment, topics, urgency, intent,
    summary, confidence, nps_score, ticket_id, ticket_priority, embedding
  ) VALUES (
    @id, @text, @source, @created_at, @user_id, @sentiment, @topics, @urgency, @intent,
    @summary, @confidence, @nps_score, @ticket_id, @ticket_priority, @embedding
  )`;

const CountRowSchema = z.object({ count: z.number() });

// ---------------------------------------------------------------------------
// Filter translation
// ---------------------------------------------------------------------------

export interface WhereClause {
  /** Empty string when the query has no constraints */
  sql: string;
  params: (string | number)[];
}

/**
 * Translate a SearchQuery into a WHERE clause over `f` (feedback) and `u`
 * (user_profiles). Empty lists and null bounds impose no constraint.
 */
export function buildWhereClause(query: SearchQuery): WhereClause {
  const conditions: string[] = [];
  const params: (string | number)[] = [];

  const inList = (column: string, values: readonly string[] | null) => {
    if (!values || values.length === 0) return;
    conditions.push(`${column} IN (${values.map(() => '?').join(', ')})`);
    params.push(...values);
  };

  const bound = (expression: string, value: number | string | null) => {
    if (value === null) return;
    conditions.push(expression);
    params.push(value);
  };

  inList('f.source', query.sources);
  inList('f.sentiment', query.sentiments);
  inList('f.urgency', query.urgencyLevels);
  inList('f.intent', query.intents);
  inList('u.subscription_type', query.subscriptionTypes);
  inList('u.industry', query.industries);

  // Any-of: the item shares at least one requested topic
  if (query.topics && query.topics.length > 0) {
    conditions.push(
      `EXISTS (SELECT 1 FROM json_each(f.topics) WHERE json_each.value IN (${query.topics.map(() => '?').join(', ')}))`,
    );
    params.push(...query.topics);
  }

  bound('u.mrr >= ?', query.minMrr);
  bound('u.mrr <= ?', query.maxMrr);
  bound('f.nps_score >= ?', query.minNps);
  bound('f.nps_score <= ?', query.maxNps);
  bound('f.created_at >= ?', query.startDate ? query.startDate.toISOString() : null);
  bound('f.created_at <= ?', query.endDate ? query.endDate.toISOString() : null);

  return {
    sql: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
    params,
  };
}

function toJson(value: unknown): string | null {
  return value === null || value === undefined ? null : JSON.stringify(value);
}

function profileParams(profile: UserProfile) {
  const columns = profileToColumns(profile);
  return { ...columns, custom_traits: JSON.stringify(columns.custom_traits) };
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export class SqliteFeedbackStore implements FeedbackStore {
  readonly backend = 'sqlite' as const;
  readonly embeddingDimensions: number;

  private readonly db: Database.Database;
  private readonly migrationsDir: string;

  constructor(options: SqliteStoreOptions) {
    if (options.filename !== ':memory:') {
      const dir = path.dirname(options.filename);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(options.filename);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');

    this.embeddingDimensions = options.embeddingDimensions;
    this.migrationsDir = options.migrationsDir ?? storeConfig.sqliteMigrationsDir;
  }

  async initialize(): Promise<void> {
    this.guard('initialize', () => {
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS schema_migrations (
          name TEXT PRIMARY KEY,
          applied_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
        )
      `);

      const files = fs.readdirSync(this.migrationsDir)
        .filter(f => f.endsWith('.sql'))
        .sort();

      for (const file of files) {
        const applied = this.db.prepare('SELECT name FROM schema_migrations WHERE name = ?').get(file);
        if (applied) continue;

        const sql = fs.readFileSync(path.join(this.migrationsDir, file), 'utf-8');
        this.db.transaction(() => {
          this.db.exec(sql);
          this.db.prepare('INSERT INTO schema_migrations (name) VALUES (?)').run(file);
        })();
        console.log('[store] Applied migration', { file });
      }
    });
  }

  async insertFeedback(item: NewFeedbackItem): Promise<string> {
    assertEmbeddingDimensions('insertFeedback', item.embedding, this.embeddingDimensions);
    const id = item.id ?? randomUUID();
    const columns = feedbackToColumns({ ...item, id });
    const profile = item.userProfile;

    this.guard('insertFeedback', () => {
      this.db.transaction(() => {
        if (profile) {
          this.db.prepare(UPSERT_PROFILE).run(profileParams(profile));
        }
        this.db.prepare(INSERT_FEEDBACK).run({
          ...columns,
          topics: toJson(columns.topics),
          embedding: toJson(columns.embedding),
        });
      })();
    });

    return id;
  }

  async upsertUserProfile(profile: UserProfile): Promise<void> {
    this.guard('upsertUserProfile', () => {
      this.db.prepare(UPSERT_PROFILE).run(profileParams(profile));
    });
  }

  async getFeedback(id: string): Promise<FeedbackItem | null> {
    return this.guard('getFeedback', () => {
      const row = this.db.prepare(`${SELECT_JOINED} WHERE f.id = ?`).get(id);
      return row === undefined ? null : parseFeedbackRow(row);
    });
  }

  async search(query: SearchQuery, queryEmbedding: number[] | null = null): Promise<SearchResult> {
    const rankWith = queryEmbedding && query.queryText?.trim() ? queryEmbedding : null;
    if (rankWith) {
      assertEmbeddingDimensions('search', rankWith, this.embeddingDimensions);
    }

    return this.guard('search', () => {
      const where = buildWhereClause(query);
      const countRow = this.db.prepare(`${COUNT_JOINED} ${where.sql}`).get(...where.params);
      const totalCount = CountRowSchema.parse(countRow).count;

      let items: FeedbackItem[];
      if (rankWith) {
        const rows = this.db.prepare(`${SELECT_JOINED} ${where.sql} ${DEFAULT_ORDER}`).all(...where.params);
        items = rankBySimilarity(rows.map(parseFeedbackRow), rankWith)
          .slice(query.offset, query.offset + query.limit)
          .map(ranked => ranked.item);
      } else {
        const rows = this.db
          .prepare(`${SELECT_JOINED} ${where.sql} ${DEFAULT_ORDER} LIMIT ? OFFSET ?`)
          .all(...where.params, query.limit, query.offset);
        items = rows.map(parseFeedbackRow);
      }

      return { items, totalCount, query };
    });
  }

  async updateClassification(id: string, classification: Classification): Promise<boolean> {
    return this.guard('updateClassification', () => {
      const info = this.db.prepare(`
        UPDATE feedback
        SET sentiment = ?, topics = ?, urgency = ?, intent = ?, summary = ?, confidence = ?
        WHERE id = ?
      `).run(
        classification.sentiment,
        JSON.stringify(classification.topics),
        classification.urgency,
        classification.intent,
        classification.summary,
        classification.confidence,
        id,
      );
      return info.changes > 0;
    });
  }

  async getAllForReclassification(batchSize: number): Promise<FeedbackItem[]> {
    return this.guard('getAllForReclassification', () => {
      const rows = this.db.prepare(`${SELECT_JOINED} ${DEFAULT_ORDER} LIMIT ?`).all(batchSize);
      return rows.map(parseFeedbackRow);
    });
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof StoreError) throw err;
      throw new StoreError(operation, describeError(err), err);
    }
  }
}
