/**
 * Persisted Row Mapping
 *
 * Both backends read feedback joined to its profile as one flat row:
 * feedback columns plus the profile columns prefixed with `u_`. SQLite hands
 * back JSON text for topics, embeddings and traits; PostgREST hands back
 * arrays, jsonb objects and pgvector's text form. The schema accepts both and
 * the mappers produce the domain shape.
 *
 * Consumers: sqlite-store.ts, postgres-store.ts
 */

import { z } from 'zod';
import {
  FeedbackSourceSchema,
  IntentSchema,
  SentimentSchema,
  UrgencySchema,
} from '../feedback/types.js';
import type { Classification, FeedbackItem, NewFeedbackItem, UserProfile } from '../feedback/types.js';

// ---------------------------------------------------------------------------
// Column coercion helpers
// ---------------------------------------------------------------------------

/** JSON text (SQLite, pgvector output) or an already-decoded value */
function decodedJson<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => {
    if (typeof value !== 'string') return value;
    try {
      return JSON.parse(value);
    } catch {
      // Leave the raw string; the inner schema reports it as invalid
      return value;
    }
  }, schema);
}

const timestamp = z
  .union([z.string(), z.date()])
  .transform((value) => new Date(value).toISOString());

// ---------------------------------------------------------------------------
// Row schema
// ---------------------------------------------------------------------------

export const FeedbackRowSchema = z.object({
  id: z.string(),
  text: z.string(),
  source: FeedbackSourceSchema,
  created_at: timestamp,
  user_id: z.string().nullable(),
  sentiment: SentimentSchema.nullable(),
  topics: decodedJson(z.array(z.string()).nullable()),
  urgency: UrgencySchema.nullable(),
  intent: IntentSchema.nullable(),
  summary: z.string().nullable(),
  confidence: z.number().nullable(),
  nps_score: z.number().int().nullable(),
  ticket_id: z.string().nullable(),
  ticket_priority: z.string().nullable(),
  embedding: decodedJson(z.array(z.number()).nullable()),
  u_user_id: z.string().nullish(),
  u_email: z.string().nullish(),
  u_subscription_type: z.string().nullish(),
  u_mrr: z.number().nullish(),
  u_company_name: z.string().nullish(),
  u_industry: z.string().nullish(),
  u_signup_date: timestamp.nullish(),
  u_custom_traits: decodedJson(z.record(z.unknown()).nullish()),
});

export type FeedbackRow = z.infer<typeof FeedbackRowSchema>;

// ---------------------------------------------------------------------------
// Row -> domain
// ---------------------------------------------------------------------------

export function rowToFeedbackItem(row: FeedbackRow): FeedbackItem {
  let userProfile: UserProfile | null = null;
  if (row.u_user_id) {
    userProfile = {
      userId: row.u_user_id,
      email: row.u_email ?? null,
      subscriptionType: row.u_subscription_type ?? null,
      mrr: row.u_mrr ?? null,
      companyName: row.u_company_name ?? null,
      industry: row.u_industry ?? null,
      signupDate: row.u_signup_date ?? null,
      customTraits: row.u_custom_traits ?? {},
    };
  }

  // A row without sentiment was never classified
  let classification: Classification | null = null;
  if (row.sentiment) {
    classification = {
      sentiment: row.sentiment,
      topics: row.topics ?? [],
      urgency: row.urgency ?? 'low',
      intent: row.intent ?? 'general_feedback',
      summary: row.summary ?? '',
      confidence: row.confidence ?? 0,
    };
  }

  return {
    id: row.id,
    text: row.text,
    source: row.source,
    createdAt: row.created_at,
    userProfile,
    classification,
    embedding: row.embedding,
    npsScore: row.nps_score,
    ticketId: row.ticket_id,
    ticketPriority: row.ticket_priority,
  };
}

/** Validate an untyped driver row and map it */
export function parseFeedbackRow(raw: unknown): FeedbackItem {
  return rowToFeedbackItem(FeedbackRowSchema.parse(raw));
}

// ---------------------------------------------------------------------------
// Domain -> columns
// ---------------------------------------------------------------------------

export interface FeedbackColumns {
  id: string;
  text: string;
  source: string;
  created_at: string;
  user_id: string | null;
  sentiment: string | null;
  topics: string[] | null;
  urgency: string | null;
  intent: string | null;
  summary: string | null;
  confidence: number | null;
  nps_score: number | null;
  ticket_id: string | null;
  ticket_priority: string | null;
  embedding: number[] | null;
}

export interface ProfileColumns {
  user_id: string;
  email: string | null;
  subscription_type: string | null;
  mrr: number | null;
  company_name: string | null;
  industry: string | null;
  signup_date: string | null;
  custom_traits: Record<string, unknown>;
}

export function feedbackToColumns(item: NewFeedbackItem & { id: string }): FeedbackColumns {
  const c = item.classification;
  return {
    id: item.id,
    text: item.text,
    source: item.source,
    created_at: new Date(item.createdAt).toISOString(),
    user_id: item.userProfile?.userId ?? null,
    sentiment: c?.sentiment ?? null,
    topics: c?.topics ?? null,
    urgency: c?.urgency ?? null,
    intent: c?.intent ?? null,
    summary: c?.summary ?? null,
    confidence: c?.confidence ?? null,
    nps_score: item.npsScore,
    ticket_id: item.ticketId,
    ticket_priority: item.ticketPriority,
    embedding: item.embedding,
  };
}

export function profileToColumns(profile: UserProfile): ProfileColumns {
  return {
    user_id: profile.userId,
    email: profile.email,
    subscription_type: profile.subscriptionType,
    mrr: profile.mrr,
    company_name: profile.companyName,
    industry: profile.industry,
    signup_date: profile.signupDate ? new Date(profile.signupDate).toISOString() : null,
    custom_traits: profile.customTraits,
  };
}
