/**
 * Canonical Ingestion Records
 *
 * Every import path (API body, JSON export, CSV row) is reduced to one flat
 * record shape before it reaches the pipeline:
 *
 *   { text, user_id?, email?, subscription_type?, mrr?, company_name?,
 *     industry?, nps_score?, ticket_id?, ticket_priority?, created_at? }
 *
 * normalizeRecord validates and coerces one raw value; a blank text is a skip
 * rather than an error.
 *
 * Consumers: ingester.ts, parsers.ts
 */

import { z } from 'zod';
import { firstIssue, optionalDate, optionalNumber, optionalText } from '../feedback/coerce.js';
import type { UserProfile } from '../feedback/types.js';

export const RawFeedbackRecordSchema = z.object({
  text: optionalText,
  user_id: optionalText,
  email: optionalText,
  subscription_type: optionalText,
  mrr: optionalNumber(z.number().min(0)),
  company_name: optionalText,
  industry: optionalText,
  nps_score: optionalNumber(z.number().int().min(0).max(10)),
  ticket_id: optionalText,
  ticket_priority: optionalText,
  created_at: optionalDate,
});

/** A raw record before normalization; keys as in the canonical shape */
export type FeedbackRecordInput = Record<string, unknown>;

export interface CanonicalRecord {
  text: string;
  userId: string | null;
  email: string | null;
  subscriptionType: string | null;
  mrr: number | null;
  companyName: string | null;
  industry: string | null;
  npsScore: number | null;
  ticketId: string | null;
  ticketPriority: string | null;
  createdAt: Date | null;
}

export type NormalizedRecord =
  | { kind: 'valid'; record: CanonicalRecord }
  | { kind: 'skipped' }
  | { kind: 'invalid'; field: string | null; message: string };

export function normalizeRecord(raw: unknown): NormalizedRecord {
  const parsed = RawFeedbackRecordSchema.safeParse(raw);
  if (!parsed.success) {
    const { field, message } = firstIssue(parsed.error);
    return { kind: 'invalid', field, message: field ? `${field}: ${message}` : message };
  }

  const r = parsed.data;
  if (r.text === null) {
    return { kind: 'skipped' };
  }

  return {
    kind: 'valid',
    record: {
      text: r.text,
      userId: r.user_id,
      email: r.email,
      subscriptionType: r.subscription_type,
      mrr: r.mrr,
      companyName: r.company_name,
      industry: r.industry,
      npsScore: r.nps_score,
      ticketId: r.ticket_id,
      ticketPriority: r.ticket_priority,
      createdAt: r.created_at,
    },
  };
}

/** Profile carried by a record, when it names a user */
export function recordProfile(record: CanonicalRecord): UserProfile | null {
  if (!record.userId) return null;
  return {
    userId: record.userId,
    email: record.email,
    subscriptionType: record.subscriptionType,
    mrr: record.mrr,
    companyName: record.companyName,
    industry: record.industry,
    signupDate: null,
    customTraits: {},
  };
}
