/**
 * Import File Parsers
 *
 * Converts exported files into canonical ingestion records:
 * - NPS survey exports (CSV or XLSX): response / score / user_id / email / date
 * - Zendesk ticket exports (JSON): id / description / priority / requester / created_at
 * - Generic feedback (JSON): an array of canonical records, or { items: [...] }
 * - User profile exports (CSV or XLSX): user_id plus profile columns
 *
 * Delimited text and spreadsheets both go through xlsx, cells read as raw
 * strings; coercion happens later in records.ts.
 *
 * Consumers: jobs/import-jobs.ts, cli.ts
 */

import * as XLSX from 'xlsx';
import { z } from 'zod';
import { FeedbackValidationError } from '../feedback/errors.js';
import { firstIssue, optionalDate, optionalNumber, optionalText } from '../feedback/coerce.js';
import type { UserProfile } from '../feedback/types.js';
import type { FeedbackRecordInput } from './records.js';

export type TableContent = string | Buffer;

export interface RowError {
  /** 1-based data row (header excluded) for tables, 0-based position for JSON arrays */
  row: number;
  message: string;
}

// ---------------------------------------------------------------------------
// Tables
// ---------------------------------------------------------------------------

/**
 * Read the first sheet of a CSV string or spreadsheet buffer into row objects
 * keyed by the header row. Blank cells are empty strings.
 */
export function readTable(content: TableContent): Record<string, unknown>[] {
  const workbook = typeof content === 'string'
    ? XLSX.read(content, { type: 'string', raw: true })
    : XLSX.read(content, { type: 'buffer', raw: true });

  const sheetName = workbook.SheetNames[0];
  if (!sheetName) return [];

  return XLSX.utils.sheet_to_json<Record<string, unknown>>(workbook.Sheets[sheetName], {
    defval: '',
    raw: false,
  });
}

function cell(row: Record<string, unknown>, column: string): unknown {
  const value = row[column];
  return typeof value === 'string' ? value.trim() : value;
}

// ---------------------------------------------------------------------------
// NPS survey export
// ---------------------------------------------------------------------------

export interface NpsCsvColumns {
  text: string;
  score: string;
  userId: string;
  email: string;
  date: string;
}

export const DEFAULT_NPS_COLUMNS: NpsCsvColumns = {
  text: 'response',
  score: 'score',
  userId: 'user_id',
  email: 'email',
  date: 'date',
};

/** Profile columns carried through when the export has them */
const PROFILE_COLUMNS = ['subscription_type', 'mrr', 'company_name', 'industry'] as const;

/**
 * Rows with an empty response are dropped here; everything else is left for
 * record validation.
 */
export function parseNpsCsv(
  content: TableContent,
  columns: Partial<NpsCsvColumns> = {},
): FeedbackRecordInput[] {
  const c = { ...DEFAULT_NPS_COLUMNS, ...columns };
  const records: FeedbackRecordInput[] = [];

  for (const row of readTable(content)) {
    const text = cell(row, c.text);
    if (typeof text !== 'string' || text.length === 0) continue;

    const record: Record<string, unknown> = {
      text,
      nps_score: cell(row, c.score),
      user_id: cell(row, c.userId),
      email: cell(row, c.email),
      created_at: cell(row, c.date),
    };
    for (const column of PROFILE_COLUMNS) {
      if (column in row) record[column] = cell(row, column);
    }
    records.push(record);
  }

  return records;
}

// ---------------------------------------------------------------------------
// JSON exports
// ---------------------------------------------------------------------------

const idLike = z.union([z.string(), z.number()]).nullish();

const ZendeskTicketSchema = z.object({
  id: idLike,
  description: z.string().nullish(),
  priority: z.string().nullish(),
  requester: z.object({
    id: idLike,
    email: z.string().nullish(),
  }).nullish(),
  created_at: z.string().nullish(),
});

function parseJson(content: string, format: string): unknown {
  try {
    return JSON.parse(content);
  } catch (err) {
    throw new FeedbackValidationError(
      `${format} import is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

export interface ParsedTickets {
  records: FeedbackRecordInput[];
  /** Tickets that failed validation; `row` is the 0-based position in the export */
  errors: RowError[];
}

/**
 * A malformed ticket is reported in `errors` and the rest of the export is
 * still returned. Only a payload that is not an array is rejected outright.
 */
export function parseZendeskJson(content: string): ParsedTickets {
  const data = parseJson(content, 'Zendesk');
  if (!Array.isArray(data)) {
    throw new FeedbackValidationError('Zendesk export must be an array of tickets');
  }

  const records: FeedbackRecordInput[] = [];
  const errors: RowError[] = [];

  data.forEach((raw: unknown, index) => {
    const parsed = ZendeskTicketSchema.safeParse(raw);
    if (!parsed.success) {
      const { field, message } = firstIssue(parsed.error);
      errors.push({ row: index, message: field ? `${field}: ${message}` : message });
      return;
    }

    const ticket = parsed.data;
    records.push({
      text: ticket.description ?? '',
      ticket_id: ticket.id ?? null,
      ticket_priority: ticket.priority ?? null,
      user_id: ticket.requester?.id ?? null,
      email: ticket.requester?.email ?? null,
      created_at: ticket.created_at ?? null,
    });
  });

  return { records, errors };
}

/** Array of canonical records, or an object wrapping one under `items` */
export function parseFeedbackJson(content: string): FeedbackRecordInput[] {
  const data = parseJson(content, 'Feedback');
  const parsed = z.union([
    z.array(z.record(z.unknown())),
    z.object({ items: z.array(z.record(z.unknown())) }).transform(d => d.items),
  ]).safeParse(data);

  if (!parsed.success) {
    throw new FeedbackValidationError('Feedback import must be an array of records or { "items": [...] }');
  }
  return parsed.data;
}

// ---------------------------------------------------------------------------
// User profiles
// ---------------------------------------------------------------------------

const KNOWN_PROFILE_COLUMNS: ReadonlySet<string> = new Set([
  'user_id', 'email', 'subscription_type', 'mrr', 'company_name', 'industry', 'signup_date',
]);

const ProfileRowSchema = z.object({
  user_id: optionalText,
  email: optionalText,
  subscription_type: optionalText,
  mrr: optionalNumber(z.number().min(0)),
  company_name: optionalText,
  industry: optionalText,
  signup_date: optionalDate,
});

export interface ParsedProfiles {
  profiles: UserProfile[];
  errors: RowError[];
}

/**
 * Rows without a user_id are skipped. Columns outside the profile schema are
 * kept as custom traits.
 */
export function parseUserProfilesCsv(content: TableContent): ParsedProfiles {
  const profiles: UserProfile[] = [];
  const errors: RowError[] = [];

  readTable(content).forEach((row, index) => {
    const parsed = ProfileRowSchema.safeParse(row);
    if (!parsed.success) {
      const { field, message } = firstIssue(parsed.error);
      errors.push({ row: index + 1, message: field ? `${field}: ${message}` : message });
      return;
    }

    const p = parsed.data;
    if (!p.user_id) return;

    const customTraits: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(row)) {
      if (!KNOWN_PROFILE_COLUMNS.has(key) && value !== '') {
        customTraits[key] = value;
      }
    }

    profiles.push({
      userId: p.user_id,
      email: p.email,
      subscriptionType: p.subscription_type,
      mrr: p.mrr,
      companyName: p.company_name,
      industry: p.industry,
      signupDate: p.signup_date ? p.signup_date.toISOString() : null,
      customTraits,
    });
  });

  return { profiles, errors };
}
