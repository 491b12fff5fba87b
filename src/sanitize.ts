/**
 * PII Sanitization for Safe Logging
 *
 * Replaces customer-identifying fields and free-text feedback with
 * '[REDACTED]' before raw records or request bodies are written to logs.
 *
 * - Arrays are replaced with '[Array(N)]' summaries (never iterated into)
 * - user_id / ticket_id are NOT redacted (needed to trace a record)
 * - Depth limit of 10 on nested objects
 *
 * Consumers: ingestion/ingester.ts, api/server.ts
 */

/** Field names whose values must never appear in logs */
export const PII_FIELDS: ReadonlySet<string> = new Set([
  'email',
  'phone',
  'name',
  'company_name',
  'companyName',
  'text',
  'description',
  'response',
  'comment',
  'ipAddress',
]);

const MAX_DEPTH = 10;
const REDACTED = '[REDACTED]';

/**
 * Recursively sanitize a value for logging. Primitives pass through; objects
 * are copied with PII fields redacted.
 */
export function sanitizeForLog(obj: unknown, depth = 0): unknown {
  if (obj === null || obj === undefined) {
    return obj;
  }

  if (typeof obj !== 'object') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return `[Array(${obj.length})]`;
  }

  if (depth >= MAX_DEPTH) {
    return '[Object]';
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    result[key] = PII_FIELDS.has(key) ? REDACTED : sanitizeForLog(value, depth + 1);
  }

  return result;
}
