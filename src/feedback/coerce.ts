/**
 * Zod coercion helpers for loosely-typed input (CSV cells, query strings,
 * JSON bodies). Blank strings read as absent.
 *
 * Consumers: query/params.ts, ingestion/records.ts
 */

import { z } from 'zod';

export function blankToNull(value: unknown): unknown {
  if (value === undefined || value === null) return null;
  if (typeof value === 'string' && value.trim() === '') return null;
  return value;
}

/** Trimmed string or null; numbers are stringified (ticket ids, user ids) */
export const optionalText = z.preprocess((value) => {
  const present = blankToNull(value);
  if (typeof present === 'string') return present.trim();
  if (typeof present === 'number') return String(present);
  return present;
}, z.string().nullable());

export function optionalNumber(schema: z.ZodNumber) {
  return z.preprocess(blankToNull, z.coerce.number().pipe(schema).nullable());
}

export const optionalDate = z.preprocess(blankToNull, z.coerce.date().nullable());

/** Array, or a comma-separated string split into one */
export function optionalList<T extends z.ZodTypeAny>(item: T) {
  return z.preprocess((value) => {
    const present = blankToNull(value);
    if (typeof present === 'string') {
      return present.split(',').map(v => v.trim()).filter(v => v.length > 0);
    }
    return present;
  }, z.array(item).nullable());
}

/** "field: message" for the first issue of a failed parse */
export function firstIssue(error: z.ZodError): { field: string | null; message: string } {
  const issue = error.issues[0];
  return {
    field: issue.path.length > 0 ? issue.path.join('.') : null,
    message: issue.message,
  };
}
