/**
 * Tests for search parameter parsing
 */

import { describe, it, expect } from 'vitest';
import { buildSearchQuery } from '../params.js';
import { FeedbackValidationError } from '../../feedback/errors.js';
import { createSearchQuery } from '../../feedback/types.js';

const now = new Date('2026-03-15T00:00:00.000Z');

function validationError(fn: () => unknown): FeedbackValidationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof FeedbackValidationError) return err;
    throw err;
  }
  throw new Error('expected a FeedbackValidationError');
}

describe('buildSearchQuery', () => {
  it('returns an unconstrained first page for empty params', () => {
    expect(buildSearchQuery({}, now)).toEqual(createSearchQuery());
  });

  it('splits comma-separated lists and accepts arrays', () => {
    const query = buildSearchQuery({ sources: 'nps, zendesk', sentiments: ['negative'], topics: 'billing,,api' }, now);

    expect(query.sources).toEqual(['nps', 'zendesk']);
    expect(query.sentiments).toEqual(['negative']);
    expect(query.topics).toEqual(['billing', 'api']);
  });

  it('coerces numeric strings', () => {
    const query = buildSearchQuery({ minMrr: '100', maxNps: '6', limit: '5', offset: '10' }, now);

    expect(query).toMatchObject({ minMrr: 100, maxNps: 6, limit: 5, offset: 10 });
  });

  it('treats blank values as absent', () => {
    const query = buildSearchQuery({ query: '   ', sources: '', minMrr: '' }, now);

    expect(query).toMatchObject({ queryText: null, sources: null, minMrr: null });
  });

  it('turns daysBack into a start date relative to now', () => {
    expect(buildSearchQuery({ daysBack: 7 }, now).startDate).toEqual(new Date('2026-03-08T00:00:00.000Z'));
  });

  it('applies no window for daysBack 0', () => {
    expect(buildSearchQuery({ daysBack: 0 }, now).startDate).toBeNull();
    expect(buildSearchQuery({ daysBack: '0', startDate: '2026-03-10T00:00:00.000Z' }, now).startDate)
      .toEqual(new Date('2026-03-10T00:00:00.000Z'));
  });

  it('keeps an explicit start date later than the window', () => {
    const query = buildSearchQuery({ daysBack: 30, startDate: '2026-03-10T00:00:00.000Z' }, now);
    expect(query.startDate).toEqual(new Date('2026-03-10T00:00:00.000Z'));
  });

  it('uses the window when the explicit start date is earlier', () => {
    const query = buildSearchQuery({ daysBack: 2, startDate: '2026-01-01T00:00:00.000Z' }, now);
    expect(query.startDate).toEqual(new Date('2026-03-13T00:00:00.000Z'));
  });

  it('rejects an unknown sentiment, naming the field', () => {
    const error = validationError(() => buildSearchQuery({ sentiments: 'angry' }, now));

    expect(error.field).toBe('sentiments.0');
    expect(error.message).toMatch(/^Invalid sentiments\.0: /);
  });

  it('rejects a topic outside the topic vocabulary', () => {
    const error = validationError(() => buildSearchQuery({ topics: 'billing,teleport' }, now));

    expect(error.field).toBe('topics.1');
    expect(error.message).toMatch(/^Invalid topics\.1: /);
  });

  it('rejects out-of-range numbers', () => {
    expect(validationError(() => buildSearchQuery({ minNps: 11 }, now)).field).toBe('minNps');
    expect(validationError(() => buildSearchQuery({ limit: 5000 }, now)).field).toBe('limit');
    expect(validationError(() => buildSearchQuery({ minMrr: -1 }, now)).field).toBe('minMrr');
    expect(validationError(() => buildSearchQuery({ offset: 'abc' }, now)).field).toBe('offset');
  });
});
